/**
 * State Cache
 *
 * Memoizes one value per codebase snapshot. Any change of the snapshot
 * version invalidates the whole value; there are no partial updates.
 *
 * @module xref/state-cache
 */

import { CacheError } from '../utils/errors.js';
import { MIRROR_PREFIX } from './types.js';
import type { Codebase } from './types.js';
import { buildState, type StateBuildOptions } from './state-builder.js';
import type { CrossReferenceState } from './state.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Cache statistics
 */
export interface SnapshotCacheStats {
  /** Requests answered from the memo */
  hits: number;
  /** Requests that started a build */
  misses: number;
  /** Requests that joined a build already in flight */
  shared: number;
  /** Completed builds */
  builds: number;
  /** Builds that threw */
  failures: number;
  /** Snapshot version of the memo */
  version: number | null;
  /** Duration of the last completed build */
  lastBuildMs: number | null;
}

interface Memo<T> {
  version: number;
  value: T;
}

// ============================================================================
// SNAPSHOT CACHE
// ============================================================================

/**
 * Single-flight memo keyed by snapshot version
 *
 * `get` and `getAsync` share the memo but not in-flight builds: a `get`
 * while an asynchronous build of the same version is pending builds again.
 * Mix the two only with synchronous builders.
 *
 * @example
 * ```ts
 * const cache = new SnapshotCache<CrossReferenceState>();
 * const state = cache.get(codebase.modificationCount, () => buildState(codebase));
 * ```
 */
export class SnapshotCache<T> {
  private memo: Memo<T> | null = null;
  private building = false;
  private pending = new Map<number, Promise<T>>();
  private queue: Promise<void> = Promise.resolve();
  private hits = 0;
  private misses = 0;
  private shared = 0;
  private builds = 0;
  private failures = 0;
  private lastBuildMs: number | null = null;

  /**
   * Memoized value for `version`, building it synchronously when stale.
   * Does not join builds started by {@link getAsync}; `build` must be
   * synchronous.
   */
  get(version: number, build: () => T): T {
    if (this.memo && this.memo.version === version) {
      this.hits++;
      return this.memo.value;
    }

    if (this.building) {
      throw new CacheError('State build re-entered its own cache', {
        technical: { version },
      });
    }

    this.misses++;
    this.building = true;
    try {
      return this.record(version, build);
    } finally {
      this.building = false;
    }
  }

  /**
   * Memoized value for `version`. Concurrent callers for one version share
   * a single build; builds for newer versions queue behind the running one.
   */
  getAsync(version: number, build: () => T | Promise<T>): Promise<T> {
    if (this.memo && this.memo.version === version) {
      this.hits++;
      const { value } = this.memo;
      return new Promise<T>((resolve) => resolve(value));
    }

    const inFlight = this.pending.get(version);
    if (inFlight) {
      this.shared++;
      return inFlight;
    }

    this.misses++;
    const promise = this.queue
      .then((): T | Promise<T> => {
        // An earlier queued build may already have produced this snapshot
        if (this.memo && this.memo.version === version) {
          return this.memo.value;
        }
        const started = Date.now();
        return new Promise<T>((resolve) => resolve(build())).then(
          (value) => {
            this.publish(version, value, started);
            return value;
          },
          (error: unknown) => {
            this.failures++;
            throw error;
          }
        );
      })
      .finally(() => {
        this.pending.delete(version);
      });

    this.pending.set(version, promise);
    // Failures reach the callers through `promise`; the queue only orders builds
    this.queue = promise.then(
      () => undefined,
      () => undefined
    );
    return promise;
  }

  /**
   * Drop the memo. Builds in flight still complete and publish.
   */
  invalidate(): void {
    this.memo = null;
  }

  getStats(): SnapshotCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      shared: this.shared,
      builds: this.builds,
      failures: this.failures,
      version: this.memo ? this.memo.version : null,
      lastBuildMs: this.lastBuildMs,
    };
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  private record(version: number, build: () => T): T {
    const started = Date.now();
    let value: T;
    try {
      value = build();
    } catch (error) {
      this.failures++;
      throw error;
    }
    this.publish(version, value, started);
    return value;
  }

  /**
   * Replace the memo unless it already holds a newer snapshot
   */
  private publish(version: number, value: T, started: number): void {
    this.builds++;
    this.lastBuildMs = Date.now() - started;
    if (!this.memo || this.memo.version <= version) {
      this.memo = { version, value };
    }
  }
}

// ============================================================================
// STATE CACHE
// ============================================================================

/**
 * Cross-reference states for any number of codebases. Each codebase and
 * mirror prefix gets its own snapshot cache, so resolvers over different
 * codebases or prefixes can share one instance.
 */
export class StateCache {
  private caches = new WeakMap<Codebase, Map<string, SnapshotCache<CrossReferenceState>>>();

  getState(codebase: Codebase, options?: StateBuildOptions): CrossReferenceState {
    return this.cacheFor(codebase, options).get(codebase.modificationCount, () =>
      buildState(codebase, options)
    );
  }

  getStateAsync(codebase: Codebase, options?: StateBuildOptions): Promise<CrossReferenceState> {
    return this.cacheFor(codebase, options).getAsync(codebase.modificationCount, () =>
      buildState(codebase, options)
    );
  }

  /**
   * Statistics of the cache serving `codebase` with the given options
   */
  getStats(codebase: Codebase, options?: StateBuildOptions): SnapshotCacheStats {
    return this.cacheFor(codebase, options).getStats();
  }

  /**
   * Drop every memo
   */
  invalidate(): void {
    this.caches = new WeakMap();
  }

  private cacheFor(codebase: Codebase, options?: StateBuildOptions): SnapshotCache<CrossReferenceState> {
    const prefix = options?.mirrorPrefix ?? MIRROR_PREFIX;
    let byPrefix = this.caches.get(codebase);
    if (!byPrefix) {
      byPrefix = new Map<string, SnapshotCache<CrossReferenceState>>();
      this.caches.set(codebase, byPrefix);
    }
    let cache = byPrefix.get(prefix);
    if (!cache) {
      cache = new SnapshotCache<CrossReferenceState>();
      byPrefix.set(prefix, cache);
    }
    return cache;
  }
}
