/**
 * Tests for snapshot caching
 */

import { describe, it, expect, vi } from 'vitest';
import { MemoryCodebase } from '../src/sources/memory-codebase.js';
import { SnapshotCache, StateCache } from '../src/xref/index.js';
import { CacheError } from '../src/utils/errors.js';
import { captureLogger } from './helpers.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('SnapshotCache', () => {
  describe('get', () => {
    it('should build once per version', () => {
      const cache = new SnapshotCache<string>();
      const build = vi.fn(() => 'state');

      expect(cache.get(1, build)).toBe('state');
      expect(cache.get(1, build)).toBe('state');
      expect(build).toHaveBeenCalledTimes(1);
      expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, builds: 1, version: 1 });
    });

    it('should rebuild when the version changes', () => {
      const cache = new SnapshotCache<number>();

      expect(cache.get(1, () => 10)).toBe(10);
      expect(cache.get(2, () => 20)).toBe(20);
      expect(cache.get(1, () => 30)).toBe(30);
      expect(cache.getStats().builds).toBe(3);
    });

    it('should rebuild after invalidate', () => {
      const cache = new SnapshotCache<string>();
      cache.get(1, () => 'first');
      cache.invalidate();

      expect(cache.getStats().version).toBeNull();
      expect(cache.get(1, () => 'second')).toBe('second');
    });

    it('should reject a build that reads its own cache', () => {
      const cache = new SnapshotCache<string>();

      expect(() => cache.get(1, () => cache.get(1, () => 'inner'))).toThrow(CacheError);
      expect(cache.get(1, () => 'recovered')).toBe('recovered');
    });

    it('should keep the previous memo when a build throws', () => {
      const cache = new SnapshotCache<string>();
      cache.get(1, () => 'one');

      expect(() =>
        cache.get(2, () => {
          throw new Error('build failed');
        })
      ).toThrow('build failed');
      expect(cache.getStats()).toMatchObject({ failures: 1, version: 1 });
    });
  });

  describe('getAsync', () => {
    it('should share one build between concurrent callers', async () => {
      const cache = new SnapshotCache<string>();
      const gate = deferred<string>();
      const build = vi.fn(() => gate.promise);

      const first = cache.getAsync(1, build);
      const second = cache.getAsync(1, build);
      gate.resolve('state');

      await expect(Promise.all([first, second])).resolves.toEqual(['state', 'state']);
      expect(build).toHaveBeenCalledTimes(1);
      expect(cache.getStats()).toMatchObject({ misses: 1, shared: 1, builds: 1 });
    });

    it('should answer from the memo once built', async () => {
      const cache = new SnapshotCache<string>();
      await cache.getAsync(1, () => 'state');

      await expect(cache.getAsync(1, () => 'other')).resolves.toBe('state');
      expect(cache.get(1, () => 'other')).toBe('state');
      expect(cache.getStats().hits).toBe(2);
    });

    it('should run builds for newer versions after the running one', async () => {
      const cache = new SnapshotCache<string>();
      const gate = deferred<void>();
      const order: string[] = [];

      const first = cache.getAsync(1, async () => {
        order.push('start 1');
        await gate.promise;
        order.push('end 1');
        return 'one';
      });
      const second = cache.getAsync(2, () => {
        order.push('start 2');
        return 'two';
      });
      gate.resolve();

      await expect(Promise.all([first, second])).resolves.toEqual(['one', 'two']);
      expect(order).toEqual(['start 1', 'end 1', 'start 2']);
      expect(cache.getStats().version).toBe(2);
    });

    it('should not replace a newer memo with an older build', async () => {
      const cache = new SnapshotCache<string>();
      const gate = deferred<string>();

      const older = cache.getAsync(1, () => gate.promise);
      expect(cache.get(2, () => 'two')).toBe('two');
      gate.resolve('one');

      await expect(older).resolves.toBe('one');
      expect(cache.getStats().version).toBe(2);
      expect(cache.get(2, () => 'rebuilt')).toBe('two');
    });

    it('should reject callers of a failed build and retry on the next request', async () => {
      const cache = new SnapshotCache<string>();
      const gate = deferred<string>();

      const first = cache.getAsync(1, () => gate.promise);
      const second = cache.getAsync(1, () => 'unused');
      gate.reject(new Error('build failed'));

      await expect(first).rejects.toThrow('build failed');
      await expect(second).rejects.toThrow('build failed');
      await expect(cache.getAsync(1, () => 'retried')).resolves.toBe('retried');
      expect(cache.getStats()).toMatchObject({ failures: 1, builds: 1, misses: 2, shared: 1 });
    });
  });
});

describe('StateCache', () => {
  it('should reuse the state until the codebase changes', () => {
    const codebase = new MemoryCodebase([
      {
        name: 'Player',
        annotations: { implements: 'Player' },
        members: [{ name: 'health', kind: 'field', annotations: { export: 'health' } }],
      },
    ]);
    const cache = new StateCache();
    const options = { logger: captureLogger().logger };

    const first = cache.getState(codebase, options);
    expect(cache.getState(codebase, options)).toBe(first);

    codebase.getType('Player')?.addMember({ name: 'level', kind: 'field', annotations: { export: 'level' } });
    const second = cache.getState(codebase, options);

    expect(second).not.toBe(first);
    expect(first.counts().exports).toBe(1);
    expect(second.counts().exports).toBe(2);
  });

  it('should share asynchronous builds for one snapshot', async () => {
    const codebase = new MemoryCodebase();
    const cache = new StateCache();
    const options = { logger: captureLogger().logger };

    const [a, b] = await Promise.all([
      cache.getStateAsync(codebase, options),
      cache.getStateAsync(codebase, options),
    ]);

    expect(a).toBe(b);
    expect(cache.getStats(codebase, options)).toMatchObject({ builds: 1, shared: 1 });
  });

  it('should keep separate states for codebases at the same modification count', () => {
    const players = new MemoryCodebase([
      {
        name: 'Player',
        annotations: { implements: 'Player' },
        members: [{ name: 'health', kind: 'field', annotations: { export: 'health' } }],
      },
    ]);
    const npcs = new MemoryCodebase([
      {
        name: 'Npc',
        annotations: { implements: 'Npc' },
        members: [
          { name: 'id', kind: 'field', annotations: { export: 'id' } },
          { name: 'name', kind: 'field', annotations: { export: 'name' } },
        ],
      },
    ]);
    const cache = new StateCache();
    const options = { logger: captureLogger().logger };

    const first = cache.getState(players, options);
    const second = cache.getState(npcs, options);

    expect(second).not.toBe(first);
    expect(first.counts().exports).toBe(1);
    expect(second.counts().exports).toBe(2);
    expect(cache.getState(players, options)).toBe(first);
  });

  it('should keep separate states per mirror prefix', () => {
    const codebase = new MemoryCodebase();
    const cache = new StateCache();
    const { logger } = captureLogger();

    const standard = cache.getState(codebase, { logger });
    const custom = cache.getState(codebase, { mirrorPrefix: 'Api', logger });

    expect(custom).not.toBe(standard);
    expect(cache.getState(codebase, { mirrorPrefix: 'RS', logger })).toBe(standard);
    expect(cache.getStats(codebase)).toMatchObject({ builds: 1, hits: 1 });
    expect(cache.getStats(codebase, { mirrorPrefix: 'Api' })).toMatchObject({ builds: 1, hits: 0 });
  });

  it('should rebuild every codebase after invalidate', () => {
    const codebase = new MemoryCodebase();
    const cache = new StateCache();
    const options = { logger: captureLogger().logger };

    const first = cache.getState(codebase, options);
    cache.invalidate();

    expect(cache.getState(codebase, options)).not.toBe(first);
  });
});
