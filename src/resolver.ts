/**
 * Mirror Xref - Resolver
 *
 * Wires a codebase, the state cache, configuration and logging into one
 * object answering navigation queries.
 *
 * @module resolver
 */

import * as path from 'path';
import { DEFAULT_CONFIG, loadConfig, type ResolvedConfig } from './config.js';
import { loadManifests } from './sources/manifest-source.js';
import type { MemoryCodebase } from './sources/memory-codebase.js';
import { ManifestError } from './utils/errors.js';
import { logger as rootLogger, type ChildLogger } from './utils/logger.js';
import { AnnotationKind, MIXIN_RELATION_KINDS } from './xref/types.js';
import type { Codebase, Declaration } from './xref/types.js';
import { collectNavigationMarkers, type NavigationMarker } from './xref/navigation.js';
import { exportsReferencing, referencesOf } from './xref/query.js';
import { buildState, type StateBuildOptions } from './xref/state-builder.js';
import { StateCache } from './xref/state-cache.js';
import type { CrossReferenceState, StateCounts } from './xref/state.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ResolverOptions {
  codebase: Codebase;
  /** Shared cache (default: a private one) */
  cache?: StateCache;
  config?: ResolvedConfig;
  logger?: ChildLogger;
}

export interface ResolverSummary extends StateCounts {
  /** Import or mixin declarations that resolved to nothing */
  unresolved: number;
  /** Snapshot the summary describes */
  modificationCount: number;
}

// ============================================================================
// RESOLVER
// ============================================================================

/**
 * Cross-reference resolver over one codebase
 *
 * @example
 * ```ts
 * const resolver = new CrossReferenceResolver({ codebase });
 * const imports = resolver.exportsReferencing(exportedField);
 * ```
 */
export class CrossReferenceResolver {
  readonly codebase: Codebase;
  private readonly cache: StateCache;
  private readonly config: ResolvedConfig;
  private readonly log: ChildLogger;

  constructor(options: ResolverOptions) {
    this.codebase = options.codebase;
    this.cache = options.cache ?? new StateCache();
    this.config = options.config ?? DEFAULT_CONFIG;
    this.log = options.logger ?? rootLogger.child({ module: 'resolver' });
  }

  /**
   * State for the current snapshot
   */
  state(): CrossReferenceState {
    if (!this.config.cache.enabled) {
      return buildState(this.codebase, this.buildOptions());
    }
    return this.cache.getState(this.codebase, this.buildOptions());
  }

  /**
   * State for the current snapshot, sharing any build already in flight
   */
  async ready(): Promise<CrossReferenceState> {
    if (!this.config.cache.enabled) {
      return buildState(this.codebase, this.buildOptions());
    }
    return this.cache.getStateAsync(this.codebase, this.buildOptions());
  }

  exportsReferencing(declaration: Declaration): Declaration[] {
    return exportsReferencing(this.state(), declaration);
  }

  referencesOf(declaration: Declaration): Declaration[] {
    return referencesOf(this.state(), declaration);
  }

  markersFor(declaration: Declaration): NavigationMarker[] {
    return collectNavigationMarkers(this.state(), declaration);
  }

  summarize(): ResolverSummary {
    const state = this.state();
    const referencing = new Set<Declaration>();
    for (const kind of [AnnotationKind.Import, ...MIXIN_RELATION_KINDS]) {
      try {
        for (const { declaration } of this.codebase.findAnnotated(kind)) {
          referencing.add(declaration);
        }
      } catch (error) {
        this.log.warn('Declaration index failed, treating kind as empty', {
          kind,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    let unresolved = 0;
    for (const declaration of referencing) {
      if (state.referencedBy(declaration).length === 0) {
        unresolved++;
      }
    }

    return {
      ...state.counts(),
      unresolved,
      modificationCount: this.codebase.modificationCount,
    };
  }

  private buildOptions(): StateBuildOptions {
    return { mirrorPrefix: this.config.mirrorPrefix, logger: this.log };
  }
}

// ============================================================================
// PROJECTS
// ============================================================================

export interface OpenedProject {
  root: string;
  config: ResolvedConfig;
  codebase: MemoryCodebase;
  resolver: CrossReferenceResolver;
  /** Manifests loaded, relative to the root */
  files: string[];
  errors: ManifestError[];
}

/**
 * Load configuration and manifests for a project directory
 *
 * @throws ManifestError when no manifest matches the configured patterns
 */
export async function openProject(projectRoot: string): Promise<OpenedProject> {
  const root = path.resolve(projectRoot);
  const config = await loadConfig(root);
  rootLogger.configure({ level: config.logLevel });

  const { codebase, files, errors } = await loadManifests(root, {
    include: config.manifests.include,
    ignore: config.manifests.ignore,
  });

  if (files.length === 0 && errors.length === 0) {
    throw new ManifestError(
      'MANIFEST_NOT_FOUND',
      `No manifests matching ${config.manifests.include.join(', ')} in ${root}`
    );
  }

  return {
    root,
    config,
    codebase,
    resolver: new CrossReferenceResolver({ codebase, config }),
    files,
    errors,
  };
}
