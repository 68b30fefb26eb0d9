/**
 * State Builder
 *
 * Builds a fresh CrossReferenceState from a DeclarationIndex in three
 * ordered passes: exports, then imports, then mixins. Imports and mixins
 * resolve against the exports found before them, including constructor
 * exports synthesized during the mixin pass.
 *
 * @module xref/state-builder
 */

import { AnnotationKind, CONSTRUCTOR_MARKER, MIXIN_RELATION_KINDS } from './types.js';
import type { AnnotatedDeclaration, Declaration, DeclarationIndex, MemberAnnotationKind } from './types.js';
import { fromExported, fromImported, fromMixin } from './identity.js';
import { CrossReferenceState, StateBuilder } from './state.js';
import { logger as rootLogger, type ChildLogger } from '../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface StateBuildOptions {
  /** Mirror type prefix (default: `RS`) */
  mirrorPrefix?: string;
  /** Logger for build diagnostics */
  logger?: ChildLogger;
}

// ============================================================================
// BUILD
// ============================================================================

/**
 * Build the cross-reference state for one snapshot of a codebase
 *
 * @example
 * ```ts
 * const state = buildState(codebase);
 * const imports = exportsReferencing(state, exportedField);
 * ```
 */
export function buildState(
  index: DeclarationIndex,
  options: StateBuildOptions = {}
): CrossReferenceState {
  const log = options.logger ?? rootLogger.child({ module: 'xref/state-builder' });
  const builder = new StateBuilder(options.mirrorPrefix);
  const started = Date.now();

  // Exports first: everything else resolves against them
  let exported = 0;
  for (const { declaration } of findAnnotated(index, AnnotationKind.Export, log)) {
    builder.addExport(fromExported(builder, declaration), declaration);
    exported++;
  }
  log.debug('Export pass complete', { declarations: exported });

  let imported = 0;
  for (const { declaration } of findAnnotated(index, AnnotationKind.Import, log)) {
    builder.addReference(fromImported(builder, declaration), declaration);
    imported++;
  }
  log.debug('Import pass complete', { declarations: imported });

  // A declaration carrying several relations is resolved once
  const visited = new Set<Declaration>();
  for (const kind of MIXIN_RELATION_KINDS) {
    for (const { declaration } of findAnnotated(index, kind, log)) {
      if (visited.has(declaration)) {
        continue;
      }
      visited.add(declaration);
      for (const member of fromMixin(builder, declaration)) {
        builder.addReference(member, declaration);
      }
    }
  }
  log.debug('Mixin pass complete', { declarations: visited.size });

  for (const conflict of builder.conflicts) {
    if (conflict.member.name === CONSTRUCTOR_MARKER) {
      log.warn('Ambiguous constructor mapping, keeping the first export', {
        member: conflict.member.toString(),
        kept: conflict.kept.name,
        ignored: conflict.ignored.name,
      });
    } else {
      log.debug('Duplicate export identity, keeping the first export', {
        member: conflict.member.toString(),
        kept: conflict.kept.name,
        ignored: conflict.ignored.name,
      });
    }
  }

  const state = builder.finalize();
  log.debug('Cross-reference state built', {
    ...state.counts(),
    durationMs: Date.now() - started,
  });
  return state;
}

/**
 * Read one annotation kind from the index. A failing index contributes no
 * declarations for that kind.
 */
function findAnnotated(
  index: DeclarationIndex,
  kind: MemberAnnotationKind,
  log: ChildLogger
): AnnotatedDeclaration[] {
  try {
    return [...index.findAnnotated(kind)];
  } catch (error) {
    log.warn('Declaration index failed, treating kind as empty', {
      kind,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}
