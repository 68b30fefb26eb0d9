/**
 * Query API
 *
 * Read-only lookups against a published CrossReferenceState. Unresolved
 * declarations produce empty results, never errors.
 *
 * @module xref/query
 */

import { AnnotationKind, MIXIN_RELATION_KINDS } from './types.js';
import type { Declaration } from './types.js';
import { resolveExport } from './identity.js';
import type { CrossReferenceState } from './state.js';

/**
 * Whether a declaration is the target side of navigation (import or mixin)
 */
export function isReferencing(declaration: Declaration): boolean {
  if (declaration.getAnnotationArgument(AnnotationKind.Import) !== undefined) {
    return true;
  }
  return MIXIN_RELATION_KINDS.some(
    (kind) => declaration.getAnnotationArgument(kind) !== undefined
  );
}

export function isExporting(declaration: Declaration): boolean {
  return declaration.getAnnotationArgument(AnnotationKind.Export) !== undefined;
}

/**
 * Sort declarations by display name. Ties keep their recorded order.
 */
export function sortByDisplayName(declarations: readonly Declaration[]): Declaration[] {
  return [...declarations].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Declarations that import or mix into the export declared by `declaration`
 */
export function exportsReferencing(
  state: CrossReferenceState,
  declaration: Declaration
): Declaration[] {
  if (!isExporting(declaration)) {
    return [];
  }

  const resolution = resolveExport(declaration);
  if (!resolution) {
    return [];
  }

  const info = state.getExport(resolution.member);
  return info ? sortByDisplayName(info.references) : [];
}

/**
 * Export declarations an import or mixin declaration points at
 */
export function referencesOf(state: CrossReferenceState, declaration: Declaration): Declaration[] {
  if (!isReferencing(declaration)) {
    return [];
  }

  const targets: Declaration[] = [];
  for (const member of state.referencedBy(declaration)) {
    const info = state.getExport(member);
    if (info) {
      targets.push(info.export);
    }
  }
  return sortByDisplayName(targets);
}
