/**
 * Navigation markers
 *
 * Presentation model for a navigation gutter: which way a marker points,
 * its targets, its tooltip and a container label per target. Rendering is
 * left to the host.
 *
 * @module xref/navigation
 */

import {
  ANNOTATION_LABELS,
  AnnotationKind,
  RELEVANT_ANNOTATION_KINDS,
  isMemberAnnotationKind,
} from './types.js';
import type { Declaration } from './types.js';
import { exportsReferencing, referencesOf } from './query.js';
import type { CrossReferenceState } from './state.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * `reference` markers sit on exports, `export` markers on imports and mixins
 */
export type NavigationDirection = 'reference' | 'export';

export interface NavigationTarget {
  declaration: Declaration;
  /** e.g. `Copy (in RSPlayerMixin)` */
  containerText: string;
}

export interface NavigationMarker {
  /** Annotation the marker is attached to */
  kind: AnnotationKind;
  direction: NavigationDirection;
  targets: NavigationTarget[];
  tooltip: string;
}

// ============================================================================
// MARKERS
// ============================================================================

/**
 * Label of the first relevant annotation a declaration carries
 */
export function annotationLabel(declaration: Declaration): string | undefined {
  for (const kind of RELEVANT_ANNOTATION_KINDS) {
    if (declaration.getAnnotationArgument(kind) !== undefined) {
      return ANNOTATION_LABELS[kind];
    }
  }
  return undefined;
}

export function containerText(declaration: Declaration): string {
  const parts: string[] = [];
  const label = annotationLabel(declaration);
  if (label) {
    parts.push(label);
  }
  const owner = declaration.owningType();
  if (owner) {
    parts.push(`(in ${owner.name()})`);
  }
  return parts.join(' ');
}

export function tooltipText(direction: NavigationDirection, count: number): string {
  return count === 1 ? `Navigate to ${direction}` : `Navigate to ${count} ${direction}s`;
}

/**
 * Marker for `declaration` positioned on an annotation of `kind`, or
 * undefined when there is nothing to navigate to
 */
export function createNavigationMarker(
  state: CrossReferenceState,
  declaration: Declaration,
  kind: AnnotationKind
): NavigationMarker | undefined {
  if (!isMemberAnnotationKind(kind)) {
    return undefined;
  }

  const direction: NavigationDirection = kind === AnnotationKind.Export ? 'reference' : 'export';
  const declarations =
    direction === 'reference'
      ? exportsReferencing(state, declaration)
      : referencesOf(state, declaration);

  if (declarations.length === 0) {
    return undefined;
  }

  return {
    kind,
    direction,
    targets: declarations.map((target) => ({
      declaration: target,
      containerText: containerText(target),
    })),
    tooltip: tooltipText(direction, declarations.length),
  };
}

/**
 * One marker per relevant annotation the declaration carries
 */
export function collectNavigationMarkers(
  state: CrossReferenceState,
  declaration: Declaration
): NavigationMarker[] {
  const markers: NavigationMarker[] = [];
  for (const kind of RELEVANT_ANNOTATION_KINDS) {
    if (declaration.getAnnotationArgument(kind) === undefined) {
      continue;
    }
    const marker = createNavigationMarker(state, declaration, kind);
    if (marker) {
      markers.push(marker);
    }
  }
  return markers;
}
