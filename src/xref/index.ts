/**
 * Mirror Xref - Resolution Engine
 *
 * Identity derivation, state building, caching and queries.
 *
 * @module xref
 */

export {
  AnnotationKind,
  ANNOTATION_LABELS,
  CONSTRUCTOR_MARKER,
  MIRROR_PREFIX,
  MIXIN_RELATION_KINDS,
  RELEVANT_ANNOTATION_KINDS,
  STATIC_LOCATION,
  isMemberAnnotationKind,
  isMixinRelationKind,
  type AnnotatedDeclaration,
  type Codebase,
  type Declaration,
  type DeclarationIndex,
  type MemberAnnotationKind,
  type MixinRelationKind,
  type TypeAnnotationKind,
  type TypeRef,
} from './types.js';

export { ExportedMember, type ExportedMemberInfo } from './exported-member.js';

export {
  fromExported,
  fromImported,
  fromMixin,
  mixinRelationName,
  mixinTargets,
  resolveExport,
  stripMirrorPrefix,
  type ExportResolution,
} from './identity.js';

export {
  CrossReferenceState,
  StateBuilder,
  type ExportConflict,
  type StateCounts,
} from './state.js';

export { buildState, type StateBuildOptions } from './state-builder.js';

export { SnapshotCache, StateCache, type SnapshotCacheStats } from './state-cache.js';

export {
  exportsReferencing,
  referencesOf,
  isExporting,
  isReferencing,
  sortByDisplayName,
} from './query.js';

export {
  annotationLabel,
  collectNavigationMarkers,
  containerText,
  createNavigationMarker,
  tooltipText,
  type NavigationDirection,
  type NavigationMarker,
  type NavigationTarget,
} from './navigation.js';
