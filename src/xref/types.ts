/**
 * Mirror Xref - Core Types
 *
 * Annotation kinds and the Declaration Index contract consumed by the
 * resolution engine. The engine never parses source text; hosts supply
 * declarations through these interfaces.
 *
 * @module xref/types
 */

// ============================================================================
// ANNOTATION KINDS
// ============================================================================

/**
 * Closed set of annotation kinds the engine understands
 */
export const AnnotationKind = {
  Export: 'export',
  Import: 'import',
  Copy: 'copy',
  FieldHook: 'fieldHook',
  MethodHook: 'methodHook',
  Replace: 'replace',
  Shadow: 'shadow',
  Implements: 'implements',
  Mixin: 'mixin',
  Mixins: 'mixins',
} as const;

export type AnnotationKind = (typeof AnnotationKind)[keyof typeof AnnotationKind];

/**
 * Annotations placed on fields, methods and constructors
 */
export type MemberAnnotationKind = Extract<
  AnnotationKind,
  'export' | 'import' | 'copy' | 'fieldHook' | 'methodHook' | 'replace' | 'shadow'
>;

/**
 * Annotations placed on types, each carrying a single type name
 */
export type TypeAnnotationKind = Extract<AnnotationKind, 'implements' | 'mixin'>;

export type MixinRelationKind = Extract<
  MemberAnnotationKind,
  'copy' | 'fieldHook' | 'methodHook' | 'replace' | 'shadow'
>;

/**
 * Mixin relations in priority order; the first one present names the member
 */
export const MIXIN_RELATION_KINDS: readonly MixinRelationKind[] = [
  AnnotationKind.Copy,
  AnnotationKind.FieldHook,
  AnnotationKind.MethodHook,
  AnnotationKind.Replace,
  AnnotationKind.Shadow,
];

/**
 * Member annotations that take part in navigation, in display priority order
 */
export const RELEVANT_ANNOTATION_KINDS: readonly MemberAnnotationKind[] = [
  AnnotationKind.Import,
  AnnotationKind.Export,
  ...MIXIN_RELATION_KINDS,
];

/**
 * Short labels used when presenting a declaration
 */
export const ANNOTATION_LABELS: Record<MemberAnnotationKind, string> = {
  export: 'Export',
  import: 'Import',
  copy: 'Copy',
  fieldHook: 'FieldHook',
  methodHook: 'MethodHook',
  replace: 'Replace',
  shadow: 'Shadow',
};

export function isMemberAnnotationKind(value: unknown): value is MemberAnnotationKind {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ANNOTATION_LABELS, value);
}

export function isMixinRelationKind(value: unknown): value is MixinRelationKind {
  return MIXIN_RELATION_KINDS.some((kind) => kind === value);
}

// ============================================================================
// IDENTITY CONSTANTS
// ============================================================================

/** Location used for statically scoped members */
export const STATIC_LOCATION = '<static>';

/** Member name that designates a constructor */
export const CONSTRUCTOR_MARKER = '<init>';

/** Prefix marking a type as the mirror of an external API type */
export const MIRROR_PREFIX = 'RS';

// ============================================================================
// DECLARATION INDEX CONTRACT
// ============================================================================

/**
 * Opaque handle to a field, method or constructor.
 *
 * Handles are compared by identity: an index must return the same object
 * for the same member within one snapshot.
 */
export interface Declaration {
  /** Display name, used for sorting navigation targets */
  readonly name: string;
  getAnnotationArgument(kind: MemberAnnotationKind): string | undefined;
  isStatic(): boolean;
  owningType(): TypeRef | undefined;
}

/**
 * Handle to a type that owns declarations
 */
export interface TypeRef {
  name(): string;
  annotationArgument(kind: TypeAnnotationKind): string | undefined;
  /** Ordered target list of the plural mixin annotation */
  annotationArguments(kind: 'mixins'): readonly string[] | undefined;
  constructors(): readonly Declaration[];
}

export interface AnnotatedDeclaration {
  /** String argument of the requested annotation */
  argument: string;
  declaration: Declaration;
}

/**
 * Source of annotated declarations for one codebase
 */
export interface DeclarationIndex {
  /**
   * All declarations carrying `kind`, in a stable order for a snapshot
   */
  findAnnotated(kind: MemberAnnotationKind): Iterable<AnnotatedDeclaration>;
}

/**
 * A declaration index whose snapshot is identified by a modification counter
 */
export interface Codebase extends DeclarationIndex {
  readonly modificationCount: number;
}
