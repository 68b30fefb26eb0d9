/**
 * Identity derivation
 *
 * Derives the ExportedMember identities a declaration exports, imports or
 * mixes into. Incomplete annotations yield no identity rather than an
 * error, since the codebase may be mid-edit.
 *
 * @module xref/identity
 */

import {
  AnnotationKind,
  CONSTRUCTOR_MARKER,
  MIXIN_RELATION_KINDS,
  STATIC_LOCATION,
} from './types.js';
import type { Declaration, TypeRef } from './types.js';
import { ExportedMember } from './exported-member.js';
import type { StateBuilder } from './state.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Result of reading an export annotation without touching any state
 */
export interface ExportResolution {
  member: ExportedMember;
  /** Set when the owning type declares the external type it implements */
  implementer?: { externalType: string; owner: TypeRef };
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Strip the mirror prefix from a type name, e.g. `RSPlayer` → `Player`
 */
export function stripMirrorPrefix(typeName: string, prefix: string): string | undefined {
  if (!typeName.startsWith(prefix)) {
    return undefined;
  }
  return typeName.slice(prefix.length);
}

/**
 * Name carried by the highest-priority mixin relation on a declaration
 */
export function mixinRelationName(declaration: Declaration): string | undefined {
  for (const kind of MIXIN_RELATION_KINDS) {
    const name = declaration.getAnnotationArgument(kind);
    if (name !== undefined) {
      return name;
    }
  }
  return undefined;
}

/**
 * External types a mixin owner targets. The singular annotation takes
 * precedence over the plural one.
 */
export function mixinTargets(owner: TypeRef): readonly string[] {
  const single = owner.annotationArgument(AnnotationKind.Mixin);
  if (single !== undefined) {
    return [single];
  }
  return owner.annotationArguments(AnnotationKind.Mixins) ?? [];
}

// ============================================================================
// DERIVATION
// ============================================================================

/**
 * Parse the export annotation. Instance exports take their location from
 * the owning type's `implements` annotation.
 */
export function resolveExport(declaration: Declaration): ExportResolution | undefined {
  const name = declaration.getAnnotationArgument(AnnotationKind.Export);
  if (name === undefined) {
    return undefined;
  }

  const owner = declaration.owningType();
  if (!owner) {
    return undefined;
  }

  const externalType = owner.annotationArgument(AnnotationKind.Implements);
  const isStatic = declaration.isStatic();
  if (externalType === undefined && !isStatic) {
    return undefined;
  }

  const location = isStatic ? STATIC_LOCATION : externalType;
  if (location === undefined) {
    return undefined;
  }

  return {
    member: ExportedMember.of(name, location),
    ...(externalType !== undefined ? { implementer: { externalType, owner } } : {}),
  };
}

/**
 * Export identity of a declaration, recording the owner as implementer of
 * its external type
 */
export function fromExported(
  state: StateBuilder,
  declaration: Declaration
): ExportedMember | undefined {
  const resolution = resolveExport(declaration);
  if (!resolution) {
    return undefined;
  }

  if (resolution.implementer) {
    state.recordImplementer(resolution.implementer.externalType, resolution.implementer.owner);
  }
  return resolution.member;
}

/**
 * Import identity of a declaration. The instance export on the mirrored
 * type is preferred; otherwise the static identity is returned whether or
 * not it exists.
 */
export function fromImported(
  state: StateBuilder,
  declaration: Declaration
): ExportedMember | undefined {
  const name = declaration.getAnnotationArgument(AnnotationKind.Import);
  if (name === undefined) {
    return undefined;
  }

  const owner = declaration.owningType();
  if (!owner) {
    return undefined;
  }

  const location = stripMirrorPrefix(owner.name(), state.mirrorPrefix);
  if (location === undefined) {
    return undefined;
  }

  const instanceMember = ExportedMember.of(name, location);
  if (state.hasExport(instanceMember)) {
    return instanceMember;
  }
  return ExportedMember.ofStatic(name);
}

/**
 * Identities a mixin declaration refers to, one per resolvable target type.
 *
 * A mixin onto a constructor registers the target's single constructor as
 * an export first, since constructors never carry an export annotation.
 */
export function fromMixin(state: StateBuilder, declaration: Declaration): ExportedMember[] {
  const name = mixinRelationName(declaration);
  if (name === undefined) {
    return [];
  }

  const owner = declaration.owningType();
  if (!owner) {
    return [];
  }

  if (declaration.isStatic()) {
    return [ExportedMember.ofStatic(name)];
  }

  const result = new Map<string, ExportedMember>();
  for (const target of mixinTargets(owner)) {
    const location = stripMirrorPrefix(target, state.mirrorPrefix);
    if (location === undefined) {
      continue;
    }

    const member = ExportedMember.of(name, location);

    if (name === CONSTRUCTOR_MARKER) {
      const constructor = singleConstructor(state.implementerOf(location));
      if (constructor) {
        state.addExport(member, constructor);
      }
    }

    if (state.hasExport(member) && !result.has(member.key)) {
      result.set(member.key, member);
    }
  }

  return [...result.values()];
}

function singleConstructor(type: TypeRef | undefined): Declaration | undefined {
  if (!type) {
    return undefined;
  }
  const constructors = type.constructors();
  return constructors.length === 1 ? constructors[0] : undefined;
}
