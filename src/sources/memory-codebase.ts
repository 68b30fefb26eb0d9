/**
 * Mirror Xref - Memory Codebase
 * @module sources/memory-codebase
 *
 * Mutable in-memory declaration index. Every mutation bumps the
 * modification counter, which invalidates cached cross-reference states.
 */

import { isMemberAnnotationKind } from '../xref/types.js';
import type {
  AnnotatedDeclaration,
  Codebase,
  Declaration,
  MemberAnnotationKind,
  TypeAnnotationKind,
  TypeRef,
} from '../xref/types.js';

// ============================================================================
// Types
// ============================================================================

export type MemberKind = 'field' | 'method' | 'constructor';

export type MemberAnnotations = Partial<Record<MemberAnnotationKind, string>>;

export interface TypeAnnotations {
  implements?: string;
  mixin?: string;
  mixins?: readonly string[];
}

export interface MemberInit {
  /** Defaults to the type name for constructors */
  name?: string;
  kind?: MemberKind;
  static?: boolean;
  annotations?: MemberAnnotations;
}

export interface TypeInit {
  name: string;
  annotations?: TypeAnnotations;
  members?: MemberInit[];
}

export type ChangeEvent =
  | { type: 'type-added' | 'type-removed'; typeName: string }
  | { type: 'member-added' | 'member-removed' | 'annotation-changed'; typeName: string; memberName: string }
  | { type: 'type-annotation-changed'; typeName: string };

// ============================================================================
// Declarations
// ============================================================================

export class MemoryDeclaration implements Declaration {
  readonly name: string;
  readonly kind: MemberKind;
  private readonly staticMember: boolean;
  private readonly annotations = new Map<MemberAnnotationKind, string>();

  constructor(
    private readonly owner: MemoryType,
    init: MemberInit
  ) {
    this.kind = init.kind ?? 'method';
    this.name = init.name ?? (this.kind === 'constructor' ? owner.name() : '');
    this.staticMember = this.kind !== 'constructor' && (init.static ?? false);

    for (const [kind, argument] of Object.entries(init.annotations ?? {})) {
      if (isMemberAnnotationKind(kind) && argument !== undefined) {
        this.annotations.set(kind, argument);
      }
    }
  }

  getAnnotationArgument(kind: MemberAnnotationKind): string | undefined {
    return this.annotations.get(kind);
  }

  isStatic(): boolean {
    return this.staticMember;
  }

  owningType(): MemoryType | undefined {
    return this.owner.isAttached() ? this.owner : undefined;
  }

  /**
   * Set or clear (`undefined`) an annotation argument
   */
  setAnnotation(kind: MemberAnnotationKind, argument: string | undefined): void {
    if (argument === undefined) {
      this.annotations.delete(kind);
    } else {
      this.annotations.set(kind, argument);
    }
    this.owner.notify({
      type: 'annotation-changed',
      typeName: this.owner.name(),
      memberName: this.name,
    });
  }
}

// ============================================================================
// Types
// ============================================================================

export class MemoryType implements TypeRef {
  private readonly typeName: string;
  private readonly members: MemoryDeclaration[] = [];
  private annotations: TypeAnnotations;
  private attached = true;

  constructor(
    private readonly codebase: MemoryCodebase,
    init: TypeInit
  ) {
    this.typeName = init.name;
    this.annotations = { ...init.annotations };
    for (const member of init.members ?? []) {
      this.members.push(new MemoryDeclaration(this, member));
    }
  }

  name(): string {
    return this.typeName;
  }

  annotationArgument(kind: TypeAnnotationKind): string | undefined {
    return this.annotations[kind];
  }

  annotationArguments(kind: 'mixins'): readonly string[] | undefined {
    return this.annotations[kind];
  }

  constructors(): readonly MemoryDeclaration[] {
    return this.members.filter((member) => member.kind === 'constructor');
  }

  getMembers(): readonly MemoryDeclaration[] {
    return this.members;
  }

  getMember(name: string): MemoryDeclaration | undefined {
    return this.members.find((member) => member.name === name);
  }

  addMember(init: MemberInit): MemoryDeclaration {
    const member = new MemoryDeclaration(this, init);
    this.members.push(member);
    this.notify({ type: 'member-added', typeName: this.typeName, memberName: member.name });
    return member;
  }

  removeMember(member: MemoryDeclaration): boolean {
    const index = this.members.indexOf(member);
    if (index === -1) {
      return false;
    }
    this.members.splice(index, 1);
    this.notify({ type: 'member-removed', typeName: this.typeName, memberName: member.name });
    return true;
  }

  /**
   * Replace the type-level annotations
   */
  setAnnotations(annotations: TypeAnnotations): void {
    this.annotations = { ...annotations };
    this.notify({ type: 'type-annotation-changed', typeName: this.typeName });
  }

  isAttached(): boolean {
    return this.attached;
  }

  /** @internal */
  detach(): void {
    this.attached = false;
  }

  /** @internal */
  notify(event: ChangeEvent): void {
    if (this.attached) {
      this.codebase.touch(event);
    }
  }
}

// ============================================================================
// Codebase
// ============================================================================

/**
 * In-memory codebase
 *
 * Usage:
 * ```typescript
 * const codebase = new MemoryCodebase();
 * const player = codebase.addType({ name: 'Player', annotations: { implements: 'Player' } });
 * player.addMember({ name: 'health', kind: 'field', annotations: { export: 'health' } });
 * const state = buildState(codebase);
 * ```
 */
export class MemoryCodebase implements Codebase {
  private readonly typeList: MemoryType[] = [];
  private count = 0;
  private changeListeners = new Set<(event: ChangeEvent, modificationCount: number) => void>();

  constructor(types: TypeInit[] = []) {
    for (const init of types) {
      this.typeList.push(new MemoryType(this, init));
    }
  }

  get modificationCount(): number {
    return this.count;
  }

  *findAnnotated(kind: MemberAnnotationKind): Iterable<AnnotatedDeclaration> {
    if (!isMemberAnnotationKind(kind)) {
      return;
    }
    for (const type of this.typeList) {
      for (const declaration of type.getMembers()) {
        const argument = declaration.getAnnotationArgument(kind);
        if (argument !== undefined) {
          yield { argument, declaration };
        }
      }
    }
  }

  types(): readonly MemoryType[] {
    return this.typeList;
  }

  getType(name: string): MemoryType | undefined {
    return this.typeList.find((type) => type.name() === name);
  }

  addType(init: TypeInit): MemoryType {
    const type = new MemoryType(this, init);
    this.typeList.push(type);
    this.touch({ type: 'type-added', typeName: init.name });
    return type;
  }

  removeType(type: MemoryType): boolean {
    const index = this.typeList.indexOf(type);
    if (index === -1) {
      return false;
    }
    this.typeList.splice(index, 1);
    this.touch({ type: 'type-removed', typeName: type.name() });
    type.detach();
    return true;
  }

  /**
   * Declarations named `memberName` in types named `typeName`
   */
  findDeclarations(typeName: string, memberName: string): MemoryDeclaration[] {
    return this.typeList
      .filter((type) => type.name() === typeName)
      .flatMap((type) => type.getMembers().filter((member) => member.name === memberName));
  }

  /**
   * Record a change to the snapshot
   */
  touch(event: ChangeEvent): void {
    this.count++;
    for (const listener of this.changeListeners) {
      listener(event, this.count);
    }
  }

  /**
   * Add change listener, returning its unsubscribe function
   */
  onChange(callback: (event: ChangeEvent, modificationCount: number) => void): () => void {
    this.changeListeners.add(callback);
    return () => {
      this.changeListeners.delete(callback);
    };
  }
}

/**
 * Create a memory codebase from type descriptions
 */
export function createMemoryCodebase(types: TypeInit[] = []): MemoryCodebase {
  return new MemoryCodebase(types);
}
