/**
 * Cross-Reference State
 *
 * `StateBuilder` is the mutable value threaded through the build passes;
 * `finalize()` turns it into an immutable `CrossReferenceState` that can be
 * published and queried concurrently.
 *
 * @module xref/state
 */

import { MIRROR_PREFIX } from './types.js';
import type { Declaration, TypeRef } from './types.js';
import type { ExportedMember, ExportedMemberInfo } from './exported-member.js';

// ============================================================================
// TYPES
// ============================================================================

interface MutableExportInfo {
  member: ExportedMember;
  export: Declaration;
  references: Declaration[];
  referenceSet: Set<Declaration>;
}

/**
 * An export registration that lost to an earlier declaration
 */
export interface ExportConflict {
  member: ExportedMember;
  kept: Declaration;
  ignored: Declaration;
}

export interface StateCounts {
  /** Distinct exported members */
  exports: number;
  /** Declarations with at least one recorded identity */
  declarations: number;
  /** Sum of all export reference lists */
  references: number;
  /** External types with a known implementing owner */
  implementers: number;
}

// ============================================================================
// CROSS-REFERENCE STATE
// ============================================================================

/**
 * Resolved cross-reference graph for one snapshot of a codebase
 */
export class CrossReferenceState {
  private readonly exportTable: ReadonlyMap<string, ExportedMemberInfo>;
  private readonly referenceTable: ReadonlyMap<Declaration, readonly ExportedMember[]>;
  private readonly implementerTable: ReadonlyMap<string, TypeRef>;

  constructor(
    exports: ReadonlyMap<string, ExportedMemberInfo>,
    references: ReadonlyMap<Declaration, readonly ExportedMember[]>,
    implementers: ReadonlyMap<string, TypeRef>
  ) {
    this.exportTable = exports;
    this.referenceTable = references;
    this.implementerTable = implementers;
  }

  static empty(): CrossReferenceState {
    return new CrossReferenceState(new Map(), new Map(), new Map());
  }

  getExport(member: ExportedMember): ExportedMemberInfo | undefined {
    return this.exportTable.get(member.key);
  }

  hasExport(member: ExportedMember): boolean {
    return this.exportTable.has(member.key);
  }

  /**
   * Identities a declaration references or originates, in recording order
   */
  referencedBy(declaration: Declaration): readonly ExportedMember[] {
    return this.referenceTable.get(declaration) ?? [];
  }

  implementerOf(externalType: string): TypeRef | undefined {
    return this.implementerTable.get(externalType);
  }

  exports(): IterableIterator<ExportedMemberInfo> {
    return this.exportTable.values();
  }

  declarations(): IterableIterator<Declaration> {
    return this.referenceTable.keys();
  }

  counts(): StateCounts {
    let references = 0;
    for (const info of this.exportTable.values()) {
      references += info.references.length;
    }
    return {
      exports: this.exportTable.size,
      declarations: this.referenceTable.size,
      references,
      implementers: this.implementerTable.size,
    };
  }
}

// ============================================================================
// STATE BUILDER
// ============================================================================

/**
 * In-progress state for a single build
 */
export class StateBuilder {
  private readonly exportTable = new Map<string, MutableExportInfo>();
  private readonly referenceTable = new Map<Declaration, Map<string, ExportedMember>>();
  private readonly implementerTable = new Map<string, TypeRef>();
  private readonly conflictList: ExportConflict[] = [];

  constructor(readonly mirrorPrefix: string = MIRROR_PREFIX) {}

  hasExport(member: ExportedMember): boolean {
    return this.exportTable.has(member.key);
  }

  getExport(member: ExportedMember): ExportedMemberInfo | undefined {
    return this.exportTable.get(member.key);
  }

  recordImplementer(externalType: string, owner: TypeRef): void {
    this.implementerTable.set(externalType, owner);
  }

  implementerOf(externalType: string): TypeRef | undefined {
    return this.implementerTable.get(externalType);
  }

  /**
   * Register `declaration` as the export of `member`. The first declaration
   * registered for an identity is kept.
   */
  addExport(member: ExportedMember | undefined, declaration: Declaration): void {
    if (!member) {
      return;
    }

    const existing = this.exportTable.get(member.key);
    if (!existing) {
      this.exportTable.set(member.key, {
        member,
        export: declaration,
        references: [],
        referenceSet: new Set(),
      });
    } else if (existing.export !== declaration) {
      this.conflictList.push({ member, kept: existing.export, ignored: declaration });
    }
    this.recordIdentity(declaration, member);
  }

  get conflicts(): readonly ExportConflict[] {
    return this.conflictList;
  }

  /**
   * Register `declaration` as referencing `member`. Dangling identities are
   * ignored.
   */
  addReference(member: ExportedMember | undefined, declaration: Declaration): void {
    if (!member) {
      return;
    }

    const info = this.exportTable.get(member.key);
    if (!info) {
      return;
    }

    if (!info.referenceSet.has(declaration)) {
      info.referenceSet.add(declaration);
      info.references.push(declaration);
    }
    this.recordIdentity(declaration, member);
  }

  finalize(): CrossReferenceState {
    const exports = new Map<string, ExportedMemberInfo>();
    for (const [key, info] of this.exportTable) {
      exports.set(
        key,
        Object.freeze({
          member: info.member,
          export: info.export,
          references: Object.freeze([...info.references]),
        })
      );
    }

    const references = new Map<Declaration, readonly ExportedMember[]>();
    for (const [declaration, members] of this.referenceTable) {
      references.set(declaration, Object.freeze([...members.values()]));
    }

    return new CrossReferenceState(exports, references, new Map(this.implementerTable));
  }

  private recordIdentity(declaration: Declaration, member: ExportedMember): void {
    let members = this.referenceTable.get(declaration);
    if (!members) {
      members = new Map();
      this.referenceTable.set(declaration, members);
    }
    if (!members.has(member.key)) {
      members.set(member.key, member);
    }
  }
}
