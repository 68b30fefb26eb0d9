/**
 * Exported member identity
 *
 * @module xref/exported-member
 */

import { STATIC_LOCATION } from './types.js';
import type { Declaration } from './types.js';

/**
 * A unique identifier (name + location) for a logical exported member.
 *
 * Two members with the same name and location are the same entity; maps
 * and sets key them by {@link ExportedMember.key}.
 */
export class ExportedMember {
  /** Canonical key, equal for structurally equal members */
  readonly key: string;

  private constructor(
    readonly name: string,
    readonly location: string
  ) {
    this.key = JSON.stringify([location, name]);
  }

  static of(name: string, location: string): ExportedMember {
    return new ExportedMember(name, location);
  }

  static ofStatic(name: string): ExportedMember {
    return new ExportedMember(name, STATIC_LOCATION);
  }

  get isStatic(): boolean {
    return this.location === STATIC_LOCATION;
  }

  equals(other: ExportedMember): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `${this.location}.${this.name}`;
  }
}

/**
 * Bookkeeping for a single exported member
 */
export interface ExportedMemberInfo {
  readonly member: ExportedMember;
  /** The declaration that first declared this export */
  readonly export: Declaration;
  /** Declarations importing or mixing into the export, in insertion order */
  readonly references: readonly Declaration[];
}
