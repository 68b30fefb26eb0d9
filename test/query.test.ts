/**
 * Tests for the query API
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCodebase } from '../src/sources/memory-codebase.js';
import {
  CrossReferenceState,
  buildState,
  exportsReferencing,
  isExporting,
  isReferencing,
  referencesOf,
  sortByDisplayName,
} from '../src/xref/index.js';
import { captureLogger, member } from './helpers.js';

describe('query', () => {
  let codebase: MemoryCodebase;
  let state: CrossReferenceState;

  beforeEach(() => {
    codebase = new MemoryCodebase([
      {
        name: 'Player',
        annotations: { implements: 'Player' },
        members: [
          { name: 'health', kind: 'field', annotations: { export: 'health' } },
          { name: 'level', kind: 'field', annotations: { export: 'level' } },
          { name: 'helper' },
        ],
      },
      {
        name: 'RSPlayer',
        members: [
          { name: 'zHealth', annotations: { import: 'health' } },
          { name: 'Health', annotations: { import: 'health' } },
          { name: 'aHealth', annotations: { import: 'health' } },
        ],
      },
    ]);
    state = buildState(codebase, { logger: captureLogger().logger });
  });

  describe('exportsReferencing', () => {
    it('should return referencing declarations sorted by codepoint', () => {
      const names = exportsReferencing(state, member(codebase, 'Player', 'health')).map((d) => d.name);
      expect(names).toEqual(['Health', 'aHealth', 'zHealth']);
    });

    it('should return nothing for an export without references', () => {
      expect(exportsReferencing(state, member(codebase, 'Player', 'level'))).toEqual([]);
    });

    it('should return nothing for declarations without an export annotation', () => {
      expect(exportsReferencing(state, member(codebase, 'Player', 'helper'))).toEqual([]);
      expect(exportsReferencing(state, member(codebase, 'RSPlayer', 'aHealth'))).toEqual([]);
    });

    it('should return nothing for exports added after the state was built', () => {
      const type = codebase.getType('Player');
      const mana = type?.addMember({ name: 'mana', kind: 'field', annotations: { export: 'mana' } });

      expect(mana && exportsReferencing(state, mana)).toEqual([]);
      expect(state.implementerOf('Player')).toBe(type);
    });

    it('should not record anything in the state', () => {
      const before = state.counts();
      exportsReferencing(state, member(codebase, 'Player', 'health'));
      expect(state.counts()).toEqual(before);
    });
  });

  describe('referencesOf', () => {
    it('should return the export an import resolves to', () => {
      expect(referencesOf(state, member(codebase, 'RSPlayer', 'aHealth'))).toEqual([
        member(codebase, 'Player', 'health'),
      ]);
    });

    it('should return nothing for declarations that only export', () => {
      expect(referencesOf(state, member(codebase, 'Player', 'health'))).toEqual([]);
    });

    it('should return nothing against an empty state', () => {
      expect(referencesOf(CrossReferenceState.empty(), member(codebase, 'RSPlayer', 'aHealth'))).toEqual(
        []
      );
    });
  });

  describe('classification', () => {
    it('should classify declarations by their annotations', () => {
      expect(isExporting(member(codebase, 'Player', 'health'))).toBe(true);
      expect(isReferencing(member(codebase, 'Player', 'health'))).toBe(false);
      expect(isReferencing(member(codebase, 'RSPlayer', 'aHealth'))).toBe(true);
      expect(isExporting(member(codebase, 'Player', 'helper'))).toBe(false);
      expect(isReferencing(member(codebase, 'Player', 'helper'))).toBe(false);
    });

    it('should treat any mixin relation as referencing', () => {
      const type = codebase.addType({
        name: 'PlayerMixin',
        members: [{ name: 'onHit', annotations: { shadow: 'onHit' } }],
      });
      const onHit = type.getMember('onHit');
      expect(onHit && isReferencing(onHit)).toBe(true);
    });
  });

  describe('sortByDisplayName', () => {
    it('should keep the order of equal names', () => {
      const first = member(codebase, 'Player', 'health');
      const second = codebase.addType({ name: 'Other', members: [{ name: 'health' }] }).getMember('health');
      const input = second ? [second, first] : [];

      expect(sortByDisplayName(input)).toEqual([second, first]);
      expect(sortByDisplayName(input)[0]).toBe(second);
    });

    it('should not modify its input', () => {
      const input = [member(codebase, 'Player', 'level'), member(codebase, 'Player', 'health')];
      sortByDisplayName(input);
      expect(input.map((d) => d.name)).toEqual(['level', 'health']);
    });
  });
});
