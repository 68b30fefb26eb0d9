/**
 * Mirror Xref - Sources Module
 * @module sources
 *
 * Declaration indexes the resolver can run over.
 */

export {
  MemoryCodebase,
  MemoryDeclaration,
  MemoryType,
  createMemoryCodebase,
  type ChangeEvent,
  type MemberAnnotations,
  type MemberInit,
  type MemberKind,
  type TypeAnnotations,
  type TypeInit,
} from './memory-codebase.js';

export {
  loadManifests,
  parseManifest,
  type ManifestLoadOptions,
  type ManifestLoadResult,
} from './manifest-source.js';
