/**
 * Mirror Xref
 *
 * Resolves cross-references between an external API surface whose members
 * are exported under stable names and the declarations that import those
 * members or mix behavior into their owning types.
 *
 * @packageDocumentation
 * @module mirror-xref
 *
 * @example Quick Start
 * ```ts
 * import { CrossReferenceResolver, MemoryCodebase } from 'mirror-xref';
 *
 * const codebase = new MemoryCodebase([
 *   { name: 'Client', members: [{ name: 'health', kind: 'field', static: true, annotations: { export: 'health' } }] },
 *   { name: 'RSPlayer', members: [{ name: 'getHealth', annotations: { import: 'health' } }] },
 * ]);
 *
 * const resolver = new CrossReferenceResolver({ codebase });
 * const [getHealth] = codebase.findDeclarations('RSPlayer', 'getHealth');
 * resolver.referencesOf(getHealth); // [Client.health]
 * ```
 */

// Resolution engine
export * from './xref/index.js';

// Declaration sources
export * from './sources/index.js';

// Resolver facade
export {
  CrossReferenceResolver,
  openProject,
  type OpenedProject,
  type ResolverOptions,
  type ResolverSummary,
} from './resolver.js';

// Configuration
export {
  DEFAULT_CONFIG,
  generateDefaultConfig,
  loadConfig,
  mergeConfig,
  validateConfig,
  type ResolvedConfig,
  type XrefConfig,
} from './config.js';

// Utilities
export {
  XrefError,
  ConfigError,
  ManifestError,
  LookupError,
  CacheError,
  ErrorCodes,
  isXrefError,
  wrapError,
  logger,
  createLogger,
  type ErrorCode,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './utils/index.js';
