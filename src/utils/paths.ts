/**
 * Mirror Xref - Path Utilities
 * @module utils/paths
 *
 * Consistent path handling across platforms.
 */

import { statSync } from 'node:fs';
import { sep } from 'node:path';
import ignoreModule, { type Ignore } from 'ignore';

// CommonJS package: the factory is exposed as `default` on module.exports
const ignore = ignoreModule.default;

// =============================================================================
// Path Normalization
// =============================================================================

/**
 * Normalize path separators to forward slashes (Unix-style)
 */
export function normalizePath(path: string): string {
  return path.split(sep).join('/');
}

// =============================================================================
// Gitignore Handling
// =============================================================================

/**
 * Create an ignore instance from patterns
 */
export function createIgnoreFilter(patterns: string[]): Ignore {
  return ignore().add(patterns);
}

/**
 * Patterns always skipped when scanning for manifests
 */
export const DEFAULT_IGNORE_PATTERNS = ['node_modules/', 'dist/', '.git/', 'coverage/'];

// =============================================================================
// Path Validation
// =============================================================================

export function isDirectory(dirPath: string): boolean {
  try {
    return statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}
