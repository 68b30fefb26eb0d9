/**
 * Mirror Xref - Manifest Source
 * @module sources/manifest-source
 *
 * Loads declaration manifests (JSON descriptions of annotated types and
 * members) from a project directory into a MemoryCodebase.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { ManifestError, wrapError } from '../utils/errors.js';
import { logger as rootLogger, type ChildLogger } from '../utils/logger.js';
import { DEFAULT_IGNORE_PATTERNS, createIgnoreFilter, normalizePath } from '../utils/paths.js';
import { isMemberAnnotationKind } from '../xref/types.js';
import {
  MemoryCodebase,
  type MemberAnnotations,
  type MemberInit,
  type MemberKind,
  type TypeAnnotations,
  type TypeInit,
} from './memory-codebase.js';

// ============================================================================
// Types
// ============================================================================

export interface ManifestLoadOptions {
  /** Glob patterns relative to the root */
  include: string[];
  /** Gitignore-style patterns excluded from the scan */
  ignore?: string[];
  /** Codebase to populate (default: a new one) */
  codebase?: MemoryCodebase;
  logger?: ChildLogger;
}

export interface ManifestLoadResult {
  codebase: MemoryCodebase;
  /** Manifests loaded, relative to the root, in load order */
  files: string[];
  /** Manifests that failed to read or validate */
  errors: ManifestError[];
}

const MEMBER_KINDS: readonly MemberKind[] = ['field', 'method', 'constructor'];

// ============================================================================
// Parsing
// ============================================================================

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMemberKind(value: unknown): value is MemberKind {
  return MEMBER_KINDS.some((kind) => kind === value);
}

function invalid(filePath: string, where: string, problem: string): ManifestError {
  return new ManifestError('MANIFEST_INVALID', `${filePath}: ${where} ${problem}`, { filePath });
}

function parseTypeAnnotations(value: unknown, filePath: string, where: string): TypeAnnotations {
  if (value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    throw invalid(filePath, where, 'must be an object');
  }

  const annotations: TypeAnnotations = {};
  for (const [key, argument] of Object.entries(value)) {
    if (key === 'implements' || key === 'mixin') {
      if (typeof argument !== 'string') {
        throw invalid(filePath, `${where}.${key}`, 'must be a string');
      }
      annotations[key] = argument;
    } else if (key === 'mixins') {
      if (!Array.isArray(argument) || !argument.every((item) => typeof item === 'string')) {
        throw invalid(filePath, `${where}.mixins`, 'must be an array of strings');
      }
      annotations.mixins = argument.filter((item): item is string => typeof item === 'string');
    } else {
      throw invalid(filePath, `${where}.${key}`, 'is not a type annotation');
    }
  }
  return annotations;
}

function parseMemberAnnotations(value: unknown, filePath: string, where: string): MemberAnnotations {
  if (value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    throw invalid(filePath, where, 'must be an object');
  }

  const annotations: MemberAnnotations = {};
  for (const [key, argument] of Object.entries(value)) {
    if (!isMemberAnnotationKind(key)) {
      throw invalid(filePath, `${where}.${key}`, 'is not a member annotation');
    }
    if (typeof argument !== 'string') {
      throw invalid(filePath, `${where}.${key}`, 'must be a string');
    }
    annotations[key] = argument;
  }
  return annotations;
}

function parseMember(value: unknown, filePath: string, where: string): MemberInit {
  if (!isObject(value)) {
    throw invalid(filePath, where, 'must be an object');
  }

  const kind = value.kind ?? 'method';
  if (!isMemberKind(kind)) {
    throw invalid(filePath, `${where}.kind`, `must be one of ${MEMBER_KINDS.join(', ')}`);
  }

  const rawName = value.name;
  let name: string | undefined;
  if (typeof rawName === 'string') {
    name = rawName;
  } else if (rawName !== undefined) {
    throw invalid(filePath, `${where}.name`, 'must be a string');
  } else if (kind !== 'constructor') {
    throw invalid(filePath, `${where}.name`, 'is required');
  }

  const isStatic = value.static ?? false;
  if (typeof isStatic !== 'boolean') {
    throw invalid(filePath, `${where}.static`, 'must be a boolean');
  }

  return {
    ...(name !== undefined ? { name } : {}),
    kind,
    static: isStatic,
    annotations: parseMemberAnnotations(value.annotations, filePath, `${where}.annotations`),
  };
}

function parseType(value: unknown, filePath: string, where: string): TypeInit {
  if (!isObject(value)) {
    throw invalid(filePath, where, 'must be an object');
  }
  const name = value.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw invalid(filePath, `${where}.name`, 'must be a non-empty string');
  }

  const members = value.members ?? [];
  if (!Array.isArray(members)) {
    throw invalid(filePath, `${where}.members`, 'must be an array');
  }

  return {
    name,
    annotations: parseTypeAnnotations(value.annotations, filePath, `${where}.annotations`),
    members: members.map((member, i) => parseMember(member, filePath, `${where}.members[${i}]`)),
  };
}

/**
 * Parse and validate one manifest
 *
 * @throws ManifestError when the content is not a valid manifest
 */
export function parseManifest(content: string, filePath: string): TypeInit[] {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ManifestError('MANIFEST_INVALID', `${filePath}: invalid JSON`, {
      filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const types = isObject(document) ? document.types : undefined;
  if (!Array.isArray(types)) {
    throw invalid(filePath, 'types', 'must be an array');
  }

  return types.map((type, i) => parseType(type, filePath, `types[${i}]`));
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Find manifests under `root` and load them into one codebase. Files are
 * loaded in sorted path order so declaration order is stable.
 */
export async function loadManifests(
  root: string,
  options: ManifestLoadOptions
): Promise<ManifestLoadResult> {
  const log = options.logger ?? rootLogger.child({ module: 'sources/manifest' });
  const codebase = options.codebase ?? new MemoryCodebase();
  const filter = createIgnoreFilter([...DEFAULT_IGNORE_PATTERNS, ...(options.ignore ?? [])]);

  const matches = await glob(options.include, { cwd: root, nodir: true, dot: false });
  const files = [...new Set(matches.map(normalizePath))]
    .filter((file) => !filter.ignores(file))
    .sort();

  const loaded: string[] = [];
  const errors: ManifestError[] = [];

  for (const file of files) {
    let content: string;
    try {
      content = await readFile(path.join(root, file), 'utf-8');
    } catch (error) {
      const failure = new ManifestError('MANIFEST_NOT_FOUND', `${file}: cannot be read`, {
        filePath: file,
        cause: wrapError(error),
      });
      log.warn('Manifest skipped', { path: file, reason: failure.message });
      errors.push(failure);
      continue;
    }

    try {
      for (const type of parseManifest(content, file)) {
        codebase.addType(type);
      }
      loaded.push(file);
    } catch (error) {
      const failure =
        error instanceof ManifestError
          ? error
          : new ManifestError('MANIFEST_INVALID', `${file}: ${wrapError(error).message}`, {
              filePath: file,
            });
      log.warn('Manifest skipped', { path: file, reason: failure.message });
      errors.push(failure);
    }
  }

  log.debug('Manifests loaded', { files: loaded.length, failed: errors.length });
  return { codebase, files: loaded, errors };
}
