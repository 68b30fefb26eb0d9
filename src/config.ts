/**
 * Mirror Xref - Configuration
 *
 * Loads and validates configuration from various sources:
 * - .xrefrc.json
 * - .xrefrc
 * - xref.config.js / xref.config.mjs
 * - package.json "xref" field
 *
 * @module config
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { ConfigError } from './utils/errors.js';
import { isLogLevel, logger, type LogLevel } from './utils/logger.js';
import { MIRROR_PREFIX } from './xref/types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface XrefConfig {
  /** Prefix marking mirror types, stripped to find the external type name */
  mirrorPrefix?: string;

  /** Manifest discovery */
  manifests?: {
    /** Glob patterns for manifest files */
    include?: string[];
    /** Gitignore-style patterns to skip */
    ignore?: string[];
  };

  /** State cache */
  cache?: {
    /** Reuse the built state until the codebase changes */
    enabled?: boolean;
  };

  /** Minimum log level */
  logLevel?: LogLevel;
}

export interface ResolvedConfig {
  mirrorPrefix: string;
  manifests: {
    include: string[];
    ignore: string[];
  };
  cache: {
    enabled: boolean;
  };
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  mirrorPrefix: MIRROR_PREFIX,
  manifests: {
    include: ['**/*.xref.json'],
    ignore: ['node_modules/**', 'dist/**'],
  },
  cache: {
    enabled: true,
  },
  logLevel: 'info',
};

// ============================================================================
// CONFIG LOADER
// ============================================================================

/**
 * Configuration file names to search for (in order of priority)
 */
const CONFIG_FILES = ['.xrefrc.json', '.xrefrc', 'xref.config.js', 'xref.config.mjs'];

/**
 * Load configuration from a project root
 *
 * @param projectRoot - Project root directory
 * @returns Merged configuration with defaults
 * @throws ConfigError when a config file exists but cannot be loaded
 */
export async function loadConfig(projectRoot: string): Promise<ResolvedConfig> {
  const resolvedRoot = path.resolve(projectRoot);

  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(resolvedRoot, configFile);

    if (fs.existsSync(configPath)) {
      const config = await loadConfigFile(configPath);
      logger.debug('Config loaded', { path: configPath });
      return mergeConfig(config);
    }
  }

  const packageJsonPath = path.join(resolvedRoot, 'package.json');
  if (fs.existsSync(packageJsonPath)) {
    let packageJson: unknown;
    try {
      packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    } catch (error) {
      // A broken package.json belongs to the project, not to us
      logger.debug('package.json not readable, using defaults', {
        error: error instanceof Error ? error.message : String(error),
      });
      packageJson = undefined;
    }
    if (isObject(packageJson) && packageJson.xref !== undefined) {
      return mergeConfig(toXrefConfig(packageJson.xref, 'package.json#xref'));
    }
  }

  return mergeConfig({});
}

/**
 * Load a specific config file
 */
async function loadConfigFile(configPath: string): Promise<XrefConfig> {
  const ext = path.extname(configPath);
  const source = path.basename(configPath);

  try {
    if (ext === '.json' || configPath.endsWith('.xrefrc')) {
      const content = fs.readFileSync(configPath, 'utf-8');
      return toXrefConfig(JSON.parse(content), source);
    }

    if (ext === '.js' || ext === '.mjs') {
      const fileUrl = pathToFileURL(configPath).href;
      const imported: unknown = await import(fileUrl);
      const exported =
        isObject(imported) && imported.default !== undefined ? imported.default : imported;
      return toXrefConfig(exported, source);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Failed to load ${source}`, {
      cause: error instanceof Error ? error : undefined,
      technical: { path: configPath },
    });
  }

  throw new ConfigError(`Unsupported config file format: ${ext}`);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Check the shape of raw configuration data
 */
function toXrefConfig(raw: unknown, source: string): XrefConfig {
  if (!isObject(raw)) {
    throw new ConfigError(`${source} must contain an object`);
  }

  const config: XrefConfig = {};
  const errors: string[] = [];

  const { mirrorPrefix, logLevel } = raw;
  if (mirrorPrefix !== undefined) {
    if (typeof mirrorPrefix === 'string') {
      config.mirrorPrefix = mirrorPrefix;
    } else {
      errors.push('mirrorPrefix must be a string');
    }
  }

  const manifests = raw.manifests;
  if (manifests !== undefined) {
    if (!isObject(manifests)) {
      errors.push('manifests must be an object');
    } else {
      const { include, ignore } = manifests;
      config.manifests = {};
      if (include !== undefined) {
        if (isStringArray(include)) config.manifests.include = include;
        else errors.push('manifests.include must be an array of strings');
      }
      if (ignore !== undefined) {
        if (isStringArray(ignore)) config.manifests.ignore = ignore;
        else errors.push('manifests.ignore must be an array of strings');
      }
    }
  }

  const cache = raw.cache;
  if (cache !== undefined) {
    const enabled = isObject(cache) ? cache.enabled : null;
    if (enabled === undefined) {
      config.cache = {};
    } else if (typeof enabled === 'boolean') {
      config.cache = { enabled };
    } else {
      errors.push('cache.enabled must be a boolean');
    }
  }

  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      errors.push('logLevel must be one of debug, info, warn, error');
    }
  }

  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration in ${source}`, {
      userMessage: errors.map((error) => `  • ${error}`).join('\n'),
      technical: { errors },
    });
  }
  return config;
}

/**
 * Merge user config with defaults. Ignore patterns are added to the
 * defaults; everything else replaces them.
 */
export function mergeConfig(userConfig: XrefConfig): ResolvedConfig {
  return {
    mirrorPrefix: userConfig.mirrorPrefix ?? DEFAULT_CONFIG.mirrorPrefix,
    manifests: {
      include: userConfig.manifests?.include ?? [...DEFAULT_CONFIG.manifests.include],
      ignore: [...DEFAULT_CONFIG.manifests.ignore, ...(userConfig.manifests?.ignore ?? [])],
    },
    cache: {
      enabled: userConfig.cache?.enabled ?? DEFAULT_CONFIG.cache.enabled,
    },
    logLevel: userConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: XrefConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.mirrorPrefix !== undefined && config.mirrorPrefix.length === 0) {
    errors.push('mirrorPrefix must not be empty');
  }

  if (config.manifests?.include !== undefined && config.manifests.include.length === 0) {
    errors.push('manifests.include must list at least one pattern');
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    errors.push('logLevel must be one of debug, info, warn, error');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Generate a default config file
 */
export function generateDefaultConfig(): string {
  return JSON.stringify(
    {
      mirrorPrefix: DEFAULT_CONFIG.mirrorPrefix,
      manifests: {
        include: DEFAULT_CONFIG.manifests.include,
        ignore: [],
      },
      cache: {
        enabled: true,
      },
      logLevel: DEFAULT_CONFIG.logLevel,
    },
    null,
    2
  );
}
