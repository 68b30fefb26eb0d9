/**
 * Mirror Xref - Error Handling
 * @module utils/errors
 *
 * XrefError hierarchy for the host layer. The resolution engine itself
 * never throws on annotation data; these errors cover configuration,
 * manifest loading, lookups and cache misuse.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCodes = {
  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',

  // Manifest errors
  MANIFEST_INVALID: 'MANIFEST_INVALID',
  MANIFEST_NOT_FOUND: 'MANIFEST_NOT_FOUND',

  // Lookup errors
  DECLARATION_NOT_FOUND: 'DECLARATION_NOT_FOUND',

  // Cache errors
  REENTRANT_BUILD: 'REENTRANT_BUILD',

  // System errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// Error Solutions
// =============================================================================

const errorSolutions: Record<ErrorCode, string> = {
  CONFIG_INVALID: 'Fix the reported fields in .xrefrc.json or run `xref config --init`.',
  MANIFEST_INVALID: 'Check the manifest against the documented format.',
  MANIFEST_NOT_FOUND: 'Verify manifests.include matches files in the project.',
  DECLARATION_NOT_FOUND: 'Use the form Type.member, e.g. `xref show RSPlayer.health`.',
  REENTRANT_BUILD: 'A state build must not read the cache it is building for.',
  INTERNAL_ERROR: 'An unexpected error occurred. Please report this issue.',
};

interface ErrorOptions {
  userMessage?: string;
  technical?: unknown;
  cause?: Error;
}

// =============================================================================
// Base Error
// =============================================================================

export class XrefError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** User-friendly error message */
  readonly userMessage: string;
  /** Technical details for debugging */
  readonly technical?: unknown;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message);
    this.name = 'XrefError';
    this.code = code;
    this.userMessage =
      options?.userMessage || `${message}\n\nFix: ${errorSolutions[code]}`;
    this.technical = options?.technical;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display
   */
  toCliOutput(): string {
    return `✗ ${this.message}\n\n${this.userMessage}`;
  }

  toJSON(): {
    code: string;
    message: string;
    userMessage: string;
    technical?: unknown;
  } {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      ...(this.technical ? { technical: this.technical } : {}),
    };
  }
}

// =============================================================================
// Specialized Error Classes
// =============================================================================

export class ConfigError extends XrefError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Errors raised while reading declaration manifests
 */
export class ManifestError extends XrefError {
  /** Manifest that failed to load */
  readonly filePath?: string;

  constructor(
    code: Extract<ErrorCode, 'MANIFEST_INVALID' | 'MANIFEST_NOT_FOUND'>,
    message: string,
    options?: ErrorOptions & { filePath?: string }
  ) {
    super(code, message, options);
    this.name = 'ManifestError';
    this.filePath = options?.filePath;
  }
}

export class LookupError extends XrefError {
  constructor(message: string, options?: ErrorOptions) {
    super('DECLARATION_NOT_FOUND', message, options);
    this.name = 'LookupError';
  }
}

export class CacheError extends XrefError {
  constructor(message: string, options?: ErrorOptions) {
    super('REENTRANT_BUILD', message, options);
    this.name = 'CacheError';
  }
}

// =============================================================================
// Error Helpers
// =============================================================================

export function isXrefError(error: unknown): error is XrefError {
  return error instanceof XrefError;
}

/**
 * Wrap an unknown error as an XrefError
 */
export function wrapError(error: unknown, context?: string): XrefError {
  if (isXrefError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new XrefError('INTERNAL_ERROR', context ? `${context}: ${message}` : message, {
    cause: error instanceof Error ? error : undefined,
    technical: error,
  });
}
