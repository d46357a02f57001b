/**
 * Error types and codes for unitcheck.
 * Every error the engine raises on purpose extends UnitcheckError.
 */

/**
 * Base error class for all unitcheck errors.
 */
export class UnitcheckError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'UnitcheckError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Invalid run configuration: suppression text, target version, output
 * format, config file. Raised before any analysis runs.
 */
export class ConfigError extends UnitcheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * The loader could not resolve the requested paths. Fatal for the whole run.
 */
export class LoadError extends UnitcheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'LoadError';
  }
}

/**
 * A checker failed internally. Never escapes the runner; used to describe
 * the failure on the logging side channel.
 */
export class CheckerError extends UnitcheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CheckerError';
  }
}

export const ErrorCodes = {
  // Configuration errors
  MALFORMED_SUPPRESSION: 'C001',
  INVALID_TARGET_VERSION: 'C002',
  UNKNOWN_FORMAT: 'C003',
  DUPLICATE_CHECKER: 'C004',
  CONFIG_LOAD_ERROR: 'C005',
  INVALID_CONFIG: 'C006',

  // Load errors
  PATH_NOT_FOUND: 'L001',
  LOADER_FAILED: 'L002',

  // Checker errors
  CHECKER_FAILED: 'K001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
