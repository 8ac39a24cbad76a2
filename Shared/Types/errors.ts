/**
 * Base error class for all Mender services.
 * Provides a consistent error pattern with code and details.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid run options, task definition or environment config.
 * Raised before any episode is started.
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * The code generator could not produce a candidate: provider unreachable,
 * rate limited, timed out, or returned an unusable response.
 * The underlying cause is kept in `details` for logging only.
 */
export class GenerationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'GENERATION_ERROR', details);
    this.name = 'GenerationError';
  }
}

/**
 * Episode history could not be written or read, or a record would break
 * the append-only ordering of an episode.
 */
export class HistoryError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'HISTORY_ERROR', details);
    this.name = 'HistoryError';
  }
}

/** Human-readable message for any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
