/**
 * Engine Error Handling
 *
 * Every failure that crosses the engine boundary is converted to an
 * EngineError carrying a category, so logs can tell transport faults
 * from handler and store failures.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for engine errors
 */
export type ErrorCategory =
  // Socket, parser and timeout faults, scoped to one session
  | 'TRANSPORT_ERROR'

  // A route handler threw
  | 'HANDLER_FAILURE'

  // Store errors
  | 'STORE_CORRUPTED'
  | 'STORE_IO_ERROR'

  // Input errors
  | 'VALIDATION_ERROR'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to EngineError categories.
 * StoreError is refined further by its code in fromUnknown().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  StoreError: 'STORE_IO_ERROR',
  MigrationError: 'INTERNAL_ERROR',
  SqliteError: 'STORE_IO_ERROR',
};

const STORE_CODE_TO_CATEGORY: Record<string, ErrorCategory> = {
  STORE_CORRUPTED: 'STORE_CORRUPTED',
  STORE_IO_ERROR: 'STORE_IO_ERROR',
  STORE_FOLDER_INVALID: 'STORE_CORRUPTED',
  THUMBNAIL_FOLDER_INVALID: 'STORE_CORRUPTED',
  DUPLICATE_ITEM: 'VALIDATION_ERROR',
};

/**
 * Node socket and HTTP parser codes that indicate a transport fault
 */
const TRANSPORT_CODE_PATTERN = /^(E[A-Z]+|HPE_[A-Z_]+|ERR_HTTP_[A-Z_]+|ERR_STREAM_[A-Z_]+)$/;

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function categorize(error: Error, defaultCategory: ErrorCategory): ErrorCategory {
  const code = errorCode(error);
  if (error.name === 'StoreError' && code !== undefined) {
    return STORE_CODE_TO_CATEGORY[code] ?? 'STORE_IO_ERROR';
  }
  const byName = ERROR_NAME_TO_CATEGORY[error.name];
  if (byName !== undefined) {
    return byName;
  }
  if (code !== undefined && TRANSPORT_CODE_PATTERN.test(code)) {
    return 'TRANSPORT_ERROR';
  }
  return defaultCategory;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * EngineError - Structured error class for engine failures
 */
export class EngineError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EngineError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): EngineError {
    if (error instanceof EngineError) {
      return error;
    }

    if (error instanceof Error) {
      const code = errorCode(error);
      return new EngineError(categorize(error, defaultCategory), error.message, {
        originalName: error.name,
        ...(code !== undefined && { errorCode: code }),
        stack: error.stack,
      });
    }

    return new EngineError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Wrap a value thrown by a route handler
 */
export function handlerFailure(route: string, cause: unknown): EngineError {
  const wrapped = EngineError.fromUnknown(cause, 'HANDLER_FAILURE');
  return new EngineError(wrapped.category, `Handler for ${route} failed: ${wrapped.message}`, {
    route,
    ...wrapped.details,
  });
}

/**
 * Create transport error for a socket or parser fault
 */
export function transportError(message: string, details?: Record<string, unknown>): EngineError {
  return new EngineError('TRANSPORT_ERROR', message, details);
}
