/**
 * Unified Error Hierarchy for the movie catalog
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Retry hints for storage failures
 * - Structured logging support
 *
 * "Not found" is never an error here: stores report it as `null` or `false`.
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors (4xx)
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',
  VALIDATION_SCHEMA_MISMATCH = 'VALIDATION_SCHEMA_MISMATCH',

  // Resource Errors (4xx)
  RESOURCE_IN_USE = 'RESOURCE_IN_USE',

  // Database Errors (5xx - operational)
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  DATABASE_DUPLICATE_KEY = 'DATABASE_DUPLICATE_KEY',
  DATABASE_FOREIGN_KEY_VIOLATION = 'DATABASE_FOREIGN_KEY_VIOLATION',
  DATABASE_TRANSACTION_FAILED = 'DATABASE_TRANSACTION_FAILED',

  // File System Errors (5xx - operational)
  FS_PERMISSION_DENIED = 'FS_PERMISSION_DENIED',

  // Configuration Errors (5xx - permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'create', 'updateLinks') */
  operation?: string;

  /** Entity type being operated on (e.g., 'movie', 'actor') */
  entityType?: string;

  /** Entity ID if applicable */
  entityId?: string | number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors in the catalog extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * HTTP-style status code, kept for callers that surface errors over a wire
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether repeating the operation may succeed
   */
  public readonly retryable: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public override readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS (4xx - Client Error)
// ============================================

export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INPUT_INVALID,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, 400, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Schema validation failed: ${errors.length} error(s)`,
      ErrorCode.VALIDATION_SCHEMA_MISMATCH,
      { ...context, metadata: { ...context?.metadata, errors } }
    );
  }
}

// ============================================
// RESOURCE ERRORS (4xx - Client Error)
// ============================================

export class ResourceError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * Rejected delete of an entity that other rows still reference,
 * e.g. an actor linked to one or more movies
 */
export class ResourceInUseError extends ResourceError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: number,
    public readonly referenceCount: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `${resourceType} ${resourceId} is linked to ${referenceCount} movie(s)`,
      ErrorCode.RESOURCE_IN_USE,
      409,
      {
        ...context,
        entityType: resourceType,
        entityId: resourceId,
        metadata: { ...context?.metadata, referenceCount },
      }
    );
  }
}

// ============================================
// OPERATIONAL ERRORS (5xx)
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// Database Errors
export class DatabaseError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATABASE_QUERY_FAILED,
    retryable = true,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, 500, retryable, context, cause);
  }
}

export class DuplicateKeyError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly key: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Duplicate key in table '${table}': ${key}`,
      ErrorCode.DATABASE_DUPLICATE_KEY,
      false, // Don't retry duplicate keys
      { ...context, metadata: { ...context?.metadata, table, key } },
      cause
    );
  }
}

export class ForeignKeyViolationError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly constraint: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Foreign key violation in table '${table}': ${constraint}`,
      ErrorCode.DATABASE_FOREIGN_KEY_VIOLATION,
      false, // Don't retry foreign key violations
      { ...context, metadata: { ...context?.metadata, table, constraint } },
      cause
    );
  }
}

// File System Errors
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      500,
      retryable,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (5xx - Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: false, // These are programmer errors
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      500,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}
