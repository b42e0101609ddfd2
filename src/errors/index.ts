/**
 * Unified Error System Export
 *
 * All catalog errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors (4xx)
export {
  ValidationError,
  SchemaValidationError,
} from './ApplicationError.js';

// Resource errors (4xx)
export {
  ResourceError,
  ResourceInUseError,
} from './ApplicationError.js';

// Operational errors (5xx)
export {
  OperationalError,
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  FileSystemError,
} from './ApplicationError.js';

// Permanent errors (5xx - not retryable)
export {
  PermanentError,
  ConfigurationError,
} from './ApplicationError.js';
