import { z, ZodError } from 'zod';
import { SchemaValidationError, ErrorContext } from '../errors/index.js';
import { logger } from '../logging/logger.js';

/**
 * Parse `value` with `schema`, converting zod failures into SchemaValidationError
 *
 * @example
 * ```typescript
 * const name = parseOrThrow(actorNameSchema, input, { service: 'ActorStore', operation: 'create' });
 * ```
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  context: ErrorContext
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const errors = formatIssues(result.error);
  logger.warn('Store input validation failed', {
    service: context.service,
    operation: context.operation,
    errors,
  });

  throw new SchemaValidationError(
    errors,
    errors.map(err => (err.path ? `${err.path}: ${err.message}` : err.message)).join('; '),
    context
  );
}

function formatIssues(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
