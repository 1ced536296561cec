import { Request } from 'express';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { logger } from './logging.js';
import { SchemaValidationError } from '../errors/index.js';

/**
 * Validation helpers
 *
 * Centralized request validation using Zod schemas. Controllers call
 * validateRequest() inside their try block so failures flow to the error
 * handler as a 400.
 */

export type ValidationTarget = 'body' | 'query' | 'params';

export interface FormattedIssue {
  field: string;
  message: string;
  code: string;
}

export function formatZodIssues(error: ZodError): FormattedIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parse a request property with a Zod schema
 *
 * @example
 * ```typescript
 * const { id } = validateRequest(req, entityIdParamSchema, 'params');
 * ```
 */
export function validateRequest<T>(
  req: Request,
  schema: ZodType<T, ZodTypeDef, unknown>,
  target: ValidationTarget = 'body'
): T {
  const result = schema.safeParse(req[target]);
  if (result.success) {
    return result.data;
  }

  const issues = formatZodIssues(result.error);

  logger.warn('Request validation failed', {
    target,
    errors: issues,
    path: req.path,
    method: req.method,
  });

  const first = issues[0];
  throw new SchemaValidationError(
    issues.map(issue => ({ path: issue.field, message: issue.message })),
    first ? first.message : 'Validation failed',
    { operation: `validate:${target}` }
  );
}
