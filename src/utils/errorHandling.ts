/**
 * Helpers for `catch (error)` blocks, where the caught value is `unknown`
 */

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'An unknown error occurred';
}

/**
 * The caught value as an Error, for use as a `cause`
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Log fields for a caught value, merged with the caller's own fields
 */
export function createErrorLogContext(
  error: unknown,
  fields: Record<string, unknown> = {}
): Record<string, unknown> {
  const context: Record<string, unknown> = { error: getErrorMessage(error) };
  if (error instanceof Error) {
    context.errorName = error.name;
    if (error.cause instanceof Error) {
      context.cause = error.cause.message;
    }
  }
  return { ...context, ...fields };
}
