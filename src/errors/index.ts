/**
 * Error exports. Import errors from here, not from ApplicationError.ts.
 */

export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// What callers of the catalog orchestrator can receive
export {
  ValidationError,
  SchemaValidationError,
  ResourceNotFoundError,
  UpstreamError,
  RequestCancelledError,
  StoreError,
} from './ApplicationError.js';

// Raised inside provider clients and repositories
export {
  OperationalError,
  DatabaseError,
  NetworkError,
  ProviderError,
  ProviderNotFoundError,
  RateLimitError,
  ProviderServerError,
  ProviderUnavailableError,
} from './ApplicationError.js';

export { ConfigurationError } from './ApplicationError.js';
