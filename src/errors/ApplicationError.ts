/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - HTTP status code mapping
 * - Structured logging support
 *
 * Only four kinds ever leave the catalog orchestrator: ValidationError,
 * ResourceNotFoundError, UpstreamError and StoreError. The provider and
 * database classes below are raised inside clients and repositories and are
 * translated at that boundary.
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors (4xx)
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // Resource Errors (4xx)
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  // Catalog boundary (5xx)
  UPSTREAM_FAILED = 'UPSTREAM_FAILED',
  REQUEST_CANCELLED = 'REQUEST_CANCELLED',
  STORE_FAILED = 'STORE_FAILED',

  // Database Errors (5xx - operational)
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',

  // Network Errors (5xx - operational)
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',

  // Provider Errors (5xx - operational)
  PROVIDER_NOT_FOUND = 'PROVIDER_NOT_FOUND',
  PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',

  // Configuration Errors (5xx - permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'lookupArtist', 'put') */
  operation?: string;

  /** Entity type being operated on (e.g., 'artist', 'album') */
  entityType?: string;

  /** Entity ID if applicable */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors in the service should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * HTTP status code for API responses
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether repeating the same call could succeed
   */
  public readonly retryable: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Timestamp when error was created
   */
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
    super(message, options.cause ? { cause: options.cause } : undefined);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
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
      cause: this.cause instanceof Error ? {
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
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, 400, {
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
      { ...context, metadata: { ...context?.metadata, errors } }
    );
  }
}

// ============================================
// RESOURCE ERRORS (4xx - Client Error)
// ============================================

export class ResourceNotFoundError extends ApplicationError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `${resourceType} not found: ${resourceId}`,
      ErrorCode.RESOURCE_NOT_FOUND,
      404,
      {
        isOperational: true,
        retryable: false,
        context: { ...context, entityType: resourceType, entityId: resourceId },
        ...(cause && { cause }),
      }
    );
  }
}

// ============================================
// CATALOG BOUNDARY ERRORS (5xx)
// ============================================

/**
 * The primary provider failed for a reason other than "does not exist"
 */
export class UpstreamError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.UPSTREAM_FAILED, 502, {
      isOperational: true,
      retryable: true,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * The caller abandoned the request before it completed
 */
export class RequestCancelledError extends UpstreamError {
  public override readonly code = ErrorCode.REQUEST_CANCELLED;

  constructor(message = 'Request cancelled', context?: ErrorContext, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * The repository could not read or write a record
 */
export class StoreError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.STORE_FAILED, 500, {
      isOperational: true,
      retryable: true,
      ...(context && { context }),
      ...(cause && { cause }),
    });
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

export class NetworkError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      503,
      true,
      { ...context, metadata: { ...context?.metadata, url } },
      cause
    );
  }
}

// Provider Errors
export class ProviderError extends OperationalError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      statusCode,
      retryable,
      { ...context, service: providerName },
      cause
    );
  }
}

/**
 * The provider answered that the requested entity does not exist
 */
export class ProviderNotFoundError extends ProviderError {
  constructor(
    providerName: string,
    public readonly resourceId: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `${providerName} has no entry for: ${resourceId}`,
      providerName,
      ErrorCode.PROVIDER_NOT_FOUND,
      404,
      false,
      { ...context, entityId: resourceId },
      cause
    );
  }
}

export class RateLimitError extends ProviderError {
  constructor(
    providerName: string,
    public readonly retryAfter?: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Rate limit exceeded for provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_RATE_LIMIT,
      429,
      true,
      { ...context, metadata: { ...context?.metadata, retryAfter } },
      cause
    );
  }
}

export class ProviderServerError extends ProviderError {
  constructor(
    providerName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Provider server error (${httpStatusCode}): ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_SERVER_ERROR,
      httpStatusCode >= 500 ? 502 : httpStatusCode,
      httpStatusCode >= 500, // 5xx are retryable, 4xx are not
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(
    providerName: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Provider unavailable: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_UNAVAILABLE,
      503,
      true,
      context,
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (5xx - Not Retryable)
// ============================================

export class ConfigurationError extends ApplicationError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      500,
      {
        isOperational: false,
        retryable: false,
        context: { ...context, metadata: { ...context?.metadata, configKey } },
      }
    );
  }
}
