import axios from 'axios';
import {
  ApplicationError,
  ErrorCode,
  NetworkError,
  ProviderNotFoundError,
  ProviderServerError,
  RateLimitError,
  RequestCancelledError,
} from '../../../errors/index.js';
import { toError } from '../../../utils/errorHandling.js';

export interface RequestDescriptor {
  /** Display name used in error messages, e.g. 'MusicBrainz' */
  providerName: string;
  /** Client class name for log context */
  service: string;
  endpoint: string;
  /** Identifier reported when the provider answers 404 */
  resourceId: string;
}

/**
 * Convert an axios failure into the provider error taxonomy.
 * Application errors raised inside a request callback pass through.
 */
export function convertToApplicationError(error: unknown, request: RequestDescriptor): Error {
  if (error instanceof ApplicationError) {
    return error;
  }

  const context = {
    service: request.service,
    operation: 'request',
    metadata: { endpoint: request.endpoint },
  };

  if (axios.isCancel(error)) {
    return new RequestCancelledError(
      `${request.providerName} request cancelled: ${request.endpoint}`,
      context,
      toError(error)
    );
  }

  if (!axios.isAxiosError(error)) {
    return toError(error);
  }

  if (error.response) {
    const status = error.response.status;
    const withStatus = { ...context, metadata: { ...context.metadata, status } };

    switch (status) {
      case 404:
        return new ProviderNotFoundError(
          request.providerName,
          request.resourceId,
          undefined,
          withStatus,
          error
        );

      case 429: {
        const retryAfter = Number.parseInt(String(error.response.headers['retry-after'] ?? ''), 10);
        return new RateLimitError(
          request.providerName,
          Number.isNaN(retryAfter) ? undefined : retryAfter,
          `${request.providerName} rate limit exceeded: ${error.message}`,
          withStatus,
          error
        );
      }

      default:
        return new ProviderServerError(
          request.providerName,
          status,
          `${request.providerName} API error (${status}): ${error.message}`,
          withStatus,
          error
        );
    }
  }

  // Timeouts surface as ECONNABORTED (legacy) or ETIMEDOUT
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new NetworkError(
      `${request.providerName} request timeout: ${request.endpoint}`,
      ErrorCode.NETWORK_TIMEOUT,
      request.endpoint,
      { ...context, metadata: { ...context.metadata, code: error.code } },
      error
    );
  }

  return new NetworkError(
    `${request.providerName} network error: ${error.message}`,
    ErrorCode.NETWORK_CONNECTION_FAILED,
    request.endpoint,
    { ...context, metadata: { ...context.metadata, code: error.code } },
    error
  );
}

/**
 * Failures that say nothing about the provider's health
 */
export function isBenignFailure(error: unknown): boolean {
  return error instanceof ProviderNotFoundError || error instanceof RequestCancelledError;
}
