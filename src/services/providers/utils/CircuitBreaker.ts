/**
 * Circuit Breaker Utility
 *
 * Stops calling a provider after repeated transport failures and lets a
 * trial request through once the reset timeout has passed.
 */

import { logger } from '../../../middleware/logging.js';
import { ProviderUnavailableError, RequestCancelledError } from '../../../errors/index.js';

export interface CircuitBreakerConfig {
  providerName: string;
  threshold: number; // Number of consecutive failures before opening
  resetTimeoutMs: number; // Time to wait before attempting recovery
  /** Errors for which this returns false do not count against the provider */
  isFailure?: (error: unknown) => boolean;
  onOpen?: () => void;
  onClose?: () => void;
}

export enum CircuitState {
  CLOSED = 'closed', // Normal operation
  OPEN = 'open', // Failing, rejecting requests
  HALF_OPEN = 'half_open', // Testing if service recovered
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private resetTimer: NodeJS.Timeout | null = null;

  private readonly providerName: string;
  private readonly threshold: number;
  private readonly resetTimeoutMs: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly onOpen: (() => void) | undefined;
  private readonly onClose: (() => void) | undefined;

  constructor(config: CircuitBreakerConfig) {
    this.providerName = config.providerName;
    this.threshold = config.threshold;
    this.resetTimeoutMs = config.resetTimeoutMs;
    this.isFailure = config.isFailure ?? (() => true);
    this.onOpen = config.onOpen;
    this.onClose = config.onClose;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (this.shouldAttemptReset()) {
        this.transitionToHalfOpen();
      } else {
        throw new ProviderUnavailableError(
          this.providerName,
          `Circuit breaker is open for provider: ${this.providerName}`,
          { service: 'CircuitBreaker', metadata: { failureCount: this.failureCount } }
        );
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      // A caller hanging up says nothing about the provider
      if (error instanceof RequestCancelledError) {
        throw error;
      }
      if (this.isFailure(error)) {
        this.onFailure();
      } else {
        // The provider answered; that is proof of health
        this.onSuccess();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;

      // Require 2 successful requests to close circuit
      if (this.successCount >= 2) {
        this.transitionToClosed();
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.threshold) {
      this.transitionToOpen();
    }
  }

  private transitionToOpen(): void {
    this.state = CircuitState.OPEN;
    this.successCount = 0;

    logger.warn('Circuit breaker opened', {
      provider: this.providerName,
      failureCount: this.failureCount,
      threshold: this.threshold,
    });

    this.onOpen?.();
    this.scheduleReset();
  }

  private transitionToHalfOpen(): void {
    this.state = CircuitState.HALF_OPEN;
    this.successCount = 0;

    logger.info('Circuit breaker half-open, attempting recovery', {
      provider: this.providerName,
    });
  }

  private transitionToClosed(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.clearResetTimer();

    logger.info('Circuit breaker closed, normal operation resumed', {
      provider: this.providerName,
    });

    this.onClose?.();
  }

  private shouldAttemptReset(): boolean {
    if (this.lastFailureTime === null) {
      return false;
    }
    return Date.now() - this.lastFailureTime >= this.resetTimeoutMs;
  }

  private scheduleReset(): void {
    this.clearResetTimer();

    this.resetTimer = setTimeout(() => {
      if (this.state === CircuitState.OPEN) {
        this.transitionToHalfOpen();
      }
    }, this.resetTimeoutMs);

    // A pending recovery must not keep the process alive
    this.resetTimer.unref();
  }

  private clearResetTimer(): void {
    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
      this.resetTimer = null;
    }
  }

  isOpen(): boolean {
    return this.state === CircuitState.OPEN;
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): {
    state: CircuitState;
    failureCount: number;
    successCount: number;
    threshold: number;
    lastFailureTime: string | null;
  } {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      threshold: this.threshold,
      lastFailureTime: this.lastFailureTime !== null
        ? new Date(this.lastFailureTime).toISOString()
        : null,
    };
  }

  /**
   * Manually reset the circuit breaker (for testing)
   */
  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.clearResetTimer();
  }
}
