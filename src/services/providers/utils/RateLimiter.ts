/**
 * Rate Limiter Utility
 *
 * Sliding one-second window for outbound provider requests. Callers wait
 * their turn instead of being rejected. Each caller reserves its start time
 * synchronously, so callers arriving together are spread out.
 */

import { RequestCancelledError } from '../../../errors/index.js';

export interface RateLimiterConfig {
  requestsPerSecond: number;
}

const WINDOW_MS = 1000;

export class RateLimiter {
  // Start times of requests in the current window; reserved ones lie in the future
  private requests: number[] = [];
  private readonly maxRequests: number;
  private readonly requestsPerSecond: number;

  constructor(config: RateLimiterConfig) {
    this.requestsPerSecond = config.requestsPerSecond;
    this.maxRequests = Math.max(1, Math.floor(config.requestsPerSecond));
  }

  /**
   * Execute a function once its reserved slot arrives.
   * An aborted signal ends the wait with RequestCancelledError and gives the
   * slot back.
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    throwIfAborted(signal);

    const slot = this.reserveSlot();
    const wait = slot - Date.now();
    if (wait > 0) {
      try {
        await this.delay(wait, signal);
      } catch (error) {
        this.release(slot);
        throw error;
      }
    }

    return fn();
  }

  private reserveSlot(): number {
    const now = Date.now();
    this.cleanOldRequests(now);

    let slot = now;
    if (this.requests.length >= this.maxRequests) {
      // Free once the request maxRequests places back has left the window
      const blocking = this.requests[this.requests.length - this.maxRequests] ?? now;
      slot = Math.max(now, blocking + WINDOW_MS);
    }

    this.requests.push(slot);
    return slot;
  }

  private release(slot: number): void {
    const index = this.requests.indexOf(slot);
    if (index !== -1) {
      this.requests.splice(index, 1);
    }
  }

  private cleanOldRequests(now = Date.now()): void {
    const cutoff = now - WINDOW_MS;
    this.requests = this.requests.filter(timestamp => timestamp > cutoff);
  }

  getRequestCount(): number {
    this.cleanOldRequests();
    return this.requests.length;
  }

  getRemainingRequests(): number {
    return Math.max(0, this.maxRequests - this.getRequestCount());
  }

  getStats(): {
    requestsInWindow: number;
    remainingRequests: number;
    maxRequests: number;
    requestsPerSecond: number;
  } {
    return {
      requestsInWindow: this.getRequestCount(),
      remainingRequests: this.getRemainingRequests(),
      maxRequests: this.maxRequests,
      requestsPerSecond: this.requestsPerSecond,
    };
  }

  /**
   * Reset the rate limiter (for testing)
   */
  reset(): void {
    this.requests = [];
  }

  private delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new RequestCancelledError('Request cancelled while waiting for rate limit'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestCancelledError('Request cancelled before it was sent');
  }
}
