// src/core/http/RetryHandler.ts

import axios from 'axios';
import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { CircuitBreaker } from './CircuitBreaker';
import { sleep } from '../../utils/sleep';

const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE'];

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private circuitBreaker?: CircuitBreaker
  ) {}

  async execute<T>(task: () => Promise<T>, provider: string, signal?: AbortSignal): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      // Check circuit breaker before each retry attempt (not just first attempt)
      if (attempt > 0 && this.circuitBreaker && !this.circuitBreaker.canExecute(provider)) {
        this.logger.warn('Circuit breaker open, skipping retry', { provider, attempt });
        throw lastError;
      }

      try {
        return await task();
      } catch (error: unknown) {
        lastError = error;

        const status = axios.isAxiosError(error) ? error.response?.status : undefined;

        if (!this.isRetryable(error, status) || attempt === this.config.maxRetries) {
          throw error;
        }

        let delay: number;
        const retryAfter = axios.isAxiosError(error)
          ? error.response?.headers?.['retry-after']
          : undefined;

        if (typeof retryAfter === 'string' && retryAfter.length > 0) {
          // Retry-After is either seconds or an HTTP date
          const retryAfterNum = parseInt(retryAfter, 10);
          if (!isNaN(retryAfterNum)) {
            delay = retryAfterNum * 1000;
          } else {
            delay = Math.max(0, new Date(retryAfter).getTime() - Date.now());
          }
          delay = Math.min(delay, this.config.maxDelay);

          this.logger.warn('Retrying with Retry-After', {
            provider,
            attempt: attempt + 1,
            delay,
            status,
            retryAfter,
          });
        } else {
          // Exponential backoff with jitter
          delay = Math.min(
            this.config.baseDelay * Math.pow(2, attempt) + Math.random() * this.config.baseDelay,
            this.config.maxDelay
          );

          this.logger.warn('Retrying request', {
            provider,
            attempt: attempt + 1,
            delay,
            status,
          });
        }

        await sleep(delay, signal);
      }
    }

    throw lastError;
  }

  private isRetryable(error: unknown, status: number | undefined): boolean {
    if (status !== undefined) {
      return this.config.retryableStatusCodes.includes(status);
    }
    if (!this.config.retryNetworkErrors || !axios.isAxiosError(error)) {
      return false;
    }
    return error.code !== undefined && RETRYABLE_NETWORK_CODES.includes(error.code);
  }
}
