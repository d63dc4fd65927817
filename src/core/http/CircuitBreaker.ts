// src/core/http/CircuitBreaker.ts

import type { Logger } from '../../observability/Logger';

export interface CircuitBreakerOptions {
  threshold?: number;
  resetTimeout?: number;
}

export class CircuitBreaker {
  private failures: Map<string, number> = new Map();
  private lastFailureTime: Map<string, number> = new Map();
  private threshold: number;
  private resetTimeout: number;

  constructor(
    private logger: Logger,
    options: CircuitBreakerOptions = {}
  ) {
    this.threshold = options.threshold ?? 5;
    this.resetTimeout = options.resetTimeout ?? 60000; // 1 minute
  }

  canExecute(provider: string): boolean {
    const failures = this.failures.get(provider) || 0;
    const lastFailure = this.lastFailureTime.get(provider) || 0;

    if (failures >= this.threshold) {
      const timeSinceLastFailure = Date.now() - lastFailure;

      if (timeSinceLastFailure < this.resetTimeout) {
        this.logger.warn('Circuit breaker open', { provider, failures });
        return false;
      }

      // Half-open: let the next call through
      this.failures.set(provider, 0);
    }

    return true;
  }

  recordSuccess(provider: string): void {
    this.failures.set(provider, 0);
  }

  recordFailure(provider: string): void {
    const current = this.failures.get(provider) || 0;
    this.failures.set(provider, current + 1);
    this.lastFailureTime.set(provider, Date.now());
  }
}
