// src/utils/errors.ts

export class PipelineError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration errors
export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// Inventory source errors
export class SourceUnavailableError extends PipelineError {
  constructor(
    message: string,
    public source: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'SOURCE_UNAVAILABLE', { ...details, source });
  }
}

export class TotalConnectivityError extends PipelineError {
  constructor(message: string = 'No inventory source could be reached', details?: Record<string, unknown>) {
    super(message, 'TOTAL_CONNECTIVITY_FAILURE', details);
  }
}

// API errors
export class ApiError extends PipelineError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

/**
 * The hosting API's hourly quota is spent. `resetAt` is when it refills.
 */
export class QuotaExceededError extends ApiError {
  constructor(
    message: string = 'API quota exhausted',
    public resetAt?: Date,
    details?: Record<string, unknown>
  ) {
    super(message, 403, { ...details, resetAt: resetAt?.toISOString() });
    this.code = 'QUOTA_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class CircuitBreakerOpenError extends NetworkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CIRCUIT_BREAKER_OPEN';
  }
}

// Run control
export class RunCancelledError extends PipelineError {
  constructor(message: string = 'Run cancelled', details?: Record<string, unknown>) {
    super(message, 'RUN_CANCELLED', details);
  }
}
