// src/core/http/types.ts

/**
 * Rate-limit and circuit-breaker partitions. Each external service the
 * pipeline talks to gets its own queue.
 */
export type ProviderName = 'github' | 'ecosystems' | 'registry' | 'docs' | 'inventory' | 'geocoder';

export const PROVIDER_NAMES: readonly ProviderName[] = [
  'github',
  'ecosystems',
  'registry',
  'docs',
  'inventory',
  'geocoder',
];

export interface HttpRequestConfig {
  url: string;
  method?: 'GET' | 'HEAD' | 'POST';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  timeout?: number;
  responseType?: 'json' | 'text' | 'arraybuffer';
  provider?: ProviderName;
  etagKey?: ETagKey;
  skipRateLimit?: boolean;
  signal?: AbortSignal;
}

export interface ETagKey {
  provider: ProviderName;
  resource: string;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
  cached?: boolean; // True if returned from ETag cache
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  retryableStatusCodes: number[];
  retryNetworkErrors?: boolean;
}

export interface HttpConfig {
  timeout?: number;
  userAgent?: string;
  keepAlive?: boolean;
  retry: RetryConfig;
}

export interface CacheConfig {
  backend: 'memory' | 'redis' | 'postgres';
  url?: string;
  ttl?: number; // milliseconds
  namespace?: string;
}
