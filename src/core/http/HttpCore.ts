// src/core/http/HttpCore.ts

import axios, { type AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import {
  PROVIDER_NAMES,
  type HttpConfig,
  type HttpRequestConfig,
  type HttpResponse,
  type ProviderName,
  type RateLimitConfig,
} from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler } from './RetryHandler';
import { CircuitBreaker, type CircuitBreakerOptions } from './CircuitBreaker';
import { ETagCache, type CachedETagData } from './ETagCache';
import {
  PipelineError,
  ApiClientError,
  ApiServerError,
  NetworkTimeoutError,
  NetworkError,
  CircuitBreakerOpenError,
  QuotaExceededError,
  RateLimitError,
  RunCancelledError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_USER_AGENT = 'esm-inventory-pipeline/0.1';

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<ProviderName, PQueue> = new Map();
  private retryHandler: RetryHandler;
  private circuitBreaker: CircuitBreaker;
  private etagCache: ETagCache;
  private timeout: number;
  private userAgent: string;

  constructor(
    private rateLimits: Partial<Record<ProviderName, RateLimitConfig>>,
    httpConfig: HttpConfig,
    private metrics: MetricsCollector,
    private logger: Logger,
    etagCache?: ETagCache,
    breakerOptions?: CircuitBreakerOptions
  ) {
    this.timeout = httpConfig.timeout ?? DEFAULT_TIMEOUT;
    this.userAgent = httpConfig.userAgent ?? DEFAULT_USER_AGENT;
    this.circuitBreaker = new CircuitBreaker(logger, breakerOptions);
    this.retryHandler = new RetryHandler(httpConfig.retry, logger, this.circuitBreaker);
    this.etagCache = etagCache ?? new ETagCache({ backend: 'memory' }, logger);

    const keepAlive = httpConfig.keepAlive ?? true;
    this.axiosInstance = axios.create({
      timeout: this.timeout,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
    });

    this.initializeRateLimiters();
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async head(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'> = {}
  ): Promise<HttpResponse<unknown>> {
    return this.request({ ...config, url, method: 'HEAD' });
  }

  /**
   * Core request: circuit breaker, conditional request, retry and rate limiting
   */
  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const provider = config.provider ?? this.extractProvider(config.url);
    const requestId = this.generateRequestId();
    const method = config.method ?? 'GET';

    this.metrics.incrementCounter('http_requests_total', {
      provider,
      method,
      status: 'initiated',
    });

    this.logger.debug('HTTP request', {
      requestId,
      provider,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers || {}),
    });

    if (!this.circuitBreaker.canExecute(provider)) {
      throw new CircuitBreakerOpenError(`Circuit breaker open for ${provider}`, { provider });
    }

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.userAgent,
      'Accept-Encoding': 'gzip, deflate',
      ...config.headers,
    };

    let cachedData: CachedETagData<T> | undefined;
    if (config.etagKey && method === 'GET') {
      cachedData = await this.etagCache.get<T>(config.etagKey);
      if (cachedData?.etag) {
        headers['If-None-Match'] = cachedData.etag;
        this.logger.debug('Conditional request', { requestId, etag: cachedData.etag });
      }
    }

    const execute = async (): Promise<HttpResponse<T>> => {
      return withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.retryHandler.execute(async () => {
            return this.axiosInstance.request<T>({
              url: config.url,
              method,
              headers,
              params: config.query,
              data: config.body,
              timeout: config.timeout ?? this.timeout,
              responseType: config.responseType ?? 'json',
              signal: config.signal,
              validateStatus: (status) => status < 400 || status === 304,
            });
          }, provider, config.signal);

          this.circuitBreaker.recordSuccess(provider);

          this.metrics.incrementCounter('http_requests_total', {
            provider,
            method,
            status: axiosResponse.status.toString(),
          });

          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            provider,
            status: axiosResponse.status,
          });

          const responseHeaders = this.toHeaderRecord(axiosResponse.headers);
          this.recordRateLimitRemaining(provider, responseHeaders);

          if (axiosResponse.status === 304 && cachedData) {
            this.logger.debug('304 Not Modified, using cache', { requestId });
            this.metrics.incrementCounter('http_cache_hits', { provider });
            return {
              ...cachedData.payload,
              status: 304, // Preserve 304 status, not the cached 200
              cached: true,
            };
          }

          const result: HttpResponse<T> = {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: responseHeaders,
          };

          const etag = result.headers.etag;
          if (config.etagKey && etag) {
            await this.etagCache.set(config.etagKey, result, etag);
            this.logger.debug('Cached with ETag', { requestId, etag });
          }

          return result;
        } catch (error: unknown) {
          const transformed = this.transformError(error, provider, config.url);

          // 404s and quota exhaustion say nothing about the service's health
          if (
            !(transformed instanceof ApiClientError) &&
            !(transformed instanceof QuotaExceededError) &&
            !(transformed instanceof RunCancelledError)
          ) {
            this.circuitBreaker.recordFailure(provider);
          }

          const errorStatus = axios.isAxiosError(error) ? error.response?.status ?? 'error' : 'error';
          this.metrics.incrementCounter('http_requests_total', {
            provider,
            method,
            status: errorStatus.toString(),
          });
          this.metrics.incrementCounter('http_errors', {
            provider,
            status: errorStatus,
          });

          throw transformed;
        }
      });
    };

    return this.runThroughRateLimiter(provider, config.skipRateLimit, execute);
  }

  private async runThroughRateLimiter<T>(
    provider: ProviderName,
    skip: boolean | undefined,
    task: () => Promise<T>
  ): Promise<T> {
    const queue = this.rateLimiters.get(provider);

    if (!queue || skip) {
      return task();
    }

    const wrappedTask = async () => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, { provider });
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { provider });

    return queue.add(wrappedTask, { throwOnTimeout: true });
  }

  private initializeRateLimiters(): void {
    for (const provider of PROVIDER_NAMES) {
      const config = this.rateLimits[provider];
      if (!config) continue;

      // Fractional QPS: keep an integer cap and stretch the interval instead
      let intervalCap: number;
      let interval: number;

      if (config.qps >= 1) {
        intervalCap = Math.floor(config.qps);
        interval = Math.round((1000 * intervalCap) / config.qps);
      } else {
        // e.g. 0.5 QPS = 1 request per 2000ms
        intervalCap = 1;
        interval = Math.floor(1000 / config.qps);
      }

      this.rateLimiters.set(
        provider,
        new PQueue({
          intervalCap,
          interval,
          concurrency: config.concurrency,
        })
      );

      this.logger.debug('Rate limiter initialized', {
        provider,
        originalQps: config.qps,
        intervalCap,
        interval,
        concurrency: config.concurrency,
      });
    }
  }

  private extractProvider(url: string): ProviderName {
    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase();
    } catch {
      return 'inventory';
    }

    if (host === 'api.github.com') return 'github';
    if (host.endsWith('ecosyste.ms')) return 'ecosystems';
    if (
      host.endsWith('pypistats.org') ||
      host.endsWith('npmjs.org') ||
      host.endsWith('juliapkgstats.com')
    ) {
      return 'registry';
    }
    if (
      host.endsWith('readthedocs.io') ||
      host.endsWith('readthedocs.org') ||
      host.endsWith('github.io') ||
      host.endsWith('gitlab.io')
    ) {
      return 'docs';
    }
    if (host.endsWith('nominatim.openstreetmap.org')) return 'geocoder';
    return 'inventory';
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      } else if (typeof value === 'number') {
        record[key.toLowerCase()] = String(value);
      }
    }
    return record;
  }

  private recordRateLimitRemaining(provider: ProviderName, headers: Record<string, string>): void {
    const remaining = headers['x-ratelimit-remaining'];
    if (remaining !== undefined && !isNaN(Number(remaining))) {
      this.metrics.recordGauge('rate_limit_remaining', Number(remaining), { provider });
    }
  }

  private transformError(error: unknown, provider: ProviderName, url: string): Error {
    if (error instanceof PipelineError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ERR_CANCELED') {
        return new RunCancelledError('Request aborted', { provider, url });
      }

      if (error.response) {
        const status = error.response.status;
        const headers = this.toHeaderRecord(error.response.headers);

        this.logger.debug('HTTP error response', {
          provider,
          url,
          status,
          statusText: error.response.statusText,
        });

        if ((status === 403 || status === 429) && headers['x-ratelimit-remaining'] === '0') {
          const reset = Number(headers['x-ratelimit-reset']);
          const resetAt = isNaN(reset) ? undefined : new Date(reset * 1000);
          return new QuotaExceededError(`Quota exhausted for ${provider}`, resetAt, { provider, url });
        }
        if (status === 429) {
          const retryAfter = parseInt(headers['retry-after'] ?? '', 10);
          return new RateLimitError(`Rate limited by ${provider}`, isNaN(retryAfter) ? undefined : retryAfter, {
            provider,
            url,
          });
        }
        if (status >= 400 && status < 500) {
          return new ApiClientError(`Client error: ${status}`, status, { provider, url });
        }
        if (status >= 500) {
          return new ApiServerError(`Server error: ${status}`, status, { provider, url });
        }
      }

      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new NetworkTimeoutError('Request timeout', { provider, url });
      }
      return new NetworkError(`Network error: ${error.message}`, { provider, url, code: error.code });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new NetworkError(`Network error: ${message}`, { provider, url });
  }
}
