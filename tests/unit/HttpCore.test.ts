// tests/unit/HttpCore.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import nock from 'nock';
import { HttpCore } from '../../src/core/http/HttpCore';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import {
  ApiClientError,
  ApiServerError,
  CircuitBreakerOpenError,
  NetworkTimeoutError,
  QuotaExceededError,
  RateLimitError,
  RunCancelledError,
} from '../../src/utils/errors';
import { FAST_RETRY, OPEN_RATE_LIMITS } from '../helpers/deps';

describe('HttpCore', () => {
  let logger: Logger;
  let metrics: MetricsCollector;
  let httpCore: HttpCore;

  beforeEach(() => {
    logger = new Logger({ silent: true });
    metrics = new MetricsCollector({}, logger);
    httpCore = new HttpCore(
      OPEN_RATE_LIMITS,
      { retry: { ...FAST_RETRY, maxRetries: 2 }, timeout: 2000 },
      metrics,
      logger,
      undefined,
      { threshold: 2, resetTimeout: 60000 }
    );
  });

  describe('Conditional requests', () => {
    it('should send If-None-Match header when ETag cached', async () => {
      nock('https://api.github.com').get('/users/octo').reply(200, { login: 'octo' }, { ETag: '"abc123"' });

      const key = { provider: 'github' as const, resource: 'users/octo' };
      await httpCore.get('https://api.github.com/users/octo', { etagKey: key });

      const secondRequest = nock('https://api.github.com')
        .get('/users/octo')
        .matchHeader('If-None-Match', '"abc123"')
        .reply(304);

      const response = await httpCore.get('https://api.github.com/users/octo', { etagKey: key });

      expect(secondRequest.isDone()).toBe(true);
      expect(response.cached).toBe(true);
      expect(response.status).toBe(304);
      expect(response.data).toEqual({ login: 'octo' });
    });

    it('should not send If-None-Match without an etagKey', async () => {
      nock('https://api.github.com').get('/users/octo').reply(200, { login: 'octo' }, { ETag: '"abc123"' });
      await httpCore.get('https://api.github.com/users/octo');

      nock('https://api.github.com')
        .get('/users/octo')
        .reply(function () {
          return [200, { sawEtag: this.req.headers['if-none-match'] !== undefined }];
        });

      const response = await httpCore.get<{ sawEtag: boolean }>('https://api.github.com/users/octo');
      expect(response.data).toEqual({ sawEtag: false });
    });
  });

  describe('Retries', () => {
    it('should retry server errors and then succeed', async () => {
      nock('https://repos.ecosyste.ms').get('/api/v1/x').reply(503).get('/api/v1/x').reply(200, { ok: true });

      const response = await httpCore.get('https://repos.ecosyste.ms/api/v1/x');

      expect(response.status).toBe(200);
      expect(response.data).toEqual({ ok: true });
    });

    it('should raise ApiServerError after the last retry', async () => {
      nock('https://repos.ecosyste.ms').get('/api/v1/x').times(3).reply(502);

      await expect(httpCore.get('https://repos.ecosyste.ms/api/v1/x')).rejects.toBeInstanceOf(ApiServerError);
    });

    it('should not retry client errors', async () => {
      const scope = nock('https://repos.ecosyste.ms').get('/api/v1/missing').reply(404);

      const error = await httpCore.get('https://repos.ecosyste.ms/api/v1/missing').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiClientError);
      expect(error).toMatchObject({ status: 404 });
      expect(scope.isDone()).toBe(true);
    });

    it('should stop waiting between retries when the signal aborts', async () => {
      const http = new HttpCore(
        OPEN_RATE_LIMITS,
        { retry: { ...FAST_RETRY, maxRetries: 3, baseDelay: 60000, maxDelay: 60000 } },
        metrics,
        logger
      );
      const scope = nock('https://repos.ecosyste.ms').get('/api/v1/x').reply(503);
      const controller = new AbortController();
      const startedAt = Date.now();
      setTimeout(() => controller.abort(), 50);

      const error = await http
        .get('https://repos.ecosyste.ms/api/v1/x', { signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RunCancelledError);
      expect(scope.isDone()).toBe(true);
      expect(Date.now() - startedAt).toBeLessThan(5000);
    });
  });

  describe('Error mapping', () => {
    it('should map an exhausted GitHub quota to QuotaExceededError', async () => {
      nock('https://api.github.com').get('/users/octo').reply(
        403,
        { message: 'API rate limit exceeded' },
        { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1767268800' }
      );

      const error = await httpCore.get('https://api.github.com/users/octo').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(QuotaExceededError);
      expect(error).toMatchObject({ resetAt: new Date('2026-01-01T12:00:00Z') });
    });

    it('should map a plain 429 to RateLimitError', async () => {
      const http = new HttpCore(OPEN_RATE_LIMITS, { retry: FAST_RETRY }, metrics, logger);
      nock('https://pypistats.org').get('/api/packages/pypsa/recent').reply(429, {}, { 'retry-after': '7' });

      const error = await http.get('https://pypistats.org/api/packages/pypsa/recent').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ retryAfter: 7 });
    });

    it('should map slow responses to NetworkTimeoutError', async () => {
      nock('https://docs.example.io').get('/').delay(500).reply(200, 'late');

      await expect(httpCore.get('https://docs.example.io/', { timeout: 50 })).rejects.toBeInstanceOf(
        NetworkTimeoutError
      );
    });

    it('should map an aborted signal to RunCancelledError', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        httpCore.get('https://api.github.com/users/octo', { signal: controller.signal })
      ).rejects.toBeInstanceOf(RunCancelledError);
    });
  });

  describe('Circuit breaker', () => {
    it('should open per provider after repeated server errors', async () => {
      const http = new HttpCore(OPEN_RATE_LIMITS, { retry: FAST_RETRY }, metrics, logger, undefined, {
        threshold: 2,
      });
      nock('https://repos.ecosyste.ms').get('/api/v1/x').times(2).reply(500);

      await expect(http.get('https://repos.ecosyste.ms/api/v1/x')).rejects.toBeInstanceOf(ApiServerError);
      await expect(http.get('https://repos.ecosyste.ms/api/v1/x')).rejects.toBeInstanceOf(ApiServerError);
      await expect(http.get('https://repos.ecosyste.ms/api/v1/x')).rejects.toBeInstanceOf(CircuitBreakerOpenError);

      nock('https://api.github.com').get('/users/octo').reply(200, { login: 'octo' });
      await expect(http.get('https://api.github.com/users/octo')).resolves.toMatchObject({ status: 200 });
    });

    it('should not count 404s against the provider', async () => {
      const http = new HttpCore(OPEN_RATE_LIMITS, { retry: FAST_RETRY }, metrics, logger, undefined, {
        threshold: 1,
      });
      nock('https://repos.ecosyste.ms').get('/api/v1/missing').reply(404).get('/api/v1/x').reply(200, {});

      await expect(http.get('https://repos.ecosyste.ms/api/v1/missing')).rejects.toBeInstanceOf(ApiClientError);
      await expect(http.get('https://repos.ecosyste.ms/api/v1/x')).resolves.toMatchObject({ status: 200 });
    });
  });

  describe('Responses', () => {
    it('should return text bodies and lower-cased headers', async () => {
      nock('https://raw.githubusercontent.com')
        .get('/org/repo/main/landscape.yml')
        .reply(200, 'landscape: []\n', { 'X-Custom': 'yes' });

      const response = await httpCore.get<string>('https://raw.githubusercontent.com/org/repo/main/landscape.yml', {
        responseType: 'text',
      });

      expect(response.data).toBe('landscape: []\n');
      expect(response.headers['x-custom']).toBe('yes');
    });

    it('should pass query parameters', async () => {
      nock('https://repos.ecosyste.ms')
        .get('/api/v1/repositories/lookup')
        .query({ url: 'https://github.com/pypsa/pypsa' })
        .reply(200, { full_name: 'PyPSA/PyPSA' });

      const response = await httpCore.get('https://repos.ecosyste.ms/api/v1/repositories/lookup', {
        query: { url: 'https://github.com/pypsa/pypsa' },
      });

      expect(response.data).toEqual({ full_name: 'PyPSA/PyPSA' });
    });

    it('should record the remaining GitHub quota', async () => {
      nock('https://api.github.com').get('/users/octo').reply(200, {}, { 'x-ratelimit-remaining': '4321' });

      await httpCore.get('https://api.github.com/users/octo');

      expect(await metrics.getMetrics()).toContain('rate_limit_remaining{provider="github"} 4321');
    });
  });
});
