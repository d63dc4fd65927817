// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { validateConfig, validateConfigSafe } from '../../src/config/ConfigValidator';
import { loadConfigFromEnv } from '../../src/config/env';
import { ConfigError } from '../../src/utils/errors';
import { createTestConfig } from '../helpers/deps';

describe('ConfigValidator', () => {
  it('should accept a complete configuration', () => {
    const config = createTestConfig('/tmp/esm');
    expect(validateConfig(config)).toEqual(config);
  });

  it('should reject an empty source list', () => {
    const config = createTestConfig('/tmp/esm');
    const result = validateConfigSafe({ ...config, inventory: { ...config.inventory, sources: [] } });

    expect(result).toEqual({
      success: false,
      errors: ['inventory.sources: At least one inventory source must be configured'],
    });
  });

  it('should reject unknown inventory sources', () => {
    const config = createTestConfig('/tmp/esm');
    const result = validateConfigSafe({ ...config, inventory: { ...config.inventory, sources: ['awesome-list'] } });

    expect(result.success).toBe(false);
  });

  it('should require a url for the redis cache', () => {
    const config = createTestConfig('/tmp/esm', { cache: { backend: 'redis' } });
    const result = validateConfigSafe(config);

    expect(result).toEqual({
      success: false,
      errors: ["cache: Redis and Postgres backends require 'url' configuration"],
    });
  });

  it('should reject maxDelay below baseDelay', () => {
    const config = createTestConfig('/tmp/esm');
    const result = validateConfigSafe({
      ...config,
      http: { retry: { maxRetries: 1, baseDelay: 500, maxDelay: 100, retryableStatusCodes: [500] } },
    });

    expect(result).toEqual({
      success: false,
      errors: ['http.retry: maxDelay must be greater than or equal to baseDelay'],
    });
  });

  it('should throw from validateConfig', () => {
    expect(() => validateConfig({ dataDir: '' })).toThrow();
  });
});

describe('loadConfigFromEnv', () => {
  it('should apply defaults relative to the working directory', () => {
    const config = loadConfigFromEnv({}, '/srv/esm');

    expect(config.dataDir).toBe(path.resolve('/srv/esm', 'data'));
    expect(config.rulesPath).toBe(path.resolve('/srv/esm', 'config/classification-rules.yaml'));
    expect(config.inventory.sources).toEqual(['lf-energy-landscape', 'opensustain-tech', 'g-pst']);
    expect(config.github.token).toBeUndefined();
    expect(config.enrichment.concurrency).toBe(8);
    expect(config.collector.maxQuotaWaitMs).toBe(3600000);
  });

  it('should treat blank variables as unset', () => {
    const config = loadConfigFromEnv(
      {
        DATA_DIR: '',
        RULES_PATH: '',
        MANUAL_LIST_PATH: '',
        EXCLUSIONS_PATH: '',
        CACHE_BACKEND: '',
        CACHE_URL: '',
        LOG_LEVEL: '',
        LOG_FORMAT: '',
        INVENTORY_SOURCES: '',
        ENRICH_CONCURRENCY: '',
      },
      '/work'
    );

    expect(config.dataDir).toBe('/work/data');
    expect(config.rulesPath).toBe('/work/config/classification-rules.yaml');
    expect(config.inventory.manualListPath).toBe('/work/config/manual-tools.csv');
    expect(config.inventory.exclusionsPath).toBe('/work/config/exclusions.csv');
    expect(config.cache).toEqual({ backend: 'memory', url: undefined });
    expect(config.logging).toEqual({ level: 'info', format: 'json' });
    expect(config.inventory.sources).toHaveLength(3);
    expect(config.enrichment.concurrency).toBe(8);
  });

  it('should size the GitHub rate limit by authentication', () => {
    const anonymous = loadConfigFromEnv({}, '/srv/esm');
    const authenticated = loadConfigFromEnv({ GITHUB_TOKEN: 'test-token' }, '/srv/esm');

    expect(anonymous.rateLimits.github?.qps).toBeCloseTo(60 / 3600);
    expect(authenticated.rateLimits.github?.qps).toBeCloseTo(5000 / 3600);
    expect(authenticated.github.token).toBe('test-token');
  });

  it('should read the source list and numeric settings', () => {
    const config = loadConfigFromEnv(
      {
        INVENTORY_SOURCES: 'g-pst, opensustain-tech',
        ENRICH_CONCURRENCY: '3',
        PROBE_DOCS: 'false',
        DATA_DIR: '/var/esm',
      },
      '/srv/esm'
    );

    expect(config.inventory.sources).toEqual(['g-pst', 'opensustain-tech']);
    expect(config.enrichment.concurrency).toBe(3);
    expect(config.enrichment.probeDocs).toBe(false);
    expect(config.dataDir).toBe('/var/esm');
  });

  it('should reject unknown sources with a ConfigError', () => {
    expect(() => loadConfigFromEnv({ INVENTORY_SOURCES: 'g-pst,awesome-list' }, '/srv/esm')).toThrow(
      'Unknown inventory sources: awesome-list'
    );
  });

  it('should wrap validation failures in a ConfigError', () => {
    expect(() => loadConfigFromEnv({ ENRICH_CONCURRENCY: 'many' }, '/srv/esm')).toThrow(ConfigError);
  });
});
