// src/config/env.ts

import * as path from 'path';
import {
  INVENTORY_SOURCES,
  validateConfig,
  type InventorySourceName,
  type PipelineConfig,
} from './ConfigValidator';
import { ConfigError } from '../utils/errors';

// GitHub REST quota per hour
const GITHUB_HOURLY_QUOTA = 5000;
const GITHUB_ANONYMOUS_HOURLY_QUOTA = 60;

export const DEFAULT_RETRY = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
  retryNetworkErrors: true,
};

function list(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function num(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function bool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

function isInventorySource(value: string): value is InventorySourceName {
  return INVENTORY_SOURCES.some((source) => source === value);
}

/**
 * Build and validate the pipeline configuration from environment variables.
 * Call dotenv first if a .env file should be honoured.
 *
 * @throws {ConfigError} If a variable holds an unusable value
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): PipelineConfig {
  const token = env.GITHUB_TOKEN || undefined;
  const githubQuota = token ? GITHUB_HOURLY_QUOTA : GITHUB_ANONYMOUS_HOURLY_QUOTA;

  const sources = list(env.INVENTORY_SOURCES) ?? [...INVENTORY_SOURCES];
  const unknown = sources.filter((source) => !isInventorySource(source));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown inventory sources: ${unknown.join(', ')}`, { allowed: INVENTORY_SOURCES });
  }

  const cacheBackend = env.CACHE_BACKEND || 'memory';

  const candidate = {
    dataDir: path.resolve(cwd, env.DATA_DIR || 'data'),
    rulesPath: path.resolve(cwd, env.RULES_PATH || 'config/classification-rules.yaml'),
    github: { token },
    inventory: {
      sources,
      manualListPath: path.resolve(cwd, env.MANUAL_LIST_PATH || 'config/manual-tools.csv'),
      exclusionsPath: path.resolve(cwd, env.EXCLUSIONS_PATH || 'config/exclusions.csv'),
    },
    enrichment: {
      concurrency: num(env.ENRICH_CONCURRENCY) ?? 8,
      probeDocs: bool(env.PROBE_DOCS) ?? true,
      registries: ['pypi', 'npm', 'julia', 'conda'],
    },
    collector: {
      interactionTypes: ['stargazer', 'fork', 'issue', 'pull', 'comment'],
      maxQuotaWaitMs: num(env.MAX_QUOTA_WAIT_MS) ?? 3600000,
    },
    geocoding: {
      enabled: bool(env.GEOCODING_ENABLED) ?? true,
      url: env.GEOCODER_URL || undefined,
    },
    http: {
      timeout: num(env.HTTP_TIMEOUT_MS) ?? 30000,
      keepAlive: true,
      retry: DEFAULT_RETRY,
    },
    rateLimits: {
      github: { qps: githubQuota / 3600, concurrency: 4 },
      ecosystems: { qps: 5, concurrency: 5 },
      registry: { qps: 5, concurrency: 5 },
      docs: { qps: 10, concurrency: 5 },
      inventory: { qps: 2, concurrency: 2 },
      // Nominatim's usage policy allows one request per second
      geocoder: { qps: 1, concurrency: 1 },
    },
    cache: {
      backend: cacheBackend,
      url: env.CACHE_URL || undefined,
    },
    metrics: { enabled: bool(env.METRICS_ENABLED) ?? true },
    logging: {
      level: env.LOG_LEVEL || 'info',
      format: env.LOG_FORMAT || 'json',
    },
  };

  try {
    return validateConfig(candidate);
  } catch (error: unknown) {
    throw new ConfigError('Invalid configuration from environment', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
