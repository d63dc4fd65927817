// tests/helpers/deps.ts

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { HttpCore } from '../../src/core/http/HttpCore';
import { TableStore } from '../../src/core/tables/TableStore';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { GitHubClient } from '../../src/clients/github/GitHubClient';
import type { RetryConfig } from '../../src/core/http/types';
import type { PipelineConfig } from '../../src/config/ConfigValidator';

export const FAST_RETRY: RetryConfig = {
  maxRetries: 0,
  baseDelay: 10,
  maxDelay: 50,
  retryableStatusCodes: [500, 502, 503, 504],
};

export const OPEN_RATE_LIMITS = {
  github: { qps: 1000, concurrency: 10 },
  ecosystems: { qps: 1000, concurrency: 10 },
  registry: { qps: 1000, concurrency: 10 },
  docs: { qps: 1000, concurrency: 10 },
  inventory: { qps: 1000, concurrency: 10 },
  geocoder: { qps: 1000, concurrency: 10 },
};

export interface TestDeps {
  logger: Logger;
  metrics: MetricsCollector;
  http: HttpCore;
  github: GitHubClient;
}

export function createTestDeps(retry: RetryConfig = FAST_RETRY): TestDeps {
  const logger = new Logger({ silent: true });
  const metrics = new MetricsCollector({}, logger);
  const http = new HttpCore(OPEN_RATE_LIMITS, { retry, timeout: 2000 }, metrics, logger);
  const github = new GitHubClient(http, logger, 'test-token');
  return { logger, metrics, http, github };
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'esm-pipeline-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function createTableStore(dir: string, logger: Logger = new Logger({ silent: true })): TableStore {
  return new TableStore(dir, logger);
}

export function createTestConfig(dataDir: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    dataDir,
    rulesPath: path.join(dataDir, 'rules.yaml'),
    github: { token: 'test-token' },
    inventory: {
      sources: ['lf-energy-landscape', 'opensustain-tech', 'g-pst'],
      manualListPath: path.join(dataDir, 'manual.csv'),
      exclusionsPath: path.join(dataDir, 'exclusions.csv'),
    },
    enrichment: { concurrency: 2, probeDocs: false, registries: ['pypi', 'npm', 'julia'] },
    collector: {
      interactionTypes: ['stargazer', 'fork', 'issue', 'pull', 'comment'],
      maxQuotaWaitMs: 0,
    },
    http: { timeout: 2000, retry: FAST_RETRY },
    rateLimits: OPEN_RATE_LIMITS,
    logging: { silent: true },
    ...overrides,
  };
}
