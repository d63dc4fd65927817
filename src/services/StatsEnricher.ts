// src/services/StatsEnricher.ts

import PQueue from 'p-queue';
import { ZodError } from 'zod';
import type { ToolRecord, ToolStats } from '../core/inventory/types';
import type { EcosystemsClient, PackageMetrics, RepositoryMetrics } from '../clients/ecosystems/EcosystemsClient';
import type { PackageRegistryClient } from '../clients/registries/PackageRegistryClient';
import type { DocsProbe } from '../clients/docs/DocsProbe';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { REASON_ACCESS_DENIED, REASON_NOT_FOUND, type EnrichmentOutcome } from './FilterService';
import {
  ApiClientError,
  ApiServerError,
  CircuitBreakerOpenError,
  NetworkError,
  NetworkTimeoutError,
  QuotaExceededError,
  RateLimitError,
  RunCancelledError,
} from '../utils/errors';

export interface EnrichmentBatch {
  outcomes: EnrichmentOutcome[];
  gapFraction: number;
}

interface PackageSummary {
  downloadsLastMonth?: number;
  dependentsCount?: number;
  latestReleasePublishedAt?: string;
  gaps: string[];
}

/**
 * Short label for why a lookup produced no data
 */
export function gapKind(error: unknown): string {
  if (error instanceof RateLimitError || error instanceof QuotaExceededError) return 'rate-limited';
  if (error instanceof NetworkTimeoutError) return 'timeout';
  if (error instanceof CircuitBreakerOpenError) return 'circuit-open';
  if (error instanceof NetworkError) return 'network';
  if (error instanceof ApiServerError) return 'server-error';
  if (error instanceof ApiClientError) return `http-${error.status}`;
  if (error instanceof ZodError) return 'invalid-response';
  return 'unknown';
}

export class StatsEnricher {
  constructor(
    private ecosystems: EcosystemsClient,
    private registries: PackageRegistryClient,
    private docs: DocsProbe | undefined,
    private logger: Logger,
    private metrics: MetricsCollector,
    private concurrency: number
  ) {}

  /**
   * Enrich every record through a bounded worker pool. Results are only
   * returned once all workers have finished; a cancelled run throws and
   * returns nothing.
   */
  async enrichAll(records: readonly ToolRecord[], signal?: AbortSignal): Promise<EnrichmentBatch> {
    const queue = new PQueue({ concurrency: this.concurrency });

    const tasks = records.map((record) =>
      queue.add(
        async () => {
          if (signal?.aborted) {
            throw new RunCancelledError('Enrichment cancelled');
          }
          return this.enrich(record, signal);
        },
        { throwOnTimeout: true }
      )
    );

    let outcomes: EnrichmentOutcome[];
    try {
      outcomes = await Promise.all(tasks);
    } catch (error: unknown) {
      queue.clear();
      throw error;
    }

    const enriched = outcomes.flatMap((outcome) => (outcome.kind === 'enriched' ? [outcome.stats] : []));
    const gapped = enriched.filter((stats) => stats.dataGap.length > 0).length;
    const gapFraction = enriched.length === 0 ? 0 : gapped / enriched.length;

    this.metrics.recordGauge('enrichment_gap_fraction', gapFraction);
    this.logger.info('Enrichment complete', {
      tools: records.length,
      enriched: enriched.length,
      gapped,
      gapFraction,
    });

    return { outcomes, gapFraction };
  }

  async enrich(record: ToolRecord, signal?: AbortSignal): Promise<EnrichmentOutcome> {
    const url = record.sourceUrl;
    if (!url) {
      return { kind: 'rejected', record, reason: REASON_NOT_FOUND };
    }

    const [repository, packages] = await Promise.allSettled([
      this.ecosystems.lookupRepository(url, signal),
      this.packageSummary(url, signal),
    ]);

    for (const result of [repository, packages]) {
      if (result.status === 'rejected' && result.reason instanceof RunCancelledError) {
        throw result.reason;
      }
    }

    if (repository.status === 'rejected' && repository.reason instanceof ApiClientError) {
      if (repository.reason.status === 404) {
        return { kind: 'rejected', record, reason: REASON_NOT_FOUND };
      }
      if (repository.reason.status === 403) {
        return { kind: 'rejected', record, reason: REASON_ACCESS_DENIED };
      }
    }

    const dataGap: string[] = [];
    let metrics: RepositoryMetrics | undefined;

    if (repository.status === 'fulfilled') {
      metrics = repository.value;
    } else {
      dataGap.push(`repository:${gapKind(repository.reason)}`);
      this.logger.warn('Repository lookup failed', {
        sourceUrl: url,
        error: repository.reason instanceof Error ? repository.reason.message : String(repository.reason),
      });
    }

    let summary: PackageSummary = { gaps: [] };
    if (packages.status === 'fulfilled') {
      summary = packages.value;
    } else {
      dataGap.push(`packages:${gapKind(packages.reason)}`);
      this.logger.warn('Package lookup failed', {
        sourceUrl: url,
        error: packages.reason instanceof Error ? packages.reason.message : String(packages.reason),
      });
    }
    dataGap.push(...summary.gaps);

    const documentationUrl = this.docs ? await this.docs.find(url, signal) : undefined;

    for (const gap of dataGap) {
      this.metrics.incrementCounter('enrichment_gaps', { kind: gap });
    }

    const commitStats = metrics?.commit_stats;
    const ddsHasData =
      typeof commitStats?.dds === 'number' &&
      typeof commitStats.total_committers === 'number' &&
      commitStats.total_committers > 0;

    const stats: ToolStats = {
      ...record,
      owner: metrics?.owner ?? undefined,
      language: metrics?.language ?? undefined,
      license: metrics?.license ?? undefined,
      archived: metrics?.archived ?? undefined,
      createdAt: metrics?.created_at ?? undefined,
      updatedAt: metrics?.updated_at ?? undefined,
      lastPushedAt: metrics?.pushed_at ?? undefined,
      stars: metrics?.stargazers_count ?? undefined,
      forks: metrics?.forks_count ?? undefined,
      contributorCount: commitStats?.total_committers ?? undefined,
      dependentsCount: summary.dependentsCount,
      downloadsLastMonth: summary.downloadsLastMonth,
      latestReleasePublishedAt: summary.latestReleasePublishedAt,
      ddsScore: ddsHasData ? commitStats?.dds ?? undefined : undefined,
      ddsHasData,
      documentationUrl,
      dataGap,
    };

    return { kind: 'enriched', stats };
  }

  private async packageSummary(url: string, signal?: AbortSignal): Promise<PackageSummary> {
    const packages = await this.ecosystems.lookupPackages(url, signal);
    const summary: PackageSummary = { gaps: [] };

    for (const pkg of packages) {
      const count = await this.monthlyDownloads(pkg, summary, signal);
      if (count !== undefined) {
        summary.downloadsLastMonth = (summary.downloadsLastMonth ?? 0) + count;
      }

      if (typeof pkg.dependent_repos_count === 'number') {
        summary.dependentsCount = Math.max(summary.dependentsCount ?? 0, pkg.dependent_repos_count);
      }

      const released = pkg.latest_release_published_at;
      if (released && !isNaN(Date.parse(released))) {
        const current = summary.latestReleasePublishedAt;
        if (!current || Date.parse(released) > Date.parse(current)) {
          summary.latestReleasePublishedAt = released;
        }
      }
    }

    return summary;
  }

  private async monthlyDownloads(
    pkg: PackageMetrics,
    summary: PackageSummary,
    signal?: AbortSignal
  ): Promise<number | undefined> {
    if (typeof pkg.downloads === 'number' && pkg.downloads_period === 'last-month') {
      return pkg.downloads;
    }

    const ecosystem = pkg.ecosystem.toLowerCase();
    if (!this.registries.supports(ecosystem)) {
      this.logger.debug('No download count for package', { name: pkg.name, ecosystem: pkg.ecosystem });
      return undefined;
    }

    try {
      return await this.registries.monthlyDownloads(ecosystem, pkg.name, signal);
    } catch (error: unknown) {
      if (error instanceof RunCancelledError) throw error;
      summary.gaps.push(`packages:${gapKind(error)}`);
      this.logger.warn('Registry download lookup failed', {
        name: pkg.name,
        ecosystem,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
