// src/pipeline.ts

import type { Connector, CoreDeps } from './connectors/types';
import type { InventorySourceName, PipelineConfig } from './config/ConfigValidator';
import { validateConfig } from './config/ConfigValidator';
import { HttpCore } from './core/http/HttpCore';
import { ETagCache } from './core/http/ETagCache';
import { TableStore } from './core/tables/TableStore';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { generateRunId, withStageSpan } from './observability/tracing';
import { GitHubClient } from './clients/github/GitHubClient';
import { EcosystemsClient } from './clients/ecosystems/EcosystemsClient';
import { PackageRegistryClient } from './clients/registries/PackageRegistryClient';
import { CondaDownloads } from './clients/registries/CondaDownloads';
import { DocsProbe } from './clients/docs/DocsProbe';
import { GeocodingClient } from './clients/geocoding/GeocodingClient';
import { LfEnergyLandscapeConnector, LF_ENERGY_LANDSCAPE_URL } from './connectors/lfenergy/LfEnergyLandscapeConnector';
import { OpenSustainTechConnector, OPENSUSTAIN_TECH_URL } from './connectors/opensustain/OpenSustainTechConnector';
import { GpstOpenToolsConnector, GPST_OPENTOOLS_URL } from './connectors/gpst/GpstOpenToolsConnector';
import { InventoryLoader, type InventorySummary } from './services/InventoryLoader';
import { FilterService } from './services/FilterService';
import { StatsEnricher } from './services/StatsEnricher';
import { RefreshController, type RefreshSummary } from './services/RefreshController';
import { InteractionCollector, type CollectionSummary } from './services/InteractionCollector';
import { UserDetailCollector, type UserDetailSummary } from './services/UserDetailCollector';
import { UserClassifier, type ClassificationSummary } from './services/UserClassifier';

export interface StageOptions {
  signal?: AbortSignal;
}

export interface UserDetailStageOptions extends StageOptions {
  refreshProfiles?: boolean;
}

export type PipelineStage = 'inventory' | 'refresh' | 'interactions' | 'user-details' | 'classify';

const DEFAULT_SOURCE_URLS: Record<InventorySourceName, string> = {
  'lf-energy-landscape': LF_ENERGY_LANDSCAPE_URL,
  'opensustain-tech': OPENSUSTAIN_TECH_URL,
  'g-pst': GPST_OPENTOOLS_URL,
};

export class InventoryPipeline {
  private connectors: Map<InventorySourceName, Connector> = new Map();
  private core: CoreDeps;
  private tables: TableStore;
  private etagCache: ETagCache;
  private refresh: RefreshController;
  private interactions: InteractionCollector;
  private userDetails: UserDetailCollector;
  private geocoder?: GeocodingClient;

  private constructor(
    private config: PipelineConfig,
    private classifier: UserClassifier,
    logger: Logger,
    metrics: MetricsCollector
  ) {
    this.etagCache = new ETagCache(config.cache, logger);
    const http = new HttpCore(config.rateLimits, config.http, metrics, logger, this.etagCache);
    const github = new GitHubClient(http, logger, config.github.token, config.collector.perPage);

    this.core = { http, github, logger, metrics };
    this.tables = new TableStore(config.dataDir, logger);

    const enricher = new StatsEnricher(
      new EcosystemsClient(http),
      new PackageRegistryClient(http, config.enrichment.registries, new CondaDownloads(http, logger)),
      config.enrichment.probeDocs ? new DocsProbe(http, logger) : undefined,
      logger,
      metrics,
      config.enrichment.concurrency
    );

    this.refresh = new RefreshController(
      this.tables,
      new FilterService(logger, metrics),
      enricher,
      {
        manualListPath: config.inventory.manualListPath,
        exclusionsPath: config.inventory.exclusionsPath,
      },
      logger,
      metrics
    );
    this.interactions = new InteractionCollector(github, this.tables, config.collector, logger, metrics);
    this.userDetails = new UserDetailCollector(
      github,
      this.tables,
      config.collector.maxQuotaWaitMs,
      logger,
      metrics
    );
    if (config.geocoding?.enabled) {
      this.geocoder = new GeocodingClient(http, config.geocoding.url);
    }

    this.registerDefaultConnectors();
  }

  /**
   * Validate the configuration, load the classification rules and wire every
   * stage.
   *
   * @throws {z.ZodError} If the configuration is invalid
   * @throws {ConfigError} If the classification rules cannot be loaded
   *
   * @example
   * ```typescript
   * const pipeline = await InventoryPipeline.init(loadConfigFromEnv());
   * await pipeline.collectInventory();
   * await pipeline.refreshStats();
   * ```
   */
  static async init(config: PipelineConfig): Promise<InventoryPipeline> {
    const validated = validateConfig(config);

    const logger = new Logger(validated.logging);
    const metrics = new MetricsCollector(validated.metrics, logger);
    const classifier = await UserClassifier.fromFile(validated.rulesPath, logger, metrics);

    const pipeline = new InventoryPipeline(validated, classifier, logger, metrics);

    logger.info('Pipeline initialized', {
      dataDir: validated.dataDir,
      sources: Array.from(pipeline.connectors.keys()),
      authenticated: Boolean(validated.github.token),
    });

    return pipeline;
  }

  /**
   * Fetch every configured inventory source into inventory.csv
   *
   * @throws {TotalConnectivityError} If no source could be loaded
   */
  async collectInventory(options: StageOptions = {}): Promise<InventorySummary> {
    const loader = new InventoryLoader(
      Array.from(this.connectors.values()),
      this.tables,
      this.core.logger,
      this.core.metrics
    );
    return this.runStage('inventory', () => loader.collect(options.signal));
  }

  /**
   * Merge, filter and enrich the inventory into stats.csv. A no-op when the
   * inventory, manual list and exclusions are unchanged since the last run.
   */
  async refreshStats(options: StageOptions = {}): Promise<RefreshSummary> {
    return this.runStage('refresh', () => this.refresh.refreshStats(options.signal));
  }

  /**
   * Append newly observed repository interactions to user_interactions.csv
   */
  async collectInteractions(options: StageOptions = {}): Promise<CollectionSummary> {
    return this.runStage('interactions', () => this.interactions.collect(options.signal));
  }

  async collectUserDetails(options: UserDetailStageOptions = {}): Promise<UserDetailSummary> {
    return this.runStage('user-details', () => this.userDetails.collect(options));
  }

  async classifyUsers(options: StageOptions = {}): Promise<ClassificationSummary> {
    return this.runStage('classify', () =>
      this.classifier.classifyTable(this.tables, { signal: options.signal, geocoder: this.geocoder })
    );
  }

  /**
   * Replace or add an inventory source
   */
  registerConnector(connector: Connector): void {
    this.connectors.set(connector.name, connector);
    this.core.logger.info('Connector registered', { source: connector.name });
  }

  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  async close(): Promise<void> {
    await this.etagCache.disconnect();
  }

  private async runStage<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    const runId = generateRunId();
    const startTime = Date.now();
    this.core.logger.info('Stage started', { stage, runId });

    try {
      const result = await withStageSpan(stage, runId, () => fn());
      this.core.logger.info('Stage finished', { stage, runId, durationMs: Date.now() - startTime });
      return result;
    } catch (error: unknown) {
      this.core.logger.error('Stage failed', { stage, runId, error });
      throw error;
    } finally {
      this.core.metrics.recordLatency('stage_duration', Date.now() - startTime, { stage });
    }
  }

  private registerDefaultConnectors(): void {
    const deps: CoreDeps = this.core;
    const urls = { ...DEFAULT_SOURCE_URLS, ...this.config.inventory.sourceUrls };

    for (const source of this.config.inventory.sources) {
      switch (source) {
        case 'lf-energy-landscape':
          this.registerConnector(new LfEnergyLandscapeConnector(deps, urls[source]));
          break;
        case 'opensustain-tech':
          this.registerConnector(new OpenSustainTechConnector(deps, urls[source]));
          break;
        case 'g-pst':
          this.registerConnector(new GpstOpenToolsConnector(deps, urls[source]));
          break;
      }
    }
  }
}
