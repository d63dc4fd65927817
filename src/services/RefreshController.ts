// src/services/RefreshController.ts

import { createHash } from 'crypto';
import type { TableStore } from '../core/tables/TableStore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { StatsEnricher } from './StatsEnricher';
import type { FilterService } from './FilterService';
import type { ExclusionEntry, InventoryEntry, ManualListEntry } from '../core/inventory/types';
import { mergeInventories, manualListToEntries } from './MergeDedupService';
import {
  DROPPED_COLUMNS,
  STATE_FILES,
  STATS_COLUMNS,
  TABLES,
  TOOL_COLUMNS,
  droppedToRow,
  rowToExclusion,
  rowToInventoryEntry,
  rowToManualListEntry,
  statsToRow,
  toolToRow,
} from '../core/tables/codecs';
import { REFRESH_STATE_VERSION, RefreshStateSchema, type RefreshState } from '../core/state/types';
import { RunCancelledError } from '../utils/errors';

export interface RefreshInputs {
  manualListPath: string;
  exclusionsPath: string;
}

export interface RefreshSummary {
  skipped: boolean;
  fingerprint: string;
  tools: number;
  dropped: number;
  gapFraction: number;
}

/**
 * Runs merge, filter and enrichment only when one of the inputs changed
 * since the last successful run. The saved state is read once at the start
 * and replaced only after every output table has been written.
 */
export class RefreshController {
  constructor(
    private tables: TableStore,
    private filter: FilterService,
    private enricher: StatsEnricher,
    private inputs: RefreshInputs,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async fingerprint(): Promise<{ fingerprint: string; inputs: RefreshState['inputs'] }> {
    const inputs = {
      inventory: await this.tables.contentHash(TABLES.inventory),
      manualList: await this.tables.contentHash(this.inputs.manualListPath),
      exclusions: await this.tables.contentHash(this.inputs.exclusionsPath),
    };
    const fingerprint = createHash('sha256')
      .update([inputs.inventory, inputs.manualList, inputs.exclusions].join('\n'))
      .digest('hex');
    return { fingerprint, inputs };
  }

  async refreshStats(signal?: AbortSignal): Promise<RefreshSummary> {
    const previous = await this.tables.readJson(STATE_FILES.refresh, RefreshStateSchema);
    const { fingerprint, inputs } = await this.fingerprint();

    if (previous?.fingerprint === fingerprint && (await this.tables.exists(TABLES.stats))) {
      this.logger.info('Inputs unchanged since last refresh, skipping', {
        fingerprint,
        completedAt: previous.completedAt,
      });
      return { skipped: true, fingerprint, tools: 0, dropped: 0, gapFraction: 0 };
    }

    const inventory = await this.readInventory();
    const manualList = await this.readManualList();
    const exclusions = await this.readExclusions();

    const merged = mergeInventories(
      { inventories: [inventory, manualListToEntries(manualList)], exclusions },
      this.logger
    );
    for (const stage of ['merge', 'exclusion'] as const) {
      const count = merged.dropped.filter((record) => record.stage === stage).length;
      if (count > 0) this.metrics.incrementCounter('records_dropped', { stage }, count);
    }

    const candidates = this.filter.beforeEnrichment(merged.records);
    const batch = await this.enricher.enrichAll(candidates.kept, signal);
    const enriched = this.filter.afterEnrichment(batch.outcomes);

    if (signal?.aborted) {
      throw new RunCancelledError('Refresh cancelled before writing outputs');
    }

    const dropped = [...merged.dropped, ...candidates.dropped, ...enriched.dropped];

    await this.tables.write(TABLES.tools, TOOL_COLUMNS, candidates.kept.map(toolToRow));
    await this.tables.write(TABLES.stats, STATS_COLUMNS, enriched.kept.map(statsToRow));
    await this.tables.write(TABLES.dropped, DROPPED_COLUMNS, dropped.map(droppedToRow));

    const state: RefreshState = {
      version: REFRESH_STATE_VERSION,
      fingerprint,
      inputs,
      completedAt: new Date().toISOString(),
    };
    await this.tables.writeJson(STATE_FILES.refresh, state);

    this.logger.info('Stats refreshed', {
      tools: enriched.kept.length,
      dropped: dropped.length,
      gapFraction: batch.gapFraction,
    });

    return {
      skipped: false,
      fingerprint,
      tools: enriched.kept.length,
      dropped: dropped.length,
      gapFraction: batch.gapFraction,
    };
  }

  private async readInventory(): Promise<InventoryEntry[]> {
    const rows = await this.tables.read(TABLES.inventory);
    return this.keepValid(rows.map(rowToInventoryEntry), TABLES.inventory);
  }

  private async readManualList(): Promise<ManualListEntry[]> {
    const rows = await this.tables.read(this.inputs.manualListPath);
    return this.keepValid(rows.map(rowToManualListEntry), this.inputs.manualListPath);
  }

  private async readExclusions(): Promise<ExclusionEntry[]> {
    const rows = await this.tables.read(this.inputs.exclusionsPath);
    return this.keepValid(rows.map(rowToExclusion), this.inputs.exclusionsPath);
  }

  private keepValid<T>(rows: readonly (T | undefined)[], table: string): T[] {
    const valid = rows.filter((row): row is T => row !== undefined);
    if (valid.length < rows.length) {
      this.logger.warn('Skipped unreadable rows', { table, skipped: rows.length - valid.length });
    }
    return valid;
  }
}
