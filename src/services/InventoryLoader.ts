// src/services/InventoryLoader.ts

import type { Connector } from '../connectors/types';
import type { InventoryEntry } from '../core/inventory/types';
import type { TableStore } from '../core/tables/TableStore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { InventorySourceName } from '../config/ConfigValidator';
import { INVENTORY_COLUMNS, TABLES, inventoryEntryToRow } from '../core/tables/codecs';
import { RunCancelledError, SourceUnavailableError, TotalConnectivityError } from '../utils/errors';

export interface InventorySummary {
  rows: number;
  bySource: Partial<Record<InventorySourceName, number>>;
  failedSources: InventorySourceName[];
}

/**
 * Pulls every configured inventory source and writes the raw union to
 * inventory.csv in source priority order.
 */
export class InventoryLoader {
  constructor(
    private connectors: readonly Connector[],
    private tables: TableStore,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async collect(signal?: AbortSignal): Promise<InventorySummary> {
    const results = await Promise.allSettled(this.connectors.map((connector) => connector.fetch({ signal })));

    if (signal?.aborted) {
      throw new RunCancelledError('Inventory collection cancelled');
    }

    const entries: InventoryEntry[] = [];
    const bySource: Partial<Record<InventorySourceName, number>> = {};
    const failedSources: InventorySourceName[] = [];

    results.forEach((result, index) => {
      const source = this.connectors[index].name;

      if (result.status === 'fulfilled') {
        entries.push(...result.value);
        bySource[source] = result.value.length;
        return;
      }

      const error: unknown = result.reason;
      if (!(error instanceof SourceUnavailableError)) {
        throw error;
      }

      failedSources.push(source);
      this.metrics.incrementCounter('inventory_source_failures', { source });
      this.logger.warn('Inventory source unavailable', { source, error: error.message });
    });

    if (this.connectors.length > 0 && failedSources.length === this.connectors.length) {
      throw new TotalConnectivityError('Every inventory source failed', { sources: failedSources });
    }

    await this.tables.write(TABLES.inventory, INVENTORY_COLUMNS, entries.map(inventoryEntryToRow));

    this.logger.info('Inventory collected', { rows: entries.length, bySource, failedSources });
    return { rows: entries.length, bySource, failedSources };
  }
}
