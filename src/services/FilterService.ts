// src/services/FilterService.ts

import type { DroppedRecord, ToolRecord, ToolStats } from '../core/inventory/types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { isGitHostUrl } from '../core/inventory/normalize';
import { toDropped } from './MergeDedupService';

export const REASON_NO_REPOSITORY = 'no resolvable repository url';
export const REASON_NOT_FOUND = 'repository not found';
export const REASON_ACCESS_DENIED = 'repository access denied';

/**
 * Outcome of one enrichment: either stats, or the reason the metrics
 * service refused the repository outright.
 */
export type EnrichmentOutcome =
  | { kind: 'enriched'; stats: ToolStats }
  | { kind: 'rejected'; record: ToolRecord; reason: typeof REASON_NOT_FOUND | typeof REASON_ACCESS_DENIED };

export interface FilterResult<T> {
  kept: T[];
  dropped: DroppedRecord[];
}

export class FilterService {
  constructor(
    private logger: Logger,
    private metrics?: MetricsCollector
  ) {}

  /**
   * Keep only records whose source URL points at a Git host
   */
  beforeEnrichment(records: readonly ToolRecord[]): FilterResult<ToolRecord> {
    const kept: ToolRecord[] = [];
    const dropped: DroppedRecord[] = [];

    for (const record of records) {
      if (isGitHostUrl(record.sourceUrl)) {
        kept.push(record);
      } else {
        dropped.push(toDropped(record, 'filter', REASON_NO_REPOSITORY));
      }
    }

    this.report('filter', dropped);
    return { kept, dropped };
  }

  /**
   * Drop records the metrics service does not know or may not see. Every
   * other gap stays on the record as a data_gap annotation.
   */
  afterEnrichment(outcomes: readonly EnrichmentOutcome[]): FilterResult<ToolStats> {
    const kept: ToolStats[] = [];
    const dropped: DroppedRecord[] = [];

    for (const outcome of outcomes) {
      if (outcome.kind === 'enriched') {
        kept.push(outcome.stats);
      } else {
        dropped.push(toDropped(outcome.record, 'enrichment', outcome.reason));
      }
    }

    this.report('enrichment', dropped);
    return { kept, dropped };
  }

  private report(stage: 'filter' | 'enrichment', dropped: readonly DroppedRecord[]): void {
    if (dropped.length === 0) return;

    this.metrics?.incrementCounter('records_dropped', { stage }, dropped.length);
    for (const record of dropped) {
      this.logger.info('Record dropped', {
        stage,
        normalizedName: record.normalizedName,
        sourceUrl: record.sourceUrl,
        reason: record.reason,
      });
    }
  }
}
