// src/connectors/BaseConnector.ts

import { z } from 'zod';
import type { Connector, FetchParams, CoreDeps } from './types';
import type { InventorySourceName } from '../config/ConfigValidator';
import type { InventoryEntry } from '../core/inventory/types';
import { PipelineError, RunCancelledError, SourceUnavailableError } from '../utils/errors';

const blankToUndefined = (value: unknown) =>
  value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value;

/**
 * Shape every source row must have before it reaches the merge stage
 */
export const CandidateSchema = z.object({
  name: z.string().trim().min(1),
  url: z.preprocess(blankToUndefined, z.string().trim().optional()),
  description: z.preprocess(blankToUndefined, z.string().trim().optional()),
  category: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export abstract class BaseConnector implements Connector {
  abstract readonly name: InventorySourceName;

  constructor(
    protected deps: CoreDeps,
    protected sourceUrl: string
  ) {}

  /**
   * Fetch and validate the source. Anything that goes wrong on the way
   * surfaces as SourceUnavailableError so the loader can carry on with the
   * other sources.
   */
  async fetch(params: FetchParams = {}): Promise<InventoryEntry[]> {
    let candidates: unknown[];
    try {
      candidates = await this.fetchCandidates(params);
    } catch (error: unknown) {
      if (error instanceof RunCancelledError) throw error;

      const message = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(`Inventory source ${this.name} unavailable: ${message}`, this.name, {
        url: this.sourceUrl,
        code: error instanceof PipelineError ? error.code : undefined,
      });
    }

    const entries: InventoryEntry[] = [];
    for (const [index, candidate] of candidates.entries()) {
      const result = CandidateSchema.safeParse(candidate);
      if (!result.success) {
        this.deps.logger.warn('Skipping invalid inventory row', {
          source: this.name,
          index,
          issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        continue;
      }
      entries.push({ ...result.data, source: this.name });
    }

    this.deps.logger.info('Inventory source loaded', {
      source: this.name,
      rows: entries.length,
      skipped: candidates.length - entries.length,
    });
    return entries;
  }

  /**
   * Raw rows in the rough shape of {@link CandidateSchema}; validation happens in fetch()
   */
  protected abstract fetchCandidates(params: FetchParams): Promise<unknown[]>;
}
