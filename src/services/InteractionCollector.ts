// src/services/InteractionCollector.ts

import { z } from 'zod';
import type { GitHubClient } from '../clients/github/GitHubClient';
import type { TableStore } from '../core/tables/TableStore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { InteractionType } from '../config/ConfigValidator';
import type { UserInteractionRecord } from '../core/users/types';
import { INTERACTION_COLUMNS, STATE_FILES, TABLES, rowToStats } from '../core/tables/codecs';
import { githubRepository } from '../core/inventory/normalize';
import { interactionIdentity, interactionToRow } from '../core/users/records';
import { pendingLogins, readLedger, readUserDetails } from '../core/users/ledger';
import { COLLECTOR_CURSOR_VERSION, CollectorCursorSchema, type CollectorCursor } from '../core/state/types';
import { waitForQuota } from '../clients/github/quota';
import { ApiClientError, QuotaExceededError, RunCancelledError } from '../utils/errors';

const UserRefSchema = z.object({ login: z.string() }).nullish();

const StargazerSchema = z.object({ starred_at: z.string().nullish(), user: UserRefSchema });
const ForkSchema = z.object({ created_at: z.string().nullish(), owner: UserRefSchema });
const IssueSchema = z.object({
  created_at: z.string().nullish(),
  user: UserRefSchema,
  pull_request: z.unknown().optional(),
});
const AuthoredSchema = z.object({ created_at: z.string().nullish(), user: UserRefSchema });

export interface CollectorOptions {
  interactionTypes: readonly InteractionType[];
  maxQuotaWaitMs: number;
}

export interface CollectionSummary {
  repositories: number;
  scanned: number;
  rowsAppended: number;
  skipped: string[]; // non-GitHub source URLs
  failed: string[];
  completed: boolean;
  pendingLogins: string[];
}

/**
 * Re-scans every GitHub repository in stats.csv and appends interaction
 * tuples the ledger has not seen. Existing rows are never touched. A cursor
 * records the last finished repository so that a run stopped by the quota
 * resumes after it.
 */
export class InteractionCollector {
  constructor(
    private github: GitHubClient,
    private tables: TableStore,
    private options: CollectorOptions,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async collect(signal?: AbortSignal): Promise<CollectionSummary> {
    const { repositories, skipped } = await this.repositories();
    const cursor = await this.tables.readJson(STATE_FILES.cursor, CollectorCursorSchema);

    const remaining = cursor
      ? repositories.filter((repo) => repo > cursor.lastCompletedRepository)
      : repositories;
    if (cursor) {
      this.logger.info('Resuming interaction scan', {
        after: cursor.lastCompletedRepository,
        remaining: remaining.length,
      });
    }

    const seen = new Set((await readLedger(this.tables)).map(interactionIdentity));
    const failed: string[] = [];
    let scanned = 0;
    let rowsAppended = 0;
    let stopped = false;

    for (const repo of remaining) {
      if (signal?.aborted) {
        throw new RunCancelledError('Interaction scan cancelled');
      }

      const records = await this.scanWithQuota(repo, failed, signal);
      if (records === 'stop') {
        stopped = true;
        break;
      }

      if (records) {
        const fresh = records.filter((record) => {
          const identity = interactionIdentity(record);
          if (seen.has(identity)) return false;
          seen.add(identity);
          return true;
        });

        await this.tables.append(TABLES.interactions, INTERACTION_COLUMNS, fresh.map(interactionToRow));
        for (const record of fresh) {
          this.metrics.incrementCounter('ledger_rows_appended', { interaction: record.interactionType });
        }
        rowsAppended += fresh.length;
        scanned++;

        this.logger.info('Repository scanned', { repo, observed: records.length, appended: fresh.length });
      }

      const next: CollectorCursor = {
        version: COLLECTOR_CURSOR_VERSION,
        lastCompletedRepository: repo,
        updatedAt: new Date().toISOString(),
      };
      await this.tables.writeJson(STATE_FILES.cursor, next);
    }

    if (!stopped) {
      await this.tables.remove(STATE_FILES.cursor);
    }

    const pending = pendingLogins(await readLedger(this.tables), await readUserDetails(this.tables));

    this.logger.info('Interaction scan finished', {
      completed: !stopped,
      scanned,
      rowsAppended,
      failed: failed.length,
      pendingLogins: pending.length,
    });

    return {
      repositories: repositories.length,
      scanned,
      rowsAppended,
      skipped,
      failed,
      completed: !stopped,
      pendingLogins: pending,
    };
  }

  /**
   * @returns the repository's records, undefined if it failed, or 'stop' when
   * the quota is spent for longer than we are allowed to wait
   */
  private async scanWithQuota(
    repo: string,
    failed: string[],
    signal?: AbortSignal
  ): Promise<UserInteractionRecord[] | undefined | 'stop'> {
    for (;;) {
      try {
        return await this.scanRepository(repo, signal);
      } catch (error: unknown) {
        if (error instanceof QuotaExceededError) {
          const waited = await waitForQuota(error, this.options.maxQuotaWaitMs, this.logger, this.metrics, signal);
          if (waited) continue;
          return 'stop';
        }
        if (error instanceof RunCancelledError) throw error;

        if (error instanceof ApiClientError && error.status === 404) {
          this.logger.warn('Repository not found on GitHub', { repo });
          return [];
        }

        failed.push(repo);
        this.logger.error('Repository scan failed', {
          repo,
          error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
      }
    }
  }

  /**
   * Lists every interaction type in parallel. The first failure aborts the
   * sibling listings so no further pages are fetched for a repository that
   * is already lost.
   */
  async scanRepository(repo: string, signal?: AbortSignal): Promise<UserInteractionRecord[]> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const batches = await Promise.all(
        this.options.interactionTypes.map((type) =>
          this.listInteractions(repo, type, controller.signal).catch((error: unknown) => {
            controller.abort();
            throw error;
          })
        )
      );
      return batches.flat();
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async listInteractions(
    repo: string,
    type: InteractionType,
    signal?: AbortSignal
  ): Promise<UserInteractionRecord[]> {
    const record = (login: string | undefined, timestamp: string | null | undefined) =>
      login ? [{ login, repository: repo, interactionType: type, timestamp: timestamp ?? '' }] : [];

    switch (type) {
      case 'stargazer': {
        const items = await this.github.paginate(`/repos/${repo}/stargazers`, StargazerSchema, {
          accept: 'application/vnd.github.star+json',
          signal,
        });
        return items.flatMap((item) => record(item.user?.login, item.starred_at));
      }
      case 'fork': {
        const items = await this.github.paginate(`/repos/${repo}/forks`, ForkSchema, { signal });
        return items.flatMap((item) => record(item.owner?.login, item.created_at));
      }
      case 'issue': {
        const items = await this.github.paginate(`/repos/${repo}/issues`, IssueSchema, {
          query: { state: 'all' },
          signal,
        });
        // The issues endpoint also lists pull requests
        return items
          .filter((item) => item.pull_request === undefined)
          .flatMap((item) => record(item.user?.login, item.created_at));
      }
      case 'pull': {
        const items = await this.github.paginate(`/repos/${repo}/pulls`, AuthoredSchema, {
          query: { state: 'all' },
          signal,
        });
        return items.flatMap((item) => record(item.user?.login, item.created_at));
      }
      case 'comment': {
        const items = await this.github.paginate(`/repos/${repo}/issues/comments`, AuthoredSchema, { signal });
        return items.flatMap((item) => record(item.user?.login, item.created_at));
      }
    }
  }

  private async repositories(): Promise<{ repositories: string[]; skipped: string[] }> {
    const rows = await this.tables.read(TABLES.stats);
    const repositories = new Set<string>();
    const skipped: string[] = [];

    for (const stats of rows.flatMap((row) => rowToStats(row) ?? [])) {
      const repo = githubRepository(stats.sourceUrl);
      if (repo) {
        repositories.add(repo);
      } else {
        skipped.push(stats.sourceUrl ?? stats.name);
        this.logger.info('Skipping non-GitHub repository', { name: stats.name, sourceUrl: stats.sourceUrl });
      }
    }

    return { repositories: [...repositories].sort(), skipped };
  }
}
