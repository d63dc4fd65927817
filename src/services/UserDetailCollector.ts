// src/services/UserDetailCollector.ts

import type { GitHubClient, GitHubUser } from '../clients/github/GitHubClient';
import type { TableStore } from '../core/tables/TableStore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { UserDetailRecord, UserProfile } from '../core/users/types';
import { TABLES, USER_DETAIL_COLUMNS } from '../core/tables/codecs';
import { pendingLogins, readLedger, readUserDetails, repositoriesByLogin } from '../core/users/ledger';
import { userDetailToRow } from '../core/users/records';
import { waitForQuota } from '../clients/github/quota';
import { QuotaExceededError, RunCancelledError } from '../utils/errors';

export interface UserDetailOptions {
  refreshProfiles?: boolean;
  signal?: AbortSignal;
}

export interface UserDetailSummary {
  requested: number;
  fetched: number;
  failed: string[];
  completed: boolean;
}

export function emailDomain(email: string | null | undefined): string {
  if (!email) return '';
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1).toLowerCase() : '';
}

function text(value: string | null | undefined): string {
  return value?.trim() ?? '';
}

function count(value: number | null | undefined): string {
  return typeof value === 'number' ? String(value) : '';
}

export function toProfile(user: GitHubUser, orgs: readonly string[], repos: readonly string[], readme: string): UserProfile {
  return {
    name: text(user.name),
    company: text(user.company),
    blog: text(user.blog),
    location: text(user.location),
    email_domain: emailDomain(user.email),
    bio: text(user.bio),
    twitter_username: text(user.twitter_username),
    followers: count(user.followers),
    following: count(user.following),
    orgs: [...orgs].sort().join(','),
    repos: [...repos].sort().join(','),
    readme: readme.trim(),
  };
}

/**
 * Fetches profile fields for logins the ledger knows but user_details.csv
 * does not. Existing rows are only re-fetched when `refreshProfiles` is set,
 * and even then their classification columns are carried over.
 */
export class UserDetailCollector {
  constructor(
    private github: GitHubClient,
    private tables: TableStore,
    private maxQuotaWaitMs: number,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async collect(options: UserDetailOptions = {}): Promise<UserDetailSummary> {
    const { signal } = options;
    const ledger = await readLedger(this.tables);
    const existing = await readUserDetails(this.tables);
    const reposByLogin = repositoriesByLogin(ledger);

    const targets = options.refreshProfiles ? [...reposByLogin.keys()].sort() : pendingLogins(ledger, existing);
    const refreshed = new Map<string, UserDetailRecord>();
    const failed: string[] = [];
    let fetched = 0;
    let completed = true;

    this.logger.info('Collecting user details', {
      users: targets.length,
      refreshProfiles: options.refreshProfiles ?? false,
    });

    for (const login of targets) {
      if (signal?.aborted) {
        throw new RunCancelledError('User detail collection cancelled');
      }

      const result = await this.fetchWithQuota(login, [...(reposByLogin.get(login) ?? [])], signal);
      if (result === 'stop') {
        completed = false;
        break;
      }
      if (!result) {
        failed.push(login);
        continue;
      }

      fetched++;
      if (options.refreshProfiles) {
        refreshed.set(login, result);
      } else {
        await this.tables.append(TABLES.userDetails, USER_DETAIL_COLUMNS, [userDetailToRow(result)]);
      }
    }

    if (options.refreshProfiles) {
      await this.rewrite(existing, refreshed);
    }

    this.logger.info('User details collected', { fetched, failed: failed.length, completed });
    return { requested: targets.length, fetched, failed, completed };
  }

  private async fetchWithQuota(
    login: string,
    repos: string[],
    signal?: AbortSignal
  ): Promise<UserDetailRecord | undefined | 'stop'> {
    for (;;) {
      try {
        const [user, orgs, readme] = await Promise.all([
          this.github.getUser(login, signal),
          this.github.getUserOrgs(login, signal),
          this.github.getProfileReadme(login, signal),
        ]);
        return {
          login,
          profile: toProfile(user, orgs, repos, readme),
          organisation: '',
          country: '',
          category: '',
          ruleId: '',
        };
      } catch (error: unknown) {
        if (error instanceof QuotaExceededError) {
          const waited = await waitForQuota(error, this.maxQuotaWaitMs, this.logger, this.metrics, signal);
          if (waited) continue;
          return 'stop';
        }
        if (error instanceof RunCancelledError) throw error;

        this.logger.warn('Failed to fetch user details', {
          login,
          error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
      }
    }
  }

  /**
   * Replace refreshed rows in place, keep their derived columns, append the rest
   */
  private async rewrite(existing: readonly UserDetailRecord[], refreshed: Map<string, UserDetailRecord>): Promise<void> {
    const rows: UserDetailRecord[] = [];
    const written = new Set<string>();

    for (const record of existing) {
      const update = refreshed.get(record.login);
      rows.push(
        update
          ? {
              ...update,
              organisation: record.organisation,
              country: record.country,
              category: record.category,
              ruleId: record.ruleId,
            }
          : record
      );
      written.add(record.login);
    }
    for (const [login, record] of refreshed) {
      if (!written.has(login)) rows.push(record);
    }

    await this.tables.write(TABLES.userDetails, USER_DETAIL_COLUMNS, rows.map(userDetailToRow));
  }
}
