// src/core/users/ledger.ts

import type { TableStore } from '../tables/TableStore';
import type { UserDetailRecord, UserInteractionRecord } from './types';
import { TABLES } from '../tables/codecs';
import { rowToInteraction, rowToUserDetail } from './records';

export async function readLedger(tables: TableStore): Promise<UserInteractionRecord[]> {
  const rows = await tables.read(TABLES.interactions);
  return rows.map(rowToInteraction).filter((record): record is UserInteractionRecord => record !== undefined);
}

export async function readUserDetails(tables: TableStore): Promise<UserDetailRecord[]> {
  const rows = await tables.read(TABLES.userDetails);
  return rows.map(rowToUserDetail).filter((record): record is UserDetailRecord => record !== undefined);
}

/**
 * Logins seen in the ledger that have no user detail row yet, sorted
 */
export function pendingLogins(
  ledger: readonly UserInteractionRecord[],
  details: readonly UserDetailRecord[]
): string[] {
  const known = new Set(details.map((detail) => detail.login));
  const pending = new Set(ledger.map((record) => record.login).filter((login) => !known.has(login)));
  return [...pending].sort();
}

/**
 * Repositories each login has interacted with
 */
export function repositoriesByLogin(ledger: readonly UserInteractionRecord[]): Map<string, Set<string>> {
  const byLogin = new Map<string, Set<string>>();
  for (const record of ledger) {
    const repos = byLogin.get(record.login) ?? new Set<string>();
    repos.add(record.repository);
    byLogin.set(record.login, repos);
  }
  return byLogin;
}
