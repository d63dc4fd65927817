// src/core/users/records.ts

import { INTERACTION_TYPES, type InteractionType } from '../../config/ConfigValidator';
import { USER_PROFILE_FIELDS } from '../tables/codecs';
import type { TableRow } from '../tables/TableStore';
import type { UserDetailRecord, UserInteractionRecord, UserProfile } from './types';

function isInteractionType(value: string): value is InteractionType {
  return INTERACTION_TYPES.some((type) => type === value);
}

/**
 * Ledger rows are merged on this tuple
 */
export function interactionIdentity(record: UserInteractionRecord): string {
  return [record.login, record.repository, record.interactionType, record.timestamp].join('\u0000');
}

export function interactionToRow(record: UserInteractionRecord): TableRow {
  return {
    login: record.login,
    repository: record.repository,
    interaction_type: record.interactionType,
    timestamp: record.timestamp,
  };
}

export function rowToInteraction(row: TableRow): UserInteractionRecord | undefined {
  const type = row.interaction_type ?? '';
  if (!row.login || !row.repository || !isInteractionType(type)) return undefined;
  return {
    login: row.login,
    repository: row.repository,
    interactionType: type,
    timestamp: row.timestamp ?? '',
  };
}

const EMPTY_PROFILE: UserProfile = {
  name: '',
  company: '',
  blog: '',
  location: '',
  email_domain: '',
  bio: '',
  twitter_username: '',
  followers: '',
  following: '',
  orgs: '',
  repos: '',
  readme: '',
};

export function emptyProfile(): UserProfile {
  return { ...EMPTY_PROFILE };
}

export function userDetailToRow(record: UserDetailRecord): TableRow {
  return {
    login: record.login,
    ...record.profile,
    organisation: record.organisation,
    country: record.country,
    category: record.category,
    rule_id: record.ruleId,
  };
}

export function rowToUserDetail(row: TableRow): UserDetailRecord | undefined {
  if (!row.login) return undefined;

  const profile = emptyProfile();
  for (const field of USER_PROFILE_FIELDS) {
    profile[field] = row[field] ?? '';
  }

  return {
    login: row.login,
    profile,
    organisation: row.organisation ?? '',
    country: row.country ?? '',
    category: row.category ?? '',
    ruleId: row.rule_id ?? '',
  };
}
