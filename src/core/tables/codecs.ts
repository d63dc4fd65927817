// src/core/tables/codecs.ts

import type { TableRow } from './TableStore';
import type {
  DroppedRecord,
  ExclusionEntry,
  InventoryEntry,
  InventorySource,
  ManualListEntry,
  ToolRecord,
  ToolStats,
} from '../inventory/types';
import { INVENTORY_SOURCES } from '../../config/ConfigValidator';

export const TABLES = {
  inventory: 'inventory.csv',
  tools: 'tools.csv',
  stats: 'stats.csv',
  dropped: 'dropped.csv',
  interactions: 'user_interactions.csv',
  userDetails: 'user_details.csv',
} as const;

export const STATE_FILES = {
  refresh: 'state/refresh-state.json',
  cursor: 'state/collector-cursor.json',
  geocodeCache: 'state/geocode-cache.json',
} as const;

export const INVENTORY_COLUMNS = ['name', 'url', 'description', 'category', 'source'] as const;

export const TOOL_COLUMNS = [
  'name',
  'normalized_name',
  'source_url',
  'inventory_origin',
  'description',
  'category',
] as const;

export const STATS_COLUMNS = [
  'source_url',
  'name',
  'normalized_name',
  'inventory_origin',
  'description',
  'category',
  'owner',
  'language',
  'license',
  'archived',
  'created_at',
  'updated_at',
  'last_pushed_at',
  'stars',
  'forks',
  'contributor_count',
  'dependents_count',
  'downloads_last_month',
  'latest_release_published_at',
  'dds_score',
  'dds_has_data',
  'documentation_url',
  'data_gap',
] as const;

export const DROPPED_COLUMNS = [
  'normalized_name',
  'name',
  'source_url',
  'inventory_origin',
  'stage',
  'reason',
] as const;

export const INTERACTION_COLUMNS = ['login', 'repository', 'interaction_type', 'timestamp'] as const;

export const USER_PROFILE_FIELDS = [
  'name',
  'company',
  'blog',
  'location',
  'email_domain',
  'bio',
  'twitter_username',
  'followers',
  'following',
  'orgs',
  'repos',
  'readme',
] as const;

export const USER_DETAIL_COLUMNS = [
  'login',
  ...USER_PROFILE_FIELDS,
  'organisation',
  'country',
  'category',
  'rule_id',
] as const;

const SOURCES: readonly InventorySource[] = [...INVENTORY_SOURCES, 'manual'];

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function numberCell(value: number | undefined): string {
  return value === undefined ? '' : String(value);
}

function booleanCell(value: boolean | undefined): string {
  return value === undefined ? '' : String(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  const cell = blankToUndefined(value);
  if (cell === 'true') return true;
  if (cell === 'false') return false;
  return undefined;
}

function parseNumber(value: string | undefined): number | undefined {
  const cell = blankToUndefined(value);
  if (cell === undefined) return undefined;
  const parsed = Number(cell);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function isInventorySource(value: string): value is InventorySource {
  return SOURCES.some((source) => source === value);
}

export function parseOrigin(value: string | undefined): InventorySource[] {
  return (value ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(isInventorySource);
}

export function formatOrigin(origin: readonly InventorySource[]): string {
  return [...new Set(origin)].sort().join(',');
}

// Inventory

export function inventoryEntryToRow(entry: InventoryEntry): TableRow {
  return {
    name: entry.name,
    url: entry.url ?? '',
    description: entry.description ?? '',
    category: entry.category ?? '',
    source: entry.source,
  };
}

export function rowToInventoryEntry(row: TableRow): InventoryEntry | undefined {
  const name = blankToUndefined(row.name);
  const source = row.source?.trim() ?? '';
  if (!name || !isInventorySource(source)) return undefined;

  return {
    name,
    url: blankToUndefined(row.url),
    description: blankToUndefined(row.description),
    category: blankToUndefined(row.category),
    source,
  };
}

export function rowToManualListEntry(row: TableRow): ManualListEntry | undefined {
  const sourceUrl = blankToUndefined(row.source_url);
  if (!sourceUrl) return undefined;
  return { sourceUrl, name: blankToUndefined(row.name) };
}

export function rowToExclusion(row: TableRow): ExclusionEntry | undefined {
  const key = blankToUndefined(row.normalized_name_or_url);
  if (!key) return undefined;
  return { key, reason: blankToUndefined(row.reason) ?? 'no reason given' };
}

// Tools

export function toolToRow(tool: ToolRecord): TableRow {
  return {
    name: tool.name,
    normalized_name: tool.normalizedName,
    source_url: tool.sourceUrl ?? '',
    inventory_origin: formatOrigin(tool.inventoryOrigin),
    description: tool.description ?? '',
    category: tool.category ?? '',
  };
}

export function statsToRow(stats: ToolStats): TableRow {
  return {
    ...toolToRow(stats),
    owner: stats.owner ?? '',
    language: stats.language ?? '',
    license: stats.license ?? '',
    archived: booleanCell(stats.archived),
    created_at: stats.createdAt ?? '',
    updated_at: stats.updatedAt ?? '',
    last_pushed_at: stats.lastPushedAt ?? '',
    stars: numberCell(stats.stars),
    forks: numberCell(stats.forks),
    contributor_count: numberCell(stats.contributorCount),
    dependents_count: numberCell(stats.dependentsCount),
    downloads_last_month: numberCell(stats.downloadsLastMonth),
    latest_release_published_at: stats.latestReleasePublishedAt ?? '',
    dds_score: stats.ddsHasData ? numberCell(stats.ddsScore) : '',
    dds_has_data: String(stats.ddsHasData),
    documentation_url: stats.documentationUrl ?? '',
    data_gap: stats.dataGap.join(';'),
  };
}

export function rowToStats(row: TableRow): ToolStats | undefined {
  const name = blankToUndefined(row.name);
  const normalizedName = blankToUndefined(row.normalized_name);
  if (!name || !normalizedName) return undefined;

  return {
    name,
    normalizedName,
    sourceUrl: blankToUndefined(row.source_url),
    inventoryOrigin: parseOrigin(row.inventory_origin),
    description: blankToUndefined(row.description),
    category: blankToUndefined(row.category),
    owner: blankToUndefined(row.owner),
    language: blankToUndefined(row.language),
    license: blankToUndefined(row.license),
    archived: parseBoolean(row.archived),
    createdAt: blankToUndefined(row.created_at),
    updatedAt: blankToUndefined(row.updated_at),
    lastPushedAt: blankToUndefined(row.last_pushed_at),
    stars: parseNumber(row.stars),
    forks: parseNumber(row.forks),
    contributorCount: parseNumber(row.contributor_count),
    dependentsCount: parseNumber(row.dependents_count),
    downloadsLastMonth: parseNumber(row.downloads_last_month),
    latestReleasePublishedAt: blankToUndefined(row.latest_release_published_at),
    ddsScore: parseNumber(row.dds_score),
    ddsHasData: row.dds_has_data === 'true',
    documentationUrl: blankToUndefined(row.documentation_url),
    dataGap: (row.data_gap ?? '').split(';').filter(Boolean),
  };
}

export function droppedToRow(dropped: DroppedRecord): TableRow {
  return {
    normalized_name: dropped.normalizedName,
    name: dropped.name,
    source_url: dropped.sourceUrl ?? '',
    inventory_origin: formatOrigin(dropped.inventoryOrigin),
    stage: dropped.stage,
    reason: dropped.reason,
  };
}
