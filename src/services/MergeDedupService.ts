// src/services/MergeDedupService.ts

import type {
  DroppedRecord,
  DropStage,
  ExclusionEntry,
  InventoryEntry,
  ManualListEntry,
  ToolRecord,
} from '../core/inventory/types';
import type { Logger } from '../observability/Logger';
import { normalizeName, normalizeUrl } from '../core/inventory/normalize';

export interface MergeInput {
  /** Raw inventory tables, highest priority first */
  inventories: readonly (readonly InventoryEntry[])[];
  exclusions: readonly ExclusionEntry[];
}

export interface MergeResult {
  records: ToolRecord[];
  dropped: DroppedRecord[];
}

type MergeableField = 'sourceUrl' | 'description' | 'category';
const MERGEABLE_FIELDS: readonly MergeableField[] = ['sourceUrl', 'description', 'category'];

/**
 * Union the inventories, collapse duplicates by normalized name and then by
 * normalized repository URL, and subtract the exclusion list. The earliest
 * record in priority order keeps its display fields; gaps are filled from
 * later duplicates. No I/O, and the same input always gives the same output.
 */
export function mergeInventories(input: MergeInput, logger?: Logger): MergeResult {
  const dropped: DroppedRecord[] = [];

  const drafts = input.inventories.flat().map(toDraft);

  const byName = collapse(
    drafts,
    (record) => record.normalizedName,
    dropped,
    logger
  );
  const byUrl = collapse(byName, (record) => record.sourceUrl, dropped, logger);

  const records: ToolRecord[] = [];
  for (const record of byUrl) {
    const exclusion = input.exclusions.find((entry) => matchesExclusion(entry, record));
    if (exclusion) {
      logger?.warn('Record excluded', {
        normalizedName: record.normalizedName,
        sourceUrl: record.sourceUrl,
        reason: exclusion.reason,
      });
      dropped.push(toDropped(record, 'exclusion', `excluded: ${exclusion.reason}`));
      continue;
    }
    records.push({ ...record, inventoryOrigin: [...new Set(record.inventoryOrigin)].sort() });
  }

  records.sort((a, b) => compare(a.normalizedName, b.normalizedName));
  return { records, dropped };
}

/**
 * The pre-compiled list names tools by repository URL; the display name
 * defaults to the last path segment.
 */
export function manualListToEntries(entries: readonly ManualListEntry[]): InventoryEntry[] {
  return entries.map((entry) => {
    const url = normalizeUrl(entry.sourceUrl);
    const name = entry.name ?? url?.split('/').pop() ?? entry.sourceUrl;
    return { name, url, source: 'manual' };
  });
}

export function toDropped(record: ToolRecord, stage: DropStage, reason: string): DroppedRecord {
  return {
    normalizedName: record.normalizedName,
    name: record.name,
    sourceUrl: record.sourceUrl,
    inventoryOrigin: [...new Set(record.inventoryOrigin)].sort(),
    stage,
    reason,
  };
}

function toDraft(entry: InventoryEntry): ToolRecord {
  return {
    name: entry.name.trim(),
    normalizedName: normalizeName(entry.name),
    sourceUrl: normalizeUrl(entry.url),
    inventoryOrigin: [entry.source],
    description: entry.description,
    category: entry.category,
  };
}

function collapse(
  records: readonly ToolRecord[],
  keyOf: (record: ToolRecord) => string | undefined,
  dropped: DroppedRecord[],
  logger?: Logger
): ToolRecord[] {
  const kept = new Map<string, ToolRecord>();
  const result: ToolRecord[] = [];

  for (const record of records) {
    const key = keyOf(record);
    if (key === undefined) {
      result.push(record);
      continue;
    }

    const canonical = kept.get(key);
    if (!canonical) {
      const copy = { ...record, inventoryOrigin: [...record.inventoryOrigin] };
      kept.set(key, copy);
      result.push(copy);
      continue;
    }

    absorb(canonical, record, logger);
    dropped.push(toDropped(record, 'merge', `duplicate-of:${key}`));
  }

  return result;
}

function absorb(canonical: ToolRecord, duplicate: ToolRecord, logger?: Logger): void {
  canonical.inventoryOrigin.push(...duplicate.inventoryOrigin);

  for (const field of MERGEABLE_FIELDS) {
    const current = canonical[field];
    const incoming = duplicate[field];
    if (incoming === undefined) continue;

    if (current === undefined) {
      canonical[field] = incoming;
    } else if (current !== incoming) {
      logger?.warn('RecordAmbiguous', {
        normalizedName: canonical.normalizedName,
        field,
        kept: current,
        ignored: incoming,
        from: duplicate.inventoryOrigin.join(','),
      });
    }
  }
}

function matchesExclusion(entry: ExclusionEntry, record: ToolRecord): boolean {
  if (normalizeName(entry.key) === record.normalizedName) return true;
  return record.sourceUrl !== undefined && normalizeUrl(entry.key) === record.sourceUrl;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
