// tests/unit/codecs.test.ts

import { describe, it, expect } from 'vitest';
import { STATS_COLUMNS, formatOrigin, parseOrigin, rowToStats, statsToRow } from '../../src/core/tables/codecs';
import type { ToolStats } from '../../src/core/inventory/types';

const STATS: ToolStats = {
  name: 'GenX',
  normalizedName: 'genx',
  sourceUrl: 'https://github.com/genxproject/genx',
  inventoryOrigin: ['g-pst'],
  owner: 'GenXProject',
  language: 'Julia',
  license: 'gpl-2.0',
  archived: true,
  updatedAt: '2025-01-02T00:00:00Z',
  stars: 0,
  ddsHasData: false,
  dataGap: ['packages:timeout'],
};

describe('stats codecs', () => {
  it('should write repository metadata columns', () => {
    const row = statsToRow(STATS);

    expect(Object.keys(row).sort()).toEqual([...STATS_COLUMNS].sort());
    expect(row).toMatchObject({
      owner: 'GenXProject',
      language: 'Julia',
      license: 'gpl-2.0',
      archived: 'true',
      updated_at: '2025-01-02T00:00:00Z',
      stars: '0',
      forks: '',
      dds_score: '',
      dds_has_data: 'false',
      data_gap: 'packages:timeout',
    });
  });

  it('should leave archived blank when unknown', () => {
    expect(statsToRow({ ...STATS, archived: undefined }).archived).toBe('');
    expect(rowToStats({ ...statsToRow(STATS), archived: '' })?.archived).toBeUndefined();
  });

  it('should read back what it writes', () => {
    expect(rowToStats(statsToRow(STATS))).toEqual({
      ...STATS,
      description: undefined,
      category: undefined,
      createdAt: undefined,
      lastPushedAt: undefined,
      forks: undefined,
      contributorCount: undefined,
      dependentsCount: undefined,
      downloadsLastMonth: undefined,
      latestReleasePublishedAt: undefined,
      ddsScore: undefined,
      documentationUrl: undefined,
    });
  });

  it('should skip rows without a name', () => {
    expect(rowToStats({ name: '', normalized_name: 'x' })).toBeUndefined();
  });
});

describe('origin', () => {
  it('should sort, dedupe and drop unknown sources', () => {
    expect(formatOrigin(['manual', 'g-pst', 'manual'])).toBe('g-pst,manual');
    expect(parseOrigin('g-pst, bogus ,manual')).toEqual(['g-pst', 'manual']);
  });
});
