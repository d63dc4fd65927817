// src/core/inventory/types.ts

import type { InventorySourceName } from '../../config/ConfigValidator';

export type InventorySource = InventorySourceName | 'manual';

/**
 * One raw row from one inventory source
 */
export interface InventoryEntry {
  name: string;
  url?: string;
  description?: string;
  category?: string;
  source: InventorySource;
}

/**
 * Row of the pre-compiled tool list kept alongside the pipeline
 */
export interface ManualListEntry {
  sourceUrl: string;
  name?: string;
}

export interface ExclusionEntry {
  key: string; // normalized name or repository URL
  reason: string;
}

export interface ToolRecord {
  name: string;
  normalizedName: string;
  sourceUrl?: string;
  inventoryOrigin: InventorySource[];
  description?: string;
  category?: string;
}

export interface ToolStats extends ToolRecord {
  owner?: string;
  language?: string;
  license?: string; // SPDX-style key, e.g. "mit"
  archived?: boolean;
  createdAt?: string;
  updatedAt?: string;
  lastPushedAt?: string;
  stars?: number;
  forks?: number;
  contributorCount?: number;
  dependentsCount?: number;
  downloadsLastMonth?: number;
  latestReleasePublishedAt?: string;
  ddsScore?: number;
  ddsHasData: boolean;
  documentationUrl?: string;
  dataGap: string[];
}

export type DropStage = 'merge' | 'exclusion' | 'filter' | 'enrichment';

export interface DroppedRecord {
  normalizedName: string;
  name: string;
  sourceUrl?: string;
  inventoryOrigin: InventorySource[];
  stage: DropStage;
  reason: string;
}
