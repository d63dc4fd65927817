// src/core/state/types.ts

import { z } from 'zod';

export const REFRESH_STATE_VERSION = 1;
export const COLLECTOR_CURSOR_VERSION = 1;
export const GEOCODE_CACHE_VERSION = 1;

export const RefreshStateSchema = z.object({
  version: z.literal(REFRESH_STATE_VERSION),
  fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  inputs: z.object({
    inventory: z.string(),
    manualList: z.string(),
    exclusions: z.string(),
  }),
  completedAt: z.string().datetime(),
});

export type RefreshState = z.infer<typeof RefreshStateSchema>;

export const CollectorCursorSchema = z.object({
  version: z.literal(COLLECTOR_CURSOR_VERSION),
  lastCompletedRepository: z.string().min(1),
  updatedAt: z.string().datetime(),
});

export type CollectorCursor = z.infer<typeof CollectorCursorSchema>;

/**
 * Location text → country. Null records a lookup that found nothing, so it
 * is not repeated.
 */
export const GeocodeCacheSchema = z.object({
  version: z.literal(GEOCODE_CACHE_VERSION),
  locations: z.record(z.string(), z.string().nullable()),
});

export type GeocodeCache = z.infer<typeof GeocodeCacheSchema>;
