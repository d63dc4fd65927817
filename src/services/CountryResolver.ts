// src/services/CountryResolver.ts

import type { TableStore } from '../core/tables/TableStore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { GeocodingClient } from '../clients/geocoding/GeocodingClient';
import type { UserDetailRecord } from '../core/users/types';
import { STATE_FILES } from '../core/tables/codecs';
import { GEOCODE_CACHE_VERSION, GeocodeCacheSchema } from '../core/state/types';
import { countryFromDomains, countryFromText, type CountryTable } from '../core/users/countries';
import { RunCancelledError } from '../utils/errors';

export interface LocationSummary {
  matched: number;
  geocoded: number;
  notFound: number;
  failed: number;
}

/**
 * Profile location → country, remembered across runs in
 * `state/geocode-cache.json`. Locations are first matched against the alias
 * table, then geocoded one at a time. Users whose location resolves to
 * nothing fall back to their email and blog domains.
 */
export class CountryResolver {
  private cache = new Map<string, string | null>();
  private loaded = false;

  constructor(
    private table: CountryTable,
    private tables: TableStore,
    private logger: Logger,
    private metrics?: MetricsCollector,
    private geocoder?: GeocodingClient
  ) {}

  async resolveLocations(locations: Iterable<string>, signal?: AbortSignal): Promise<LocationSummary> {
    await this.load();
    const summary: LocationSummary = { matched: 0, geocoded: 0, notFound: 0, failed: 0 };
    const pending = new Set<string>();
    for (const location of locations) {
      const key = location.trim();
      if (key && !this.cache.has(key)) pending.add(key);
    }

    let changed = false;
    for (const location of pending) {
      const matched = countryFromText(location, this.table);
      if (matched) {
        this.cache.set(location, matched);
        summary.matched++;
        changed = true;
        this.metrics?.incrementCounter('location_lookups', { method: 'alias', result: 'found' });
        continue;
      }
      if (!this.geocoder) continue;

      if (signal?.aborted) throw new RunCancelledError('Location lookup cancelled');
      try {
        const country = await this.geocoder.country(location, signal);
        this.cache.set(location, country ?? null);
        changed = true;
        if (country) {
          summary.geocoded++;
        } else {
          summary.notFound++;
        }
        this.metrics?.incrementCounter('location_lookups', {
          method: 'geocoder',
          result: country ? 'found' : 'not-found',
        });
      } catch (error: unknown) {
        if (error instanceof RunCancelledError) throw error;
        // Not cached, so the next run asks again
        summary.failed++;
        this.metrics?.incrementCounter('location_lookups', { method: 'geocoder', result: 'error' });
        this.logger.warn('Geocoding failed', {
          location,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (changed) await this.save();
    this.logger.info('Locations resolved', { locations: pending.size, ...summary });
    return summary;
  }

  /**
   * Call after resolveLocations for the same records
   */
  countryFor(record: UserDetailRecord): string {
    const cached = this.cache.get(record.profile.location.trim());
    if (cached) return cached;
    return countryFromDomains(record.profile.email_domain, record.profile.blog, this.table) ?? '';
  }

  private async load(): Promise<void> {
    if (this.loaded) return;
    const stored = await this.tables.readJson(STATE_FILES.geocodeCache, GeocodeCacheSchema);
    for (const [location, country] of Object.entries(stored?.locations ?? {})) {
      this.cache.set(location, country);
    }
    this.loaded = true;
  }

  private async save(): Promise<void> {
    const locations: Record<string, string | null> = {};
    for (const location of [...this.cache.keys()].sort()) {
      locations[location] = this.cache.get(location) ?? null;
    }
    await this.tables.writeJson(STATE_FILES.geocodeCache, { version: GEOCODE_CACHE_VERSION, locations });
  }
}
