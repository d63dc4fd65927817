// src/clients/registries/PackageRegistryClient.ts

import { z } from 'zod';
import type { HttpCore } from '../../core/http/HttpCore';
import type { PackageRegistry } from '../../config/ConfigValidator';
import { ApiClientError } from '../../utils/errors';
import { CondaDownloads } from './CondaDownloads';

export const PYPISTATS_URL = 'https://pypistats.org/api/packages';
export const NPM_DOWNLOADS_URL = 'https://api.npmjs.org/downloads/point/last-month';
export const JULIA_STATS_URL = 'https://juliapkgstats.com/api/v1/monthly_downloads';

const PypiStatsSchema = z.object({
  data: z.object({ last_month: z.number() }),
});

const NpmDownloadsSchema = z.object({ downloads: z.number() });

const JuliaStatsSchema = z.object({ total_requests: z.union([z.number(), z.string()]) });

/**
 * Last-month download counts straight from the package registries, used when
 * the metrics service has no count of its own. Conda counts come from
 * Anaconda's monthly parquet dumps.
 */
export class PackageRegistryClient {
  constructor(
    private http: HttpCore,
    private registries: readonly PackageRegistry[],
    private conda: CondaDownloads = new CondaDownloads(http)
  ) {}

  supports(ecosystem: string): ecosystem is PackageRegistry {
    return this.registries.some((registry) => registry === ecosystem);
  }

  /**
   * @returns the count, or undefined when the registry has no entry for the package
   */
  async monthlyDownloads(
    ecosystem: PackageRegistry,
    name: string,
    signal?: AbortSignal
  ): Promise<number | undefined> {
    try {
      switch (ecosystem) {
        case 'pypi': {
          const response = await this.http.get(`${PYPISTATS_URL}/${encodeURIComponent(name.toLowerCase())}/recent`, {
            provider: 'registry',
            signal,
          });
          return PypiStatsSchema.parse(response.data).data.last_month;
        }
        case 'npm': {
          // Scoped names keep their slash
          const response = await this.http.get(`${NPM_DOWNLOADS_URL}/${name}`, {
            provider: 'registry',
            signal,
          });
          return NpmDownloadsSchema.parse(response.data).downloads;
        }
        case 'julia': {
          const response = await this.http.get(`${JULIA_STATS_URL}/${encodeURIComponent(name)}`, {
            provider: 'registry',
            signal,
          });
          const total = Number(JuliaStatsSchema.parse(response.data).total_requests);
          return Number.isFinite(total) ? total : undefined;
        }
        case 'conda':
          return await this.conda.monthlyDownloads(name, signal);
      }
    } catch (error: unknown) {
      if (error instanceof ApiClientError && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }
}
