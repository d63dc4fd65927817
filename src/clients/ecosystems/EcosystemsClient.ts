// src/clients/ecosystems/EcosystemsClient.ts

import { z } from 'zod';
import type { HttpCore } from '../../core/http/HttpCore';
import { ApiClientError } from '../../utils/errors';

export const REPOS_LOOKUP_URL = 'https://repos.ecosyste.ms/api/v1/repositories/lookup';
export const PACKAGES_LOOKUP_URL = 'https://packages.ecosyste.ms/api/v1/packages/lookup';

export const RepositoryMetricsSchema = z.object({
  owner: z.string().nullish(),
  archived: z.boolean().nullish(),
  language: z.string().nullish(),
  license: z.string().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  pushed_at: z.string().nullish(),
  stargazers_count: z.number().nullish(),
  forks_count: z.number().nullish(),
  commit_stats: z
    .object({
      total_committers: z.number().nullish(),
      dds: z.number().nullish(),
    })
    .nullish(),
});

export type RepositoryMetrics = z.infer<typeof RepositoryMetricsSchema>;

export const PackageMetricsSchema = z.object({
  name: z.string(),
  ecosystem: z.string(),
  downloads: z.number().nullish(),
  downloads_period: z.string().nullish(),
  dependent_repos_count: z.number().nullish(),
  latest_release_published_at: z.string().nullish(),
});

export type PackageMetrics = z.infer<typeof PackageMetricsSchema>;

/**
 * ecosyste.ms repository and package lookups, keyed by repository URL
 */
export class EcosystemsClient {
  constructor(private http: HttpCore) {}

  /**
   * @throws {ApiClientError} 404 when the service has no record of the repository
   */
  async lookupRepository(url: string, signal?: AbortSignal): Promise<RepositoryMetrics> {
    const response = await this.http.get(REPOS_LOOKUP_URL, {
      query: { url },
      provider: 'ecosystems',
      signal,
    });
    return RepositoryMetricsSchema.parse(response.data);
  }

  /**
   * Packages published from the repository; empty when none are known
   */
  async lookupPackages(url: string, signal?: AbortSignal): Promise<PackageMetrics[]> {
    try {
      const response = await this.http.get(PACKAGES_LOOKUP_URL, {
        query: { repository_url: url },
        provider: 'ecosystems',
        signal,
      });
      return z.array(PackageMetricsSchema).parse(response.data);
    } catch (error: unknown) {
      if (error instanceof ApiClientError && error.status === 404) {
        return [];
      }
      throw error;
    }
  }
}
