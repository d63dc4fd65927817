// src/clients/github/GitHubClient.ts

import { z } from 'zod';
import type { HttpCore } from '../../core/http/HttpCore';
import type { HttpResponse } from '../../core/http/types';
import type { Logger } from '../../observability/Logger';
import { ApiClientError } from '../../utils/errors';

export const GITHUB_API = 'https://api.github.com';
const API_VERSION = '2022-11-28';

const LoginSchema = z.object({ login: z.string() });

export const GitHubUserSchema = z.object({
  login: z.string(),
  name: z.string().nullish(),
  company: z.string().nullish(),
  blog: z.string().nullish(),
  location: z.string().nullish(),
  email: z.string().nullish(),
  bio: z.string().nullish(),
  twitter_username: z.string().nullish(),
  followers: z.number().nullish(),
  following: z.number().nullish(),
});

export type GitHubUser = z.infer<typeof GitHubUserSchema>;

export interface ListOptions {
  query?: Record<string, string | number>;
  accept?: string;
  signal?: AbortSignal;
}

/**
 * Thin REST v3 client: auth headers, Link-header pagination and ETag
 * conditional requests on top of HttpCore's github queue.
 */
export class GitHubClient {
  constructor(
    private http: HttpCore,
    private logger: Logger,
    private token?: string,
    private perPage: number = 100
  ) {}

  async get<S extends z.ZodTypeAny>(
    pathOrUrl: string,
    schema: S,
    options: ListOptions = {}
  ): Promise<z.infer<S>> {
    const response = await this.request(this.toUrl(pathOrUrl), options);
    return schema.parse(response.data);
  }

  /**
   * Follow `rel="next"` links until the listing is exhausted
   */
  async paginate<S extends z.ZodTypeAny>(
    path: string,
    itemSchema: S,
    options: ListOptions = {}
  ): Promise<z.infer<S>[]> {
    const items: z.infer<S>[] = [];
    const pageSchema = z.array(itemSchema);
    let next: string | undefined = this.toUrl(path);
    let query: Record<string, string | number> | undefined = { per_page: this.perPage, ...options.query };
    let pages = 0;

    while (next) {
      const response: HttpResponse = await this.request(next, { ...options, query });
      items.push(...pageSchema.parse(response.data));
      pages++;

      next = parseNextLink(response.headers.link);
      // The next link already carries the query string
      query = undefined;
    }

    this.logger.debug('GitHub listing complete', { path, pages, items: items.length });
    return items;
  }

  async getUser(login: string, signal?: AbortSignal): Promise<GitHubUser> {
    return this.get(`/users/${encodeURIComponent(login)}`, GitHubUserSchema, { signal });
  }

  async getUserOrgs(login: string, signal?: AbortSignal): Promise<string[]> {
    const orgs = await this.paginate(`/users/${encodeURIComponent(login)}/orgs`, LoginSchema, { signal });
    return orgs.map((org) => org.login);
  }

  /**
   * Profile README (the `<login>/<login>` repository), empty when there is none
   */
  async getProfileReadme(login: string, signal?: AbortSignal): Promise<string> {
    const repo = encodeURIComponent(login);
    try {
      const response = await this.request(this.toUrl(`/repos/${repo}/${repo}/readme`), {
        accept: 'application/vnd.github.raw+json',
        signal,
        responseType: 'text',
      });
      return typeof response.data === 'string' ? response.data.trim() : '';
    } catch (error: unknown) {
      if (error instanceof ApiClientError && error.status === 404) {
        return '';
      }
      throw error;
    }
  }

  private async request(
    url: string,
    options: ListOptions & { responseType?: 'json' | 'text' }
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Accept: options.accept ?? 'application/vnd.github+json',
      'X-GitHub-Api-Version': API_VERSION,
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const resource = options.query ? `${url}?${new URLSearchParams(stringifyQuery(options.query))}` : url;

    return this.http.get(url, {
      headers,
      query: options.query,
      provider: 'github',
      responseType: options.responseType,
      signal: options.signal,
      etagKey: { provider: 'github', resource: `${options.accept ?? 'json'} ${resource}` },
    });
  }

  private toUrl(pathOrUrl: string): string {
    return pathOrUrl.startsWith('http') ? pathOrUrl : `${GITHUB_API}${pathOrUrl}`;
  }
}

export function parseNextLink(link: string | undefined): string | undefined {
  if (!link) return undefined;

  for (const part of link.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="([^"]+)"/);
    if (match && match[2].split(/\s+/).includes('next')) {
      return match[1];
    }
  }
  return undefined;
}

function stringifyQuery(query: Record<string, string | number>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    result[key] = String(value);
  }
  return result;
}
