// src/clients/docs/DocsProbe.ts

import { z } from 'zod';
import type { HttpCore } from '../../core/http/HttpCore';
import type { Logger } from '../../observability/Logger';
import { normalizeUrl, repositoryCoordinates } from '../../core/inventory/normalize';
import { RunCancelledError } from '../../utils/errors';

export const RTD_API_URL = 'https://readthedocs.org/api/v3/projects';

const RtdProjectSchema = z.object({
  repository: z.object({ url: z.string().nullish() }).nullish(),
});

/**
 * Guesses where a project's documentation lives. Candidates are tried in a
 * fixed order and the first that answers wins: Read the Docs slugs (only
 * accepted when the RTD project points back at the same repository), the
 * host's pages site, then the repository wiki.
 */
export class DocsProbe {
  constructor(
    private http: HttpCore,
    private logger: Logger
  ) {}

  async find(sourceUrl: string, signal?: AbortSignal): Promise<string | undefined> {
    const coordinates = repositoryCoordinates(sourceUrl);
    if (!coordinates) return undefined;
    const { host, owner, repo } = coordinates;

    for (const slug of rtdSlugs(owner, repo)) {
      const site = `https://${slug}.readthedocs.io`;
      if ((await this.exists(site, signal)) && (await this.rtdMatches(slug, sourceUrl, signal))) {
        return site;
      }
    }

    const pagesHost = `${owner}.${host.replace('.com', '.io')}`;
    for (const candidate of [`https://${pagesHost}/${repo}`, `https://${pagesHost}/${repo}/stable`]) {
      if (await this.exists(candidate, signal)) return candidate;
    }

    const wikis = host === 'bitbucket.org' ? [`${sourceUrl}.git/wiki`, `${sourceUrl}.wiki.git`] : [`${sourceUrl}.wiki.git`];
    for (const wiki of wikis) {
      if (await this.exists(wiki, signal)) return wiki;
    }

    this.logger.debug('No documentation found', { sourceUrl });
    return undefined;
  }

  private async exists(url: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.http.head(url, { provider: 'docs', signal });
      return true;
    } catch (error: unknown) {
      if (error instanceof RunCancelledError) throw error;
      this.logger.debug('Documentation probe missed', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private async rtdMatches(slug: string, sourceUrl: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.http.get(`${RTD_API_URL}/${slug}/`, { provider: 'docs', signal });
      const project = RtdProjectSchema.parse(response.data);
      return normalizeUrl(project.repository?.url) === sourceUrl;
    } catch (error: unknown) {
      if (error instanceof RunCancelledError) throw error;
      this.logger.debug('Read the Docs lookup failed', {
        slug,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}

function rtdSlugs(owner: string, repo: string): string[] {
  const candidates = [repo, repo.replace(/_/g, '-'), `${owner}-${repo}`, `${repo}-documentation`];
  return [...new Set(candidates.map((slug) => slug.toLowerCase()))];
}
