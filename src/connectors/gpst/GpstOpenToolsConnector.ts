// src/connectors/gpst/GpstOpenToolsConnector.ts

import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { BaseConnector } from '../BaseConnector';
import type { FetchParams } from '../types';
import type { InventorySourceName } from '../../config/ConfigValidator';
import { isRecord } from '../../utils/guards';
import { RunCancelledError } from '../../utils/errors';

export const GPST_OPENTOOLS_URL = 'https://api.github.com/repos/G-PST/opentools/contents/data/software';

export const TOOL_TYPES = ['production-cost', 'capacity-expansion', 'power-flow', 'other'];

const ContentEntrySchema = z.object({
  name: z.string(),
  type: z.string(),
  download_url: z.string().nullish(),
});

/**
 * G-PST keeps one YAML (or JSON) file per tool. The directory listing goes
 * through the GitHub API; each file is then downloaded from its raw URL.
 */
export class GpstOpenToolsConnector extends BaseConnector {
  readonly name: InventorySourceName = 'g-pst';

  protected async fetchCandidates(params: FetchParams): Promise<unknown[]> {
    const listing = await this.deps.github.get(this.sourceUrl, z.array(ContentEntrySchema), {
      signal: params.signal,
    });

    const files = listing.filter(
      (entry) => entry.type === 'file' && entry.download_url && /\.(ya?ml|json)$/i.test(entry.name)
    );

    const candidates: unknown[] = [];
    let skipped = 0;
    for (const file of files) {
      if (!file.download_url) continue;

      let tool: unknown;
      try {
        const response = await this.deps.http.get(file.download_url, {
          provider: 'inventory',
          responseType: 'text',
          signal: params.signal,
        });
        tool = parseYaml(String(response.data));
      } catch (error: unknown) {
        if (error instanceof RunCancelledError) throw error;
        this.deps.logger.warn('Skipping unreadable G-PST tool file', {
          file: file.name,
          error: error instanceof Error ? error.message : String(error),
        });
        skipped++;
        continue;
      }

      if (!isRecord(tool)) {
        candidates.push(tool);
        continue;
      }

      const categories = Array.isArray(tool.categories)
        ? tool.categories.filter((category): category is string => typeof category === 'string')
        : [];
      const toolTypes = categories.filter((category) => TOOL_TYPES.includes(category));
      if (toolTypes.length === 0) continue;

      candidates.push({
        name: tool.name,
        url: tool.url_sourcecode,
        description: tool.description,
        category: toolTypes.join(','),
      });
    }

    this.deps.logger.debug('G-PST tool files read', { files: files.length, kept: candidates.length, skipped });
    return candidates;
  }
}
