// src/connectors/opensustain/OpenSustainTechConnector.ts

import { z } from 'zod';
import { BaseConnector } from '../BaseConnector';
import type { FetchParams } from '../types';
import type { InventorySourceName } from '../../config/ConfigValidator';

export const OPENSUSTAIN_TECH_URL =
  'https://docs.getgrist.com/api/docs/gSscJkc5Rb1Rw45gh1o1Yc/tables/Projects/records';

export const ESM_SUBCATEGORIES = ['Energy System Modeling Frameworks', 'Grid Analysis and Planning'];

const GristRecordsSchema = z.object({
  records: z.array(
    z.object({
      fields: z.record(z.unknown()),
    })
  ),
});

/**
 * Grist stores list cells as `['L', 'first', 'second', ...]`; the
 * sub-category we filter on is the element after the marker.
 */
function subCategory(value: unknown): unknown {
  return Array.isArray(value) ? value[1] : value;
}

export class OpenSustainTechConnector extends BaseConnector {
  readonly name: InventorySourceName = 'opensustain-tech';

  protected async fetchCandidates(params: FetchParams): Promise<unknown[]> {
    const response = await this.deps.http.get(this.sourceUrl, {
      provider: 'inventory',
      signal: params.signal,
    });

    const { records } = GristRecordsSchema.parse(response.data);

    return records
      .map((record) => record.fields)
      .filter((fields) => {
        const value = subCategory(fields.sub_category);
        return typeof value === 'string' && ESM_SUBCATEGORIES.includes(value);
      })
      .map((fields) => ({
        name: fields.project_names,
        url: fields.git_url,
        description: fields.description,
      }));
  }
}
