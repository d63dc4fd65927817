// src/connectors/lfenergy/LfEnergyLandscapeConnector.ts

import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { BaseConnector } from '../BaseConnector';
import type { FetchParams } from '../types';
import type { InventorySourceName } from '../../config/ConfigValidator';
import { firstString, isRecord, unwrap } from '../../utils/guards';

export const LF_ENERGY_LANDSCAPE_URL =
  'https://raw.githubusercontent.com/lf-energy/lfenergy-landscape/refs/heads/main/landscape.yml';

const CATEGORY = 'Energy Systems';
const SUBCATEGORY = 'Modeling and Optimization';

const SubcategorySchema = z.preprocess(
  unwrap('subcategory'),
  z.object({
    name: z.string(),
    items: z.array(z.unknown()).nullish(),
  })
);

const CategorySchema = z.preprocess(
  unwrap('category'),
  z.object({
    name: z.string(),
    subcategories: z.array(SubcategorySchema).nullish(),
  })
);

const LandscapeSchema = z.object({
  landscape: z.array(CategorySchema),
});

export class LfEnergyLandscapeConnector extends BaseConnector {
  readonly name: InventorySourceName = 'lf-energy-landscape';

  protected async fetchCandidates(params: FetchParams): Promise<unknown[]> {
    const response = await this.deps.http.get(this.sourceUrl, {
      provider: 'inventory',
      responseType: 'text',
      signal: params.signal,
    });

    const document = LandscapeSchema.parse(parseYaml(String(response.data)));

    const items = document.landscape
      .filter((category) => category.name === CATEGORY)
      .flatMap((category) => category.subcategories ?? [])
      .filter((subcategory) => subcategory.name === SUBCATEGORY)
      .flatMap((subcategory) => subcategory.items ?? []);

    return items.map((raw) => {
      const item = unwrap('item')(raw);
      if (!isRecord(item)) return item;
      return {
        name: item.name,
        description: item.description,
        url: firstString(item.repo_url, item.homepage_url),
      };
    });
  }
}
