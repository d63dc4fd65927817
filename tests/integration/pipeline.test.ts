/**
 * InventoryPipeline wiring: init, inventory stage, classification and metrics
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { promises as fs } from 'fs';
import * as path from 'path';
import { InventoryPipeline } from '../../src/pipeline';
import type { Connector } from '../../src/connectors/types';
import type { InventoryEntry } from '../../src/core/inventory/types';
import type { PipelineConfig } from '../../src/config/ConfigValidator';
import { ConfigError, TotalConnectivityError } from '../../src/utils/errors';
import { createTempDir, createTestConfig, removeTempDir } from '../helpers/deps';

const GRIST = 'https://grist.example.org';
const LISTING = '/repos/acme/tools/contents/software';

describe('InventoryPipeline', () => {
  let dir: string;
  let config: PipelineConfig;
  let pipeline: InventoryPipeline | undefined;

  beforeEach(async () => {
    dir = await createTempDir();
    const base = createTestConfig(dir);
    config = createTestConfig(dir, {
      rulesPath: path.resolve('config/classification-rules.yaml'),
      inventory: {
        ...base.inventory,
        sources: ['opensustain-tech', 'g-pst'],
        sourceUrls: {
          'opensustain-tech': `${GRIST}/records`,
          'g-pst': `https://api.github.com${LISTING}`,
        },
      },
    });
  });

  afterEach(async () => {
    await pipeline?.close();
    pipeline = undefined;
    await removeTempDir(dir);
  });

  it('should write the sources that answered and report the rest', async () => {
    nock(GRIST)
      .get('/records')
      .reply(200, {
        records: [
          {
            fields: {
              project_names: 'PyPSA',
              git_url: 'https://github.com/PyPSA/PyPSA',
              description: 'Power systems',
              sub_category: ['L', 'Energy System Modeling Frameworks'],
            },
          },
        ],
      });
    nock('https://api.github.com').get(LISTING).reply(500, { message: 'boom' });
    pipeline = await InventoryPipeline.init(config);

    const summary = await pipeline.collectInventory();

    expect(summary).toEqual({ rows: 1, bySource: { 'opensustain-tech': 1 }, failedSources: ['g-pst'] });
    expect(await fs.readFile(path.join(dir, 'inventory.csv'), 'utf8')).toBe(
      'name,url,description,category,source\n' + 'PyPSA,https://github.com/PyPSA/PyPSA,Power systems,,opensustain-tech\n'
    );
    expect(await pipeline.getMetrics()).toContain('stage_duration_seconds_count{stage="inventory"} 1');
  });

  it('should fail the stage when no source can be reached', async () => {
    nock(GRIST).get('/records').reply(503);
    nock('https://api.github.com').get(LISTING).reply(503);
    pipeline = await InventoryPipeline.init(config);

    await expect(pipeline.collectInventory()).rejects.toBeInstanceOf(TotalConnectivityError);
    await expect(fs.access(path.join(dir, 'inventory.csv'))).rejects.toThrow();
  });

  it('should let a registered connector replace a default source', async () => {
    const entries: InventoryEntry[] = [{ name: 'Calliope', source: 'g-pst' }];
    const stub: Connector = { name: 'g-pst', fetch: async () => entries };
    nock(GRIST).get('/records').reply(200, { records: [] });
    pipeline = await InventoryPipeline.init(config);
    pipeline.registerConnector(stub);

    const summary = await pipeline.collectInventory();

    expect(summary).toEqual({ rows: 1, bySource: { 'opensustain-tech': 0, 'g-pst': 1 }, failedSources: [] });
  });

  it('should classify user details with the configured rules', async () => {
    await fs.writeFile(
      path.join(dir, 'user_details.csv'),
      'login,name,company,blog,location,email_domain,bio,twitter_username,followers,following,orgs,repos,readme,category,rule_id\n' +
        'octo,,Grid Lab,,,,,,,,,acme/alpha,,,\n'
    );
    pipeline = await InventoryPipeline.init(config);

    const summary = await pipeline.classifyUsers();

    expect(summary).toEqual({
      users: 1,
      unclassified: 0,
      byCategory: { research: 1 },
      withCountry: 0,
      withOrganisation: 1,
    });
    const written = await fs.readFile(path.join(dir, 'user_details.csv'), 'utf8');
    expect(written.split('\n')[1]).toBe('octo,,Grid Lab,,,,,,,,,acme/alpha,,grid lab,,research,research-organisation');
  });

  it('should reject invalid configuration and missing rules', async () => {
    await expect(
      InventoryPipeline.init({ ...config, inventory: { ...config.inventory, sources: [] } })
    ).rejects.toThrow('At least one inventory source must be configured');
    await expect(
      InventoryPipeline.init({ ...config, rulesPath: path.join(dir, 'missing.yaml') })
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
