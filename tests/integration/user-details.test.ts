/**
 * User detail collection from the interaction ledger
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { UserDetailCollector } from '../../src/services/UserDetailCollector';
import type { TableStore } from '../../src/core/tables/TableStore';
import { INTERACTION_COLUMNS, TABLES, USER_DETAIL_COLUMNS } from '../../src/core/tables/codecs';
import { createTableStore, createTempDir, createTestDeps, removeTempDir, type TestDeps } from '../helpers/deps';

const GITHUB = 'https://api.github.com';

const OCTO = {
  login: 'octo',
  name: ' Octo Cat ',
  company: 'Grid Lab',
  blog: null,
  location: 'Berlin',
  email: 'octo@Example.ORG',
  bio: null,
  twitter_username: null,
  followers: 5,
  following: 1,
};

function stubOcto() {
  nock(GITHUB).get('/users/octo').reply(200, OCTO);
  nock(GITHUB).get('/users/octo/orgs').query({ per_page: '100' }).reply(200, [{ login: 'grid-lab' }]);
  nock(GITHUB).get('/repos/octo/octo/readme').reply(404, { message: 'Not Found' });
}

describe('UserDetailCollector', () => {
  let dir: string;
  let deps: TestDeps;
  let tables: TableStore;
  let collector: UserDetailCollector;

  beforeEach(async () => {
    dir = await createTempDir();
    deps = createTestDeps();
    tables = createTableStore(dir, deps.logger);
    collector = new UserDetailCollector(deps.github, tables, 0, deps.logger, deps.metrics);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should fetch profiles for pending logins and report failures', async () => {
    await tables.write(TABLES.interactions, INTERACTION_COLUMNS, [
      { login: 'octo', repository: 'acme/beta', interaction_type: 'fork', timestamp: '2024-01-02T00:00:00Z' },
      { login: 'octo', repository: 'acme/alpha', interaction_type: 'stargazer', timestamp: '2024-01-01T00:00:00Z' },
      { login: 'mona', repository: 'acme/alpha', interaction_type: 'fork', timestamp: '2024-02-01T00:00:00Z' },
    ]);
    stubOcto();
    nock(GITHUB).get('/users/mona').reply(404, { message: 'Not Found' });
    nock(GITHUB).get('/users/mona/orgs').query({ per_page: '100' }).reply(404, { message: 'Not Found' });
    nock(GITHUB).get('/repos/mona/mona/readme').reply(404, { message: 'Not Found' });

    const summary = await collector.collect();

    expect(summary).toEqual({ requested: 2, fetched: 1, failed: ['mona'], completed: true });
    expect(await tables.read(TABLES.userDetails)).toEqual([
      {
        login: 'octo',
        name: 'Octo Cat',
        company: 'Grid Lab',
        blog: '',
        location: 'Berlin',
        email_domain: 'example.org',
        bio: '',
        twitter_username: '',
        followers: '5',
        following: '1',
        orgs: 'grid-lab',
        repos: 'acme/alpha,acme/beta',
        readme: '',
        organisation: '',
        country: '',
        category: '',
        rule_id: '',
      },
    ]);
  });

  it('should skip logins that already have a row', async () => {
    await tables.write(TABLES.interactions, INTERACTION_COLUMNS, [
      { login: 'octo', repository: 'acme/alpha', interaction_type: 'stargazer', timestamp: '2024-01-01T00:00:00Z' },
    ]);
    await tables.write(TABLES.userDetails, USER_DETAIL_COLUMNS, [{ login: 'octo', company: 'Old Co' }]);

    const summary = await collector.collect();

    expect(summary).toEqual({ requested: 0, fetched: 0, failed: [], completed: true });
  });

  it('should keep the derived columns when refreshing profiles', async () => {
    await tables.write(TABLES.interactions, INTERACTION_COLUMNS, [
      { login: 'octo', repository: 'acme/alpha', interaction_type: 'stargazer', timestamp: '2024-01-01T00:00:00Z' },
    ]);
    await tables.write(TABLES.userDetails, USER_DETAIL_COLUMNS, [
      {
        login: 'octo',
        company: 'Old Co',
        organisation: 'old co',
        country: 'Germany',
        category: 'research',
        rule_id: 'research-organisation',
      },
    ]);
    stubOcto();

    const summary = await collector.collect({ refreshProfiles: true });

    expect(summary).toEqual({ requested: 1, fetched: 1, failed: [], completed: true });
    const [row] = await tables.read(TABLES.userDetails);
    expect(row).toMatchObject({
      login: 'octo',
      company: 'Grid Lab',
      repos: 'acme/alpha',
      organisation: 'old co',
      country: 'Germany',
      category: 'research',
      rule_id: 'research-organisation',
    });
  });

  it('should stop when the quota is spent beyond the allowed wait', async () => {
    await tables.write(TABLES.interactions, INTERACTION_COLUMNS, [
      { login: 'octo', repository: 'acme/alpha', interaction_type: 'stargazer', timestamp: '2024-01-01T00:00:00Z' },
    ]);
    const quotaHeaders = {
      'x-ratelimit-remaining': '0',
      'x-ratelimit-reset': String(Math.floor(Date.now() / 1000) + 3600),
    };
    nock(GITHUB).get('/users/octo').reply(403, { message: 'API rate limit exceeded' }, quotaHeaders);
    nock(GITHUB).get('/users/octo/orgs').query({ per_page: '100' }).reply(403, { message: 'API rate limit exceeded' }, quotaHeaders);
    nock(GITHUB).get('/repos/octo/octo/readme').reply(403, { message: 'API rate limit exceeded' }, quotaHeaders);

    const summary = await collector.collect();

    expect(summary).toEqual({ requested: 1, fetched: 0, failed: [], completed: false });
    expect(await tables.exists(TABLES.userDetails)).toBe(false);
  });
});
