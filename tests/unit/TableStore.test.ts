// tests/unit/TableStore.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { TableStore } from '../../src/core/tables/TableStore';
import { ConfigError } from '../../src/utils/errors';
import { createTableStore, createTempDir, removeTempDir } from '../helpers/deps';

describe('TableStore', () => {
  let dir: string;
  let tables: TableStore;

  beforeEach(async () => {
    dir = await createTempDir();
    tables = createTableStore(dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should write columns in the given order', async () => {
    await tables.write('tools.csv', ['name', 'inventory_origin'], [
      { inventory_origin: 'g-pst,manual', name: 'PyPSA' },
      { name: 'Calliope' },
    ]);

    const text = await fs.readFile(path.join(dir, 'tools.csv'), 'utf8');
    expect(text).toBe('name,inventory_origin\nPyPSA,"g-pst,manual"\nCalliope,\n');
  });

  it('should write a header-only table when there are no rows', async () => {
    await tables.write('dropped.csv', ['normalized_name', 'reason'], []);

    expect(await fs.readFile(path.join(dir, 'dropped.csv'), 'utf8')).toBe('normalized_name,reason\n');
    expect(await tables.read('dropped.csv')).toEqual([]);
  });

  it('should read rows back as strings', async () => {
    await tables.write('stats.csv', ['source_url', 'stars'], [{ source_url: 'https://github.com/a/b', stars: '12' }]);

    expect(await tables.read('stats.csv')).toEqual([{ source_url: 'https://github.com/a/b', stars: '12' }]);
  });

  it('should return no rows for a missing table', async () => {
    expect(await tables.read('missing.csv')).toEqual([]);
    expect(await tables.exists('missing.csv')).toBe(false);
  });

  it('should reject malformed tables', async () => {
    await fs.writeFile(path.join(dir, 'bad.csv'), 'a,b\n1,2,3\n');

    await expect(tables.read('bad.csv')).rejects.toBeInstanceOf(ConfigError);
  });

  describe('append', () => {
    it('should write the header for a new table', async () => {
      await tables.append('ledger.csv', ['login', 'repository'], [{ login: 'octo', repository: 'a/b' }]);

      expect(await fs.readFile(path.join(dir, 'ledger.csv'), 'utf8')).toBe('login,repository\nocto,a/b\n');
    });

    it('should add rows after existing content', async () => {
      await tables.append('ledger.csv', ['login', 'repository'], [{ login: 'octo', repository: 'a/b' }]);
      await tables.append('ledger.csv', ['login', 'repository'], [{ login: 'mona', repository: 'c/d' }]);

      expect(await fs.readFile(path.join(dir, 'ledger.csv'), 'utf8')).toBe(
        'login,repository\nocto,a/b\nmona,c/d\n'
      );
    });

    it('should do nothing for no rows', async () => {
      await tables.append('ledger.csv', ['login'], []);
      expect(await tables.exists('ledger.csv')).toBe(false);
    });
  });

  describe('JSON state', () => {
    const StateSchema = z.object({ version: z.literal(1), value: z.string() });

    it('should round-trip a valid state file', async () => {
      await tables.writeJson('state/s.json', { version: 1, value: 'x' });

      expect(await tables.readJson('state/s.json', StateSchema)).toEqual({ version: 1, value: 'x' });
    });

    it('should ignore unreadable or mismatched state', async () => {
      await fs.mkdir(path.join(dir, 'state'));
      await fs.writeFile(path.join(dir, 'state/broken.json'), '{not json');
      await fs.writeFile(path.join(dir, 'state/old.json'), '{"version":0,"value":"x"}');

      expect(await tables.readJson('state/broken.json', StateSchema)).toBeUndefined();
      expect(await tables.readJson('state/old.json', StateSchema)).toBeUndefined();
      expect(await tables.readJson('state/none.json', StateSchema)).toBeUndefined();
    });
  });

  describe('contentHash', () => {
    it('should hash file content and mark missing files', async () => {
      await fs.writeFile(path.join(dir, 'a.csv'), 'x\n');
      await fs.writeFile(path.join(dir, 'b.csv'), 'x\n');

      expect(await tables.contentHash('a.csv')).toMatch(/^[0-9a-f]{64}$/);
      expect(await tables.contentHash('a.csv')).toBe(await tables.contentHash('b.csv'));
      expect(await tables.contentHash('missing.csv')).toBe('absent');
    });
  });

  it('should resolve absolute paths as given', async () => {
    const other = path.join(dir, 'nested', 'manual.csv');
    expect(tables.resolve(other)).toBe(other);
  });
});
