// src/core/tables/TableStore.ts

import { promises as fs } from 'fs';
import * as path from 'path';
import { createHash } from 'crypto';
import Papa from 'papaparse';
import type { z } from 'zod';
import type { Logger } from '../../observability/Logger';
import { ConfigError } from '../../utils/errors';

export type TableRow = Record<string, string>;

/**
 * Column-stable CSV tables and JSON state files under one data directory.
 *
 * Every write goes to a temp file first and is renamed into place, so a
 * cancelled or crashed run never leaves a half-written table behind.
 * Relative names resolve against the data directory; absolute paths are
 * used as given.
 */
export class TableStore {
  constructor(
    private dataDir: string,
    private logger: Logger
  ) {}

  resolve(name: string): string {
    return path.resolve(this.dataDir, name);
  }

  async exists(name: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(name));
      return true;
    } catch {
      return false;
    }
  }

  async read(name: string): Promise<TableRow[]> {
    const file = this.resolve(name);
    const text = await this.readText(file);
    if (text === undefined) return [];

    const result = Papa.parse<TableRow>(text, {
      header: true,
      skipEmptyLines: true,
    });

    if (result.errors.length > 0) {
      const first = result.errors[0];
      throw new ConfigError(`Malformed table ${name}: ${first.message}`, {
        file,
        row: first.row,
      });
    }

    return result.data;
  }

  async write(name: string, columns: readonly string[], rows: readonly TableRow[]): Promise<void> {
    const file = this.resolve(name);
    await this.writeAtomic(file, this.serialize(columns, rows));

    this.logger.debug('Table written', { table: name, rows: rows.length });
  }

  /**
   * Append rows, writing the header first when the table does not exist yet
   */
  async append(name: string, columns: readonly string[], rows: readonly TableRow[]): Promise<void> {
    if (rows.length === 0) return;

    const file = this.resolve(name);
    const existing = await this.readText(file);

    if (existing === undefined || existing.trim() === '') {
      await this.writeAtomic(file, this.serialize(columns, rows));
    } else {
      const body = Papa.unparse(
        rows.map((row) => columns.map((column) => row[column] ?? '')),
        { newline: '\n' }
      );
      const separator = existing.endsWith('\n') ? '' : '\n';
      await this.writeAtomic(file, `${existing}${separator}${body}\n`);
    }

    this.logger.debug('Table appended', { table: name, rows: rows.length });
  }

  async readJson<S extends z.ZodTypeAny>(name: string, schema: S): Promise<z.infer<S> | undefined> {
    const file = this.resolve(name);
    const text = await this.readText(file);
    if (text === undefined) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error: unknown) {
      this.logger.warn('Ignoring unreadable state file', {
        file,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('Ignoring state file with unexpected shape', {
        file,
        issues: result.error.issues.map((issue) => issue.message),
      });
      return undefined;
    }
    return result.data;
  }

  async writeJson(name: string, value: unknown): Promise<void> {
    await this.writeAtomic(this.resolve(name), `${JSON.stringify(value, null, 2)}\n`);
  }

  async remove(name: string): Promise<void> {
    await fs.rm(this.resolve(name), { force: true });
  }

  /**
   * SHA-256 of the file content, or the literal "absent"
   */
  async contentHash(name: string): Promise<string> {
    try {
      const content = await fs.readFile(this.resolve(name));
      return createHash('sha256').update(content).digest('hex');
    } catch (error: unknown) {
      if (isMissingFile(error)) return 'absent';
      throw error;
    }
  }

  private serialize(columns: readonly string[], rows: readonly TableRow[]): string {
    const csv = Papa.unparse(
      {
        fields: [...columns],
        data: rows.map((row) => columns.map((column) => row[column] ?? '')),
      },
      { newline: '\n' }
    );
    return `${csv}\n`;
  }

  private async readText(file: string): Promise<string | undefined> {
    try {
      return await fs.readFile(file, 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  private async writeAtomic(file: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(tmp, content, 'utf8');
      await fs.rename(tmp, file);
    } catch (error: unknown) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
