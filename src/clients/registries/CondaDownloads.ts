// src/clients/registries/CondaDownloads.ts

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DuckDBInstance } from '@duckdb/node-api';
import type { HttpCore } from '../../core/http/HttpCore';
import type { Logger } from '../../observability/Logger';
import { ApiClientError } from '../../utils/errors';

export const CONDA_MONTHLY_URL = 'https://anaconda-package-data.s3.amazonaws.com/conda/monthly';

// The monthly files run to tens of megabytes
const DOWNLOAD_TIMEOUT_MS = 300000;

/**
 * Anaconda publishes a month's file about a week into the next month, so
 * before the 7th we read the month before last.
 */
export function condaMonth(now: Date): string {
  const monthsBack = now.getUTCDate() < 7 ? 2 : 1;
  const month = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - monthsBack, 1));
  return `${month.getUTCFullYear()}-${String(month.getUTCMonth() + 1).padStart(2, '0')}`;
}

export function condaMonthlyUrl(month: string): string {
  return `${CONDA_MONTHLY_URL}/${month.slice(0, 4)}/${month}.parquet`;
}

/**
 * Sums the `counts` column per lower-cased `pkg_name` of an Anaconda
 * download parquet file.
 */
export async function sumCountsByPackage(file: string): Promise<Map<string, number>> {
  const instance = await DuckDBInstance.create(':memory:');
  const connection = await instance.connect();
  try {
    const source = file.replace(/'/g, "''");
    const result = await connection.run(
      `SELECT lower(pkg_name), CAST(sum(counts) AS DOUBLE) FROM read_parquet('${source}') GROUP BY 1`
    );
    const totals = new Map<string, number>();
    for (const [name, count] of await result.getRows()) {
      if (typeof name === 'string' && typeof count === 'number') {
        totals.set(name, count);
      }
    }
    return totals;
  } finally {
    connection.closeSync();
  }
}

/**
 * Conda download counts for the last published month. The month's file is
 * downloaded once and shared by every lookup.
 */
export class CondaDownloads {
  private totals?: { month: string; counts: Promise<Map<string, number>> };

  constructor(
    private http: HttpCore,
    private logger?: Logger,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * @returns the month's total, or undefined when the package is not in the file
   */
  async monthlyDownloads(name: string, signal?: AbortSignal): Promise<number | undefined> {
    const month = condaMonth(this.now());
    if (!this.totals || this.totals.month !== month) {
      this.totals = { month, counts: this.load(month, signal) };
    }

    const current = this.totals;
    try {
      return (await current.counts).get(name.toLowerCase());
    } catch (error: unknown) {
      // A failed download is retried by the next lookup
      if (this.totals === current) this.totals = undefined;
      throw error;
    }
  }

  private async load(month: string, signal?: AbortSignal): Promise<Map<string, number>> {
    const url = condaMonthlyUrl(month);
    let data: ArrayBuffer;
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        provider: 'registry',
        responseType: 'arraybuffer',
        timeout: DOWNLOAD_TIMEOUT_MS,
        signal,
      });
      data = response.data;
    } catch (error: unknown) {
      if (error instanceof ApiClientError && error.status === 404) {
        this.logger?.warn('Conda download file not published', { month, url });
        return new Map();
      }
      throw error;
    }

    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'conda-downloads-'));
    try {
      const file = path.join(dir, `${month}.parquet`);
      await fs.writeFile(file, Buffer.from(data));
      const totals = await sumCountsByPackage(file);
      this.logger?.info('Conda download counts loaded', { month, packages: totals.size });
      return totals;
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}
