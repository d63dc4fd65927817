// src/core/http/ETagCache.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import type { CacheConfig, ETagKey, HttpResponse } from './types';
import type { Logger } from '../../observability/Logger';

export interface CachedETagData<T = unknown> {
  etag: string;
  payload: HttpResponse<T>;
  timestamp: number;
}

/**
 * Conditional-request cache. With a Redis or Postgres backend the entries
 * outlive the process, so a full re-scan of an unchanged GitHub listing is
 * answered with 304s that do not count against the hourly quota.
 */
export class ETagCache {
  private store: Keyv<CachedETagData>;
  public ttl: number;

  constructor(config: CacheConfig = { backend: 'memory' }, logger?: Logger) {
    this.ttl = config.ttl ?? 7 * 24 * 3600000; // 1 week
    const namespace = config.namespace ?? 'etag';

    if (config.backend === 'redis' && config.url) {
      this.store = new Keyv<CachedETagData>({ store: new KeyvRedis(config.url), namespace });
    } else if (config.backend === 'postgres' && config.url) {
      this.store = new Keyv<CachedETagData>({ store: new KeyvPostgres({ uri: config.url }), namespace });
    } else {
      this.store = new Keyv<CachedETagData>({ namespace });
    }

    this.store.on('error', (error: unknown) => {
      logger?.warn('ETag cache backend error', {
        backend: config.backend,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  async get<T>(key: ETagKey): Promise<CachedETagData<T> | undefined> {
    const cached = (await this.store.get(this.createKey(key))) as CachedETagData<T> | undefined;

    if (!cached) return undefined;

    if (Date.now() - cached.timestamp > this.ttl) {
      await this.store.delete(this.createKey(key));
      return undefined;
    }

    return cached;
  }

  async set<T>(key: ETagKey, payload: HttpResponse<T>, etag: string | undefined): Promise<void> {
    if (!etag) return; // Skip if no ETag provided

    await this.store.set(
      this.createKey(key),
      { etag, payload, timestamp: Date.now() },
      this.ttl
    );
  }

  async getETag(key: ETagKey): Promise<string | undefined> {
    return (await this.get(key))?.etag;
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }

  private createKey(key: ETagKey): string {
    return `${key.provider}:${key.resource}`;
  }
}
