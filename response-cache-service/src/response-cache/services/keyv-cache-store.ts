/**
 * Keyv Cache Store
 * Backing store adapter over Keyv (@keyv/redis in production, Map for local runs)
 *
 * Every call is bounded by a timeout. Failures are logged and degrade:
 * read → unavailable, set → false, deleteMatching → [].
 */

import { Logger } from '@nestjs/common';
import Keyv from 'keyv';
import { randomUUID } from 'crypto';
import type { CacheStore, StoreRead } from '../types/store.types';
import type { HealthState } from '../types/cache.types';
import type { KeyPattern } from '../utils/key-pattern';
import { withTimeout } from '../utils/with-timeout';
import {
  StoreUnavailableError,
  errorMessage,
  toError,
} from '../errors/cache-errors';

type KeyIterator = (namespace?: string) => AsyncIterable<[string, unknown]>;

export interface KeyvCacheStoreOptions {
  timeoutMs: number;
  bulkTimeoutMs?: number; // pattern deletion walks the keyspace
}

export class KeyvCacheStore implements CacheStore {
  private readonly logger = new Logger(KeyvCacheStore.name);
  private readonly timeoutMs: number;
  private readonly bulkTimeoutMs: number;

  constructor(
    private readonly keyv: Keyv<string>,
    options: KeyvCacheStoreOptions,
  ) {
    this.timeoutMs = options.timeoutMs;
    this.bulkTimeoutMs = options.bulkTimeoutMs ?? options.timeoutMs * 20;

    this.keyv.on('error', (error: unknown) => {
      this.logger.warn(
        `[CacheStore] op=connection status=error error=${errorMessage(error)}`,
      );
    });
  }

  async read(key: string): Promise<StoreRead> {
    try {
      const value = await withTimeout(
        'store.get',
        this.keyv.get(key),
        this.timeoutMs,
      );
      return typeof value === 'string'
        ? { status: 'found', value }
        : { status: 'absent' };
    } catch (error) {
      this.warnUnavailable('get', error, `key=${key} `);
      return { status: 'unavailable' };
    }
  }

  async get(key: string): Promise<string | undefined> {
    const result = await this.read(key);
    return result.status === 'found' ? result.value : undefined;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    try {
      const stored = await withTimeout(
        'store.set',
        this.keyv.set(key, value, ttlSeconds * 1000),
        this.timeoutMs,
      );
      if (!stored) {
        this.logger.warn(`[CacheStore] op=set key=${key} status=rejected`);
      }
      return stored;
    } catch (error) {
      this.warnUnavailable('set', error, `key=${key} `);
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      return await withTimeout(
        'store.delete',
        this.keyv.delete(key),
        this.timeoutMs,
      );
    } catch (error) {
      this.warnUnavailable('delete', error, `key=${key} `);
      return false;
    }
  }

  /**
   * Delete every key in the namespace matching the pattern.
   * Returns the keys that were actually removed.
   */
  async deleteMatching(pattern: KeyPattern): Promise<string[]> {
    const iterate: KeyIterator | undefined = this.keyv.iterator;
    if (!iterate) {
      this.logger.warn(
        `[CacheStore] op=deleteMatching pattern=${pattern.source} status=unsupported`,
      );
      return [];
    }

    try {
      return await withTimeout(
        'store.deleteMatching',
        this.scanAndDelete(iterate, pattern),
        this.bulkTimeoutMs,
      );
    } catch (error) {
      this.warnUnavailable('deleteMatching', error, `pattern=${pattern.source} `);
      return [];
    }
  }

  async ping(): Promise<HealthState> {
    const probeKey = `__health__:${randomUUID()}`;
    try {
      const stored = await withTimeout(
        'store.ping',
        this.keyv.set(probeKey, 'ok', 5000),
        this.timeoutMs,
      );
      if (!stored) return 'unhealthy';

      const value = await withTimeout(
        'store.ping',
        this.keyv.get(probeKey),
        this.timeoutMs,
      );
      await withTimeout('store.ping', this.keyv.delete(probeKey), this.timeoutMs);
      return value === 'ok' ? 'healthy' : 'unhealthy';
    } catch (error) {
      this.logger.warn(
        `[CacheStore] op=ping status=unhealthy error=${errorMessage(error)}`,
      );
      return 'unhealthy';
    }
  }

  async close(): Promise<void> {
    try {
      await this.keyv.disconnect();
    } catch (error) {
      this.logger.warn(
        `[CacheStore] op=close status=error error=${errorMessage(error)}`,
      );
    }
  }

  private warnUnavailable(operation: string, error: unknown, detail: string): void {
    const failure = new StoreUnavailableError(operation, toError(error));
    this.logger.warn(
      `[CacheStore] op=${operation} ${detail}status=unavailable error=${failure.message}`,
    );
  }

  private async scanAndDelete(
    iterate: KeyIterator,
    pattern: KeyPattern,
  ): Promise<string[]> {
    const matched: string[] = [];
    for await (const [key] of iterate(this.keyv.namespace)) {
      if (pattern.matches(key)) {
        matched.push(key);
      }
    }

    const results = await Promise.all(
      matched.map((key) => this.keyv.delete(key)),
    );
    return matched.filter((_, index) => results[index]);
  }
}
