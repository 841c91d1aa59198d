/**
 * Qdrant Semantic Index
 * One point per cache key in the `response_cache_semantic` collection.
 * Payload carries only { key, level, insertedAt, expiresAt }; cached
 * responses stay in the backing store.
 */

import { Logger } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import * as crypto from 'crypto';
import {
  CACHE_CONSTANTS,
  CacheClock,
  CacheLevelName,
  SemanticCandidate,
  isCacheLevelName,
} from '../types/cache.types';
import type { SemanticIndex, SemanticIndexEntry } from '../types/store.types';
import { errorMessage } from '../errors/cache-errors';

export interface QdrantSemanticIndexOptions {
  collectionName: string;
  vectorSize: number;
}

type IndexedPointPayload = {
  key: string;
  level: CacheLevelName;
  insertedAt: number;
  expiresAt: number;
};

export class QdrantSemanticIndex implements SemanticIndex {
  readonly backend = 'qdrant' as const;

  private readonly logger = new Logger(QdrantSemanticIndex.name);
  private available = false;

  constructor(
    private readonly client: QdrantClient,
    private readonly options: QdrantSemanticIndexOptions,
    private readonly clock: CacheClock,
  ) {}

  /**
   * Ensure the collection exists. A failure leaves the index unavailable
   * and semantic levels are skipped until the next successful open().
   */
  async open(): Promise<void> {
    try {
      await this.ensureCollectionExists();
      this.available = true;
    } catch (error) {
      this.available = false;
      this.logger.error(
        `Semantic index initialization failed - semantic levels disabled: ${errorMessage(error)}`,
      );
    }
  }

  async close(): Promise<void> {
    this.available = false;
  }

  isAvailable(): boolean {
    return this.available;
  }

  async query(
    level: CacheLevelName,
    embedding: number[],
    topK: number,
  ): Promise<SemanticCandidate[]> {
    const results = await this.client.search(this.options.collectionName, {
      vector: {
        name: 'dense',
        vector: embedding,
      },
      limit: topK,
      with_payload: true,
      filter: {
        must: [
          { key: 'level', match: { value: level } },
          { key: 'expiresAt', range: { gt: this.clock.now() } },
        ],
      },
    });

    const candidates: SemanticCandidate[] = [];
    for (const result of results) {
      const payload = parsePayload(result.payload);
      if (!payload) {
        this.logger.warn(
          `[SemanticIndex] op=query point=${String(result.id)} status=malformed-payload`,
        );
        continue;
      }
      candidates.push({
        key: payload.key,
        score: result.score,
        insertedAt: payload.insertedAt,
      });
    }
    return candidates;
  }

  async insert(entry: SemanticIndexEntry): Promise<void> {
    const payload: IndexedPointPayload = {
      key: entry.key,
      level: entry.level,
      insertedAt: entry.insertedAt,
      expiresAt: entry.expiresAt,
    };

    await this.client.upsert(this.options.collectionName, {
      points: [
        {
          id: stringToUuid(entry.key),
          vector: {
            dense: entry.embedding,
          },
          payload,
        },
      ],
      wait: true,
    });
  }

  async remove(keys: string[]): Promise<void> {
    if (keys.length === 0) return;

    await this.client.delete(this.options.collectionName, {
      points: keys.map((key) => stringToUuid(key)),
      wait: true,
    });
  }

  /**
   * Delete points whose entries have expired (cron job)
   */
  async removeExpired(now: number): Promise<number> {
    const filter = {
      must: [{ key: 'expiresAt', range: { lte: now } }],
    };

    const { count } = await this.client.count(this.options.collectionName, {
      filter,
      exact: true,
    });
    if (count === 0) return 0;

    await this.client.delete(this.options.collectionName, {
      filter,
      wait: true,
    });
    return count;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollection(this.options.collectionName);
      return true;
    } catch {
      return false;
    }
  }

  private async ensureCollectionExists(): Promise<void> {
    const { exists } = await this.client.collectionExists(
      this.options.collectionName,
    );
    if (exists) {
      this.logger.log(
        `Semantic index collection "${this.options.collectionName}" exists`,
      );
      return;
    }

    this.logger.log(
      `Creating semantic index collection "${this.options.collectionName}"...`,
    );

    await this.client.createCollection(this.options.collectionName, {
      vectors: {
        dense: {
          size: this.options.vectorSize,
          distance: CACHE_CONSTANTS.DISTANCE_METRIC,
        },
      },
      on_disk_payload: false,
    });

    await this.createPayloadIndexes();

    this.logger.log(
      `✓ Semantic index collection "${this.options.collectionName}" created`,
    );
  }

  private async createPayloadIndexes(): Promise<void> {
    try {
      // level (keyword) - per-level filtering
      await this.client.createPayloadIndex(this.options.collectionName, {
        field_name: 'level',
        field_schema: 'keyword',
      });

      // expiresAt (integer) - TTL filtering and cleanup
      await this.client.createPayloadIndex(this.options.collectionName, {
        field_name: 'expiresAt',
        field_schema: 'integer',
      });
    } catch (error) {
      this.logger.warn(
        `Could not create semantic index payload indexes: ${errorMessage(error)}`,
      );
    }
  }
}

/**
 * Qdrant point ids must be UUIDs or integers; derive a stable UUID from the key
 */
export function stringToUuid(str: string): string {
  const hash = crypto.createHash('md5').update(str).digest('hex');
  return `${hash.substring(0, 8)}-${hash.substring(8, 12)}-4${hash.substring(13, 16)}-${((parseInt(hash.substring(16, 18), 16) & 0x3f) | 0x80).toString(16)}${hash.substring(18, 20)}-${hash.substring(20, 32)}`;
}

function parsePayload(
  payload: Record<string, unknown> | null | undefined,
): IndexedPointPayload | undefined {
  if (!payload) return undefined;

  const { key, level, insertedAt, expiresAt } = payload;
  if (
    typeof key !== 'string' ||
    typeof level !== 'string' ||
    !isCacheLevelName(level) ||
    typeof insertedAt !== 'number' ||
    typeof expiresAt !== 'number'
  ) {
    return undefined;
  }
  return { key, level, insertedAt, expiresAt };
}
