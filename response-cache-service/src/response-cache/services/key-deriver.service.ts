/**
 * Key Deriver
 * Normalized exact keys for every level, query embeddings for semantic levels
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import { createHash } from 'crypto';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import {
  CACHE_ENGINE_CONFIG,
  ConversationTurn,
  DerivedKey,
  LevelPolicy,
} from '../types/cache.types';
import type { CacheEngineConfig } from '../config/cache-engine.config';
import { withTimeout } from '../utils/with-timeout';
import { isEmbeddingVector } from '../utils/similarity';
import { EmbeddingUnavailableError, toError } from '../errors/cache-errors';

/**
 * Lowercase, trim and collapse internal whitespace. Punctuation is kept:
 * "order status?" and "order status" are different queries.
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, ' ');
}

@Injectable()
export class KeyDeriverService {
  private readonly logger = new Logger(KeyDeriverService.name);
  private embeddingModel: Embeddings | undefined;

  constructor(
    @Inject(CACHE_ENGINE_CONFIG) private readonly config: CacheEngineConfig,
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
  ) {}

  /**
   * Key material for one level. Exact levels get only the key; semantic
   * levels also carry the query embedding when the provider answers.
   * The coordinator pairs exactKey() with a memoized embed() on semantic
   * levels so a single call embeds the query at most once.
   */
  async derive(
    query: string,
    context: ConversationTurn[],
    policy: LevelPolicy,
  ): Promise<DerivedKey> {
    const exactKey = this.exactKey(query, context, policy);
    if (policy.keyStrategy !== 'semantic') {
      return { exactKey };
    }

    const embedding = await this.embed(query);
    return embedding ? { exactKey, embedding } : { exactKey };
  }

  /**
   * `{level}:{sha256}` over the normalized query and the last `keyWindow` turns.
   * The material is a JSON array so no delimiter inside a turn can collide.
   */
  exactKey(
    query: string,
    context: ConversationTurn[],
    policy: LevelPolicy,
  ): string {
    const window = policy.keyWindow > 0 ? context.slice(-policy.keyWindow) : [];
    const material = JSON.stringify([
      normalizeText(query),
      ...window.map((turn) => [
        normalizeText(turn.role),
        normalizeText(turn.content),
      ]),
    ]);

    const digest = createHash('sha256').update(material).digest('hex');
    return `${policy.name}:${digest}`;
  }

  /**
   * Embed the normalized query. Provider errors, timeouts and malformed
   * vectors all yield undefined.
   */
  async embed(query: string): Promise<number[] | undefined> {
    const startTime = Date.now();

    try {
      const model = this.getEmbeddingModel();
      const vector = await withTimeout(
        'embedding',
        model.embedQuery(normalizeText(query)),
        this.config.embeddingTimeoutMs,
      );

      if (!isEmbeddingVector(vector)) {
        this.logger.warn('[KeyDeriver] op=embed status=invalid-vector');
        return undefined;
      }

      this.logger.debug(
        `[KeyDeriver] op=embed status=ok dims=${vector.length} duration=${Date.now() - startTime}ms`,
      );
      return vector;
    } catch (error) {
      const failure = new EmbeddingUnavailableError(toError(error));
      this.logger.warn(
        `[KeyDeriver] op=embed status=unavailable duration=${Date.now() - startTime}ms error=${failure.message}`,
      );
      return undefined;
    }
  }

  private getEmbeddingModel(): Embeddings {
    if (!this.embeddingModel) {
      this.embeddingModel = this.embeddingProviderFactory.createEmbeddingModel();
    }
    return this.embeddingModel;
  }
}
