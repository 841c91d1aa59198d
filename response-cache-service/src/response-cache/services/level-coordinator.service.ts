/**
 * Level Coordinator
 * Walks the configured levels in order on lookup and writes levels
 * independently on store. Store, index and embedding failures degrade to a
 * miss or a partial write; only an invalid invalidation pattern is thrown.
 */

import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import {
  CACHE_CLOCK,
  CACHE_CONSTANTS,
  CACHE_ENGINE_CONFIG,
  CACHE_STORE,
  SEMANTIC_INDEX,
  CacheClock,
  CacheEnvelope,
  CacheHealth,
  CacheLevelName,
  CacheMetricsSnapshot,
  CachePayload,
  CacheResult,
  ConversationTurn,
  InvalidateResult,
  LevelPolicy,
  PutResult,
  SemanticCandidate,
  WarmEntry,
} from '../types/cache.types';
import type { CacheStore, SemanticIndex } from '../types/store.types';
import type { CacheEngineConfig } from '../config/cache-engine.config';
import { KeyDeriverService } from './key-deriver.service';
import { CacheMetricsService } from './cache-metrics.service';
import { compileKeyPattern, KeyPattern } from '../utils/key-pattern';
import { decodeEnvelope, encodeEnvelope } from '../utils/cache-envelope';
import { rankCandidates } from '../utils/similarity';
import { withTimeout } from '../utils/with-timeout';
import {
  CacheSerializationError,
  SemanticIndexUnavailableError,
  errorMessage,
  toError,
} from '../errors/cache-errors';

type LevelOutcome =
  | { status: 'hit'; key: string; value: CachePayload; similarity?: number }
  | { status: 'miss' }
  | { status: 'skipped'; reason: string };

/**
 * Embedding for one call, computed at most once and shared across levels
 */
type EmbeddingSource = () => Promise<number[] | undefined>;

export interface WarmResult {
  warmed: number;
  results: PutResult[];
}

@Injectable()
export class LevelCoordinatorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LevelCoordinatorService.name);
  private closed = false;

  constructor(
    @Inject(CACHE_ENGINE_CONFIG) private readonly config: CacheEngineConfig,
    @Inject(CACHE_STORE) private readonly store: CacheStore,
    @Inject(SEMANTIC_INDEX) private readonly semanticIndex: SemanticIndex,
    @Inject(CACHE_CLOCK) private readonly clock: CacheClock,
    private readonly keyDeriver: KeyDeriverService,
    private readonly metrics: CacheMetricsService,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.open();
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  async open(): Promise<void> {
    this.closed = false;

    if (this.hasSemanticLevels()) {
      await this.semanticIndex.open();
    }

    const storeHealth = await this.store.ping();
    this.logger.log(
      `[LevelCoordinator] op=open levels=${this.activePolicies()
        .map((policy) => `${policy.name}(${policy.keyStrategy})`)
        .join(',')} store=${storeHealth} semanticIndex=${this.semanticIndexState()}`,
    );
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.semanticIndex.close();
    await this.store.close();
    this.logger.log('[LevelCoordinator] op=close status=closed');
  }

  /**
   * Look the query up level by level; the first hit wins
   */
  async get(
    query: string,
    context: ConversationTurn[] = [],
  ): Promise<CacheResult> {
    const startTime = Date.now();
    const skippedLevels: CacheLevelName[] = [];
    const embeddingSource = this.embeddingSource(query);

    for (const policy of this.activePolicies()) {
      const levelStart = Date.now();
      const outcome = this.closed
        ? { status: 'skipped' as const, reason: 'coordinator closed' }
        : policy.keyStrategy === 'semantic'
          ? await this.lookupSemantic(policy, embeddingSource)
          : await this.lookupExact(policy, query, context);
      const levelLatency = Date.now() - levelStart;

      if (outcome.status === 'skipped') {
        skippedLevels.push(policy.name);
        this.metrics.recordLevelSkipped(policy.name);
        this.logger.debug(
          `[LevelCoordinator] op=get level=${policy.name} status=skipped reason=${outcome.reason}`,
        );
        continue;
      }

      if (outcome.status === 'miss') {
        this.metrics.recordLevelMiss(policy.name, levelLatency);
        continue;
      }

      this.metrics.recordLevelHit(policy.name, levelLatency);
      this.metrics.recordLookup(true);

      const latencyMs = Date.now() - startTime;
      this.logger.log(
        `[LevelCoordinator] op=get level=${policy.name} status=hit${
          outcome.similarity !== undefined
            ? ` similarity=${outcome.similarity.toFixed(4)}`
            : ''
        } duration=${latencyMs}ms`,
      );

      return {
        hit: true,
        level: policy.name,
        key: outcome.key,
        value: outcome.value,
        latencyMs,
        ...(outcome.similarity !== undefined
          ? { similarity: outcome.similarity }
          : {}),
      };
    }

    this.metrics.recordLookup(false);
    const latencyMs = Date.now() - startTime;
    this.logger.debug(
      `[LevelCoordinator] op=get status=miss skipped=${skippedLevels.join(',') || 'none'} duration=${latencyMs}ms`,
    );

    return { hit: false, latencyMs, skippedLevels };
  }

  /**
   * Write the value into each requested level independently
   */
  async put(
    query: string,
    context: ConversationTurn[],
    value: CachePayload,
    levels: CacheLevelName[],
  ): Promise<PutResult> {
    const requested = this.config.levelOrder.filter((name) =>
      levels.includes(name),
    );
    const unconfigured = [...new Set(levels)].filter(
      (name) => !this.config.levelOrder.includes(name),
    );
    if (unconfigured.length > 0) {
      this.logger.warn(
        `[LevelCoordinator] op=put status=ignored levels=${unconfigured.join(',')} reason=not-configured`,
      );
    }

    this.metrics.recordPut();

    if (this.closed || requested.length === 0) {
      return { ok: false, levelsWritten: [] };
    }

    const createdAt = this.clock.now();
    const embeddingSource = this.embeddingSource(query);

    const written = await Promise.all(
      requested.map((name) =>
        this.writeLevel(
          this.config.levels[name],
          query,
          context,
          value,
          createdAt,
          embeddingSource,
        ),
      ),
    );

    const levelsWritten = requested.filter((_, index) => written[index]);
    const ok =
      unconfigured.length === 0 && levelsWritten.length === requested.length;

    this.logger.debug(
      `[LevelCoordinator] op=put status=${ok ? 'ok' : 'partial'} levels=${levelsWritten.join(',') || 'none'}`,
    );

    return { ok, levelsWritten };
  }

  /**
   * Delete every stored entry whose key matches the glob pattern.
   * The pattern is validated before any store call; InvalidPatternError
   * is thrown synchronously.
   */
  invalidate(pattern: string): Promise<InvalidateResult> {
    const keyPattern = compileKeyPattern(pattern);
    return this.removeMatching(keyPattern);
  }

  /**
   * Drop the exact entries one query produced
   */
  async invalidateQuery(
    query: string,
    context: ConversationTurn[] = [],
    levels: CacheLevelName[] = [...this.config.levelOrder],
  ): Promise<InvalidateResult> {
    this.metrics.recordInvalidation();
    if (this.closed) return { removedCount: 0 };

    const keys = levels.map((name) =>
      this.keyDeriver.exactKey(query, context, this.config.levels[name]),
    );
    const deleted = await Promise.all(keys.map((key) => this.store.delete(key)));
    await this.removeFromIndex(keys);

    const removedCount = deleted.filter(Boolean).length;
    this.logger.log(
      `[LevelCoordinator] op=invalidateQuery levels=${levels.join(',')} removed=${removedCount}`,
    );
    return { removedCount };
  }

  /**
   * Pre-populate the cache with known question/answer pairs
   */
  async warm(entries: WarmEntry[]): Promise<WarmResult> {
    const results: PutResult[] = [];
    for (const entry of entries) {
      results.push(
        await this.put(entry.query, entry.context ?? [], entry.value, entry.levels),
      );
    }

    const warmed = results.filter((result) => result.ok).length;
    this.logger.log(
      `[LevelCoordinator] op=warm entries=${entries.length} warmed=${warmed}`,
    );
    return { warmed, results };
  }

  async health(): Promise<CacheHealth> {
    const store = this.closed ? 'unhealthy' : await this.store.ping();

    let semanticIndex: CacheHealth['semanticIndex'] = 'disabled';
    if (this.hasSemanticLevels()) {
      const reachable =
        !this.closed &&
        this.semanticIndex.isAvailable() &&
        (await this.semanticIndex.healthCheck());
      semanticIndex = reachable ? 'healthy' : 'unhealthy';
    }

    const status =
      store === 'healthy' && semanticIndex !== 'unhealthy'
        ? 'healthy'
        : 'degraded';
    return { status, store, semanticIndex };
  }

  metricsSnapshot(): CacheMetricsSnapshot {
    return this.metrics.snapshot();
  }

  resetMetrics(): void {
    this.metrics.reset();
  }

  /**
   * Purge index points whose entries have expired
   */
  async removeExpiredVectors(): Promise<number> {
    if (this.closed || !this.semanticIndex.isAvailable()) return 0;
    return this.semanticIndex.removeExpired(this.clock.now());
  }

  private async lookupExact(
    policy: LevelPolicy,
    query: string,
    context: ConversationTurn[],
  ): Promise<LevelOutcome> {
    const { exactKey: key } = await this.keyDeriver.derive(query, context, policy);
    const envelope = await this.readEnvelope(key, policy);

    if (envelope === 'unavailable') {
      return { status: 'skipped', reason: 'store-unavailable' };
    }
    return envelope
      ? { status: 'hit', key, value: envelope.value }
      : { status: 'miss' };
  }

  private async lookupSemantic(
    policy: LevelPolicy,
    embeddingSource: EmbeddingSource,
  ): Promise<LevelOutcome> {
    if (!this.semanticIndex.isAvailable()) {
      return { status: 'skipped', reason: 'index-unavailable' };
    }

    const embedding = await embeddingSource();
    if (!embedding) {
      return { status: 'skipped', reason: 'embedding-unavailable' };
    }

    let candidates: SemanticCandidate[];
    try {
      candidates = await withTimeout(
        'index.query',
        this.semanticIndex.query(policy.name, embedding, policy.topK),
        this.config.indexTimeoutMs,
      );
    } catch (error) {
      const failure = new SemanticIndexUnavailableError('query', toError(error));
      this.logger.warn(
        `[LevelCoordinator] op=get level=${policy.name} status=index-unavailable error=${failure.message}`,
      );
      return { status: 'skipped', reason: 'index-unavailable' };
    }

    const eligible = rankCandidates(candidates).filter(
      (candidate) => candidate.score >= policy.similarityThreshold,
    );

    for (const candidate of eligible) {
      const envelope = await this.readEnvelope(candidate.key, policy);
      if (envelope === 'unavailable') {
        return { status: 'skipped', reason: 'store-unavailable' };
      }
      if (envelope) {
        return {
          status: 'hit',
          key: candidate.key,
          value: envelope.value,
          similarity: candidate.score,
        };
      }

      // payload gone (expired or deleted): the vector is an orphan
      await this.removeFromIndex([candidate.key]);
    }

    this.logger.debug(
      `[LevelCoordinator] op=get level=${policy.name} status=miss candidates=${candidates.length} eligible=${eligible.length}`,
    );
    return { status: 'miss' };
  }

  /**
   * Read and validate the envelope under `key`.
   * Corrupt and expired entries are deleted and reported as absent.
   */
  private async readEnvelope(
    key: string,
    policy: LevelPolicy,
  ): Promise<CacheEnvelope | undefined | 'unavailable'> {
    const read = await this.store.read(key);
    if (read.status === 'unavailable') return 'unavailable';
    if (read.status === 'absent') return undefined;

    let envelope: CacheEnvelope;
    try {
      envelope = decodeEnvelope(key, read.value);
      if (envelope.level !== policy.name) {
        throw new CacheSerializationError(
          key,
          `stored under level "${envelope.level}"`,
        );
      }
    } catch (error) {
      this.logger.warn(
        `[LevelCoordinator] op=read level=${policy.name} key=${key} status=corrupt error=${errorMessage(error)}`,
      );
      await this.store.delete(key);
      return undefined;
    }

    if (this.clock.now() >= envelope.expiresAt) {
      await this.store.delete(key);
      return undefined;
    }

    return envelope;
  }

  private async writeLevel(
    policy: LevelPolicy,
    query: string,
    context: ConversationTurn[],
    value: CachePayload,
    createdAt: number,
    embeddingSource: EmbeddingSource,
  ): Promise<boolean> {
    if (!policy.enabled) {
      this.logger.warn(
        `[LevelCoordinator] op=put level=${policy.name} status=skipped reason=disabled`,
      );
      return false;
    }

    const key = this.keyDeriver.exactKey(query, context, policy);
    const envelope: CacheEnvelope = {
      format: CACHE_CONSTANTS.ENVELOPE_FORMAT,
      level: policy.name,
      key,
      createdAt,
      expiresAt: createdAt + policy.ttlSeconds * 1000,
      value,
    };

    const stored = await this.store.set(
      key,
      encodeEnvelope(envelope),
      policy.ttlSeconds,
    );
    if (!stored) {
      return false;
    }

    if (policy.keyStrategy === 'semantic') {
      await this.registerEmbedding(policy, envelope, embeddingSource);
    }
    return true;
  }

  /**
   * Index the entry's embedding. Failure leaves the entry reachable by
   * exact key only; the store write is not rolled back.
   */
  private async registerEmbedding(
    policy: LevelPolicy,
    envelope: CacheEnvelope,
    embeddingSource: EmbeddingSource,
  ): Promise<void> {
    if (!this.semanticIndex.isAvailable()) {
      this.logger.warn(
        `[LevelCoordinator] op=put level=${policy.name} key=${envelope.key} status=index-unavailable`,
      );
      return;
    }

    const embedding = await embeddingSource();
    if (!embedding) {
      this.logger.warn(
        `[LevelCoordinator] op=put level=${policy.name} key=${envelope.key} status=embedding-unavailable`,
      );
      return;
    }

    try {
      await withTimeout(
        'index.insert',
        this.semanticIndex.insert({
          level: policy.name,
          key: envelope.key,
          embedding,
          insertedAt: envelope.createdAt,
          expiresAt: envelope.expiresAt,
        }),
        this.config.indexTimeoutMs,
      );
    } catch (error) {
      const failure = new SemanticIndexUnavailableError('insert', toError(error));
      this.logger.warn(
        `[LevelCoordinator] op=put level=${policy.name} key=${envelope.key} status=index-insert-failed error=${failure.message}`,
      );
    }
  }

  private async removeMatching(
    keyPattern: KeyPattern,
  ): Promise<InvalidateResult> {
    this.metrics.recordInvalidation();
    if (this.closed) return { removedCount: 0 };

    const removedKeys = await this.store.deleteMatching(keyPattern);
    await this.removeFromIndex(removedKeys);

    this.logger.log(
      `[LevelCoordinator] op=invalidate pattern=${keyPattern.source} removed=${removedKeys.length}`,
    );
    return { removedCount: removedKeys.length };
  }

  private async removeFromIndex(keys: string[]): Promise<void> {
    if (keys.length === 0 || !this.semanticIndex.isAvailable()) return;

    try {
      await withTimeout(
        'index.remove',
        this.semanticIndex.remove(keys),
        this.config.indexTimeoutMs,
      );
    } catch (error) {
      const failure = new SemanticIndexUnavailableError('remove', toError(error));
      this.logger.warn(
        `[LevelCoordinator] op=index.remove keys=${keys.length} status=failed error=${failure.message}`,
      );
    }
  }

  /**
   * One embedding per get/put call, shared by every semantic level
   */
  private embeddingSource(query: string): EmbeddingSource {
    let pending: Promise<number[] | undefined> | undefined;
    return () => {
      if (!pending) {
        pending = this.keyDeriver.embed(query);
      }
      return pending;
    };
  }

  private activePolicies(): LevelPolicy[] {
    return this.config.levelOrder
      .map((name) => this.config.levels[name])
      .filter((policy) => policy.enabled);
  }

  private hasSemanticLevels(): boolean {
    return this.activePolicies().some(
      (policy) => policy.keyStrategy === 'semantic',
    );
  }

  private semanticIndexState(): string {
    if (!this.hasSemanticLevels()) return 'disabled';
    return this.semanticIndex.isAvailable()
      ? `${this.semanticIndex.backend}:available`
      : `${this.semanticIndex.backend}:unavailable`;
  }
}
