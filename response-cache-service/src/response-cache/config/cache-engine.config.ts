/**
 * Cache Engine Configuration
 * Built once at startup from environment variables; invalid values are fatal.
 */

import { ConfigService } from '@nestjs/config';
import {
  CACHE_CONSTANTS,
  CACHE_LEVELS,
  CacheLevelName,
  KeyStrategy,
  LevelPolicy,
  isCacheLevelName,
} from '../types/cache.types';

export interface CacheEngineConfig {
  levelOrder: readonly CacheLevelName[];
  levels: Readonly<Record<CacheLevelName, Readonly<LevelPolicy>>>;
  storeTimeoutMs: number;
  indexTimeoutMs: number;
  embeddingTimeoutMs: number;
}

export const DEFAULT_LEVEL_ORDER: readonly CacheLevelName[] = [
  'conversation',
  'intent',
  'knowledge',
  'full_response',
];

export const DEFAULT_LEVEL_POLICIES: Readonly<Record<CacheLevelName, LevelPolicy>> = {
  conversation: {
    name: 'conversation',
    enabled: true,
    ttlSeconds: 1800, // 30 minutes
    keyStrategy: 'exact',
    similarityThreshold: 0.95,
    keyWindow: 3,
    topK: 1,
    costPerHitUsd: 0.03,
  },
  intent: {
    name: 'intent',
    enabled: true,
    ttlSeconds: 21600, // 6 hours
    keyStrategy: 'exact',
    similarityThreshold: 0.95,
    keyWindow: 0,
    topK: 1,
    costPerHitUsd: 0.001,
  },
  knowledge: {
    name: 'knowledge',
    enabled: true,
    ttlSeconds: 43200, // 12 hours
    keyStrategy: 'exact',
    similarityThreshold: 0.95,
    keyWindow: 0,
    topK: 1,
    costPerHitUsd: 0.005,
  },
  full_response: {
    name: 'full_response',
    enabled: true,
    ttlSeconds: 86400, // 24 hours
    keyStrategy: 'semantic',
    similarityThreshold: 0.95,
    keyWindow: 0,
    topK: 5,
    costPerHitUsd: 0.03,
  },
};

export class CacheConfigError extends Error {
  constructor(variable: string, reason: string) {
    super(`Invalid cache configuration ${variable}: ${reason}`);
    this.name = 'CacheConfigError';
  }
}

type PolicyOverrides = Partial<Omit<LevelPolicy, 'name'>>;

export interface CacheEngineConfigOverrides {
  levelOrder?: CacheLevelName[];
  levels?: Partial<Record<CacheLevelName, PolicyOverrides>>;
  storeTimeoutMs?: number;
  indexTimeoutMs?: number;
  embeddingTimeoutMs?: number;
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function createCacheEngineConfig(
  overrides: CacheEngineConfigOverrides = {},
): CacheEngineConfig {
  const levels: Record<CacheLevelName, Readonly<LevelPolicy>> = {
    conversation: buildPolicy('conversation', overrides.levels?.conversation),
    intent: buildPolicy('intent', overrides.levels?.intent),
    knowledge: buildPolicy('knowledge', overrides.levels?.knowledge),
    full_response: buildPolicy(
      'full_response',
      overrides.levels?.full_response,
    ),
  };

  const levelOrder = overrides.levelOrder ?? [...DEFAULT_LEVEL_ORDER];
  validateLevelOrder(levelOrder);

  const config: CacheEngineConfig = {
    levelOrder: Object.freeze([...levelOrder]),
    levels: Object.freeze(levels),
    storeTimeoutMs: overrides.storeTimeoutMs ?? CACHE_CONSTANTS.STORE_TIMEOUT_MS,
    indexTimeoutMs: overrides.indexTimeoutMs ?? CACHE_CONSTANTS.INDEX_TIMEOUT_MS,
    embeddingTimeoutMs:
      overrides.embeddingTimeoutMs ?? CACHE_CONSTANTS.EMBEDDING_TIMEOUT_MS,
  };

  requirePositiveInteger('CACHE_STORE_TIMEOUT_MS', config.storeTimeoutMs);
  requirePositiveInteger('CACHE_INDEX_TIMEOUT_MS', config.indexTimeoutMs);
  requirePositiveInteger('CACHE_EMBEDDING_TIMEOUT_MS', config.embeddingTimeoutMs);

  return Object.freeze(config);
}

/**
 * Read CACHE_* variables through ConfigService
 */
export function buildCacheEngineConfig(
  configService: ConfigService,
): CacheEngineConfig {
  const levels: Partial<Record<CacheLevelName, PolicyOverrides>> = {};

  for (const name of CACHE_LEVELS) {
    const prefix = `CACHE_${name.toUpperCase()}`;
    levels[name] = {
      enabled: readBoolean(configService, `${prefix}_ENABLED`),
      ttlSeconds: readNumber(configService, `${prefix}_TTL_SECONDS`),
      keyStrategy: readStrategy(configService, `${prefix}_STRATEGY`),
      similarityThreshold: readNumber(
        configService,
        `${prefix}_SIMILARITY_THRESHOLD`,
      ),
      keyWindow: readNumber(configService, `${prefix}_KEY_WINDOW`),
      topK: readNumber(configService, `${prefix}_TOP_K`),
      costPerHitUsd: readNumber(configService, `${prefix}_COST_PER_HIT_USD`),
    };
  }

  return createCacheEngineConfig({
    levelOrder: readLevelOrder(configService),
    levels,
    storeTimeoutMs: readNumber(configService, 'CACHE_STORE_TIMEOUT_MS'),
    indexTimeoutMs: readNumber(configService, 'CACHE_INDEX_TIMEOUT_MS'),
    embeddingTimeoutMs: readNumber(configService, 'CACHE_EMBEDDING_TIMEOUT_MS'),
  });
}

function readRaw(configService: ConfigService, key: string): string | undefined {
  const value = configService.get<string | number | boolean>(key);
  if (value === undefined || value === null) return undefined;
  const text = String(value).trim();
  return text === '' ? undefined : text;
}

function readNumber(
  configService: ConfigService,
  key: string,
): number | undefined {
  const raw = readRaw(configService, key);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new CacheConfigError(key, `"${raw}" is not a number`);
  }
  return value;
}

function readBoolean(
  configService: ConfigService,
  key: string,
): boolean | undefined {
  const raw = readRaw(configService, key);
  if (raw === undefined) return undefined;

  const normalized = raw.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new CacheConfigError(key, `"${raw}" is not a boolean`);
}

function readStrategy(
  configService: ConfigService,
  key: string,
): KeyStrategy | undefined {
  const raw = readRaw(configService, key);
  if (raw === undefined) return undefined;

  if (raw === 'exact' || raw === 'semantic') return raw;
  throw new CacheConfigError(key, `expected "exact" or "semantic", got "${raw}"`);
}

function readLevelOrder(
  configService: ConfigService,
): CacheLevelName[] | undefined {
  const raw = readRaw(configService, 'CACHE_LEVEL_ORDER');
  if (raw === undefined) return undefined;

  return raw.split(',').map((part) => {
    const name = part.trim();
    if (!isCacheLevelName(name)) {
      throw new CacheConfigError('CACHE_LEVEL_ORDER', `unknown level "${name}"`);
    }
    return name;
  });
}

function buildPolicy(
  name: CacheLevelName,
  overrides: PolicyOverrides = {},
): Readonly<LevelPolicy> {
  const defaults = DEFAULT_LEVEL_POLICIES[name];
  const policy: LevelPolicy = {
    name,
    enabled: overrides.enabled ?? defaults.enabled,
    ttlSeconds: overrides.ttlSeconds ?? defaults.ttlSeconds,
    keyStrategy: overrides.keyStrategy ?? defaults.keyStrategy,
    similarityThreshold:
      overrides.similarityThreshold ?? defaults.similarityThreshold,
    keyWindow: overrides.keyWindow ?? defaults.keyWindow,
    topK: overrides.topK ?? defaults.topK,
    costPerHitUsd: overrides.costPerHitUsd ?? defaults.costPerHitUsd,
  };
  validatePolicy(policy);
  return Object.freeze(policy);
}

function validatePolicy(policy: LevelPolicy): void {
  const prefix = `CACHE_${policy.name.toUpperCase()}`;

  requirePositiveInteger(`${prefix}_TTL_SECONDS`, policy.ttlSeconds);
  requirePositiveInteger(`${prefix}_TOP_K`, policy.topK);

  if (!Number.isInteger(policy.keyWindow) || policy.keyWindow < 0) {
    throw new CacheConfigError(
      `${prefix}_KEY_WINDOW`,
      'must be a non-negative integer',
    );
  }
  if (
    !Number.isFinite(policy.similarityThreshold) ||
    policy.similarityThreshold < -1 ||
    policy.similarityThreshold > 1
  ) {
    throw new CacheConfigError(
      `${prefix}_SIMILARITY_THRESHOLD`,
      'must be within [-1, 1]',
    );
  }
  if (!Number.isFinite(policy.costPerHitUsd) || policy.costPerHitUsd < 0) {
    throw new CacheConfigError(
      `${prefix}_COST_PER_HIT_USD`,
      'must be a non-negative number',
    );
  }
}

function validateLevelOrder(levelOrder: CacheLevelName[]): void {
  if (levelOrder.length === 0) {
    throw new CacheConfigError('CACHE_LEVEL_ORDER', 'must name at least one level');
  }
  const seen = new Set<CacheLevelName>();
  for (const name of levelOrder) {
    if (seen.has(name)) {
      throw new CacheConfigError('CACHE_LEVEL_ORDER', `duplicate level "${name}"`);
    }
    seen.add(name);
  }
}

function requirePositiveInteger(variable: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new CacheConfigError(variable, 'must be a positive integer');
  }
}
