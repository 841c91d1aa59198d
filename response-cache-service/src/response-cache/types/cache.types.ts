/**
 * Cache Types & Constants
 * Shared vocabulary of the multi-level response cache: levels, policies,
 * payloads, lookup results and metrics snapshots.
 */

/**
 * Cache level names
 * Deployment order is configured separately (CacheEngineConfig.levelOrder)
 */
export const CACHE_LEVELS = [
  'conversation',
  'intent',
  'knowledge',
  'full_response',
] as const;

export type CacheLevelName = (typeof CACHE_LEVELS)[number];

export type KeyStrategy = 'exact' | 'semantic';

export function isCacheLevelName(value: string): value is CacheLevelName {
  return (CACHE_LEVELS as readonly string[]).includes(value);
}

/**
 * JSON values
 * Payloads are stored as JSON and never interpreted by the cache itself
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

export type CachePayload = { [key: string]: JsonValue };

/**
 * Shape the conversation orchestrator writes on a full-response miss.
 * Any other JSON object is accepted as well.
 */
export type ChatResponsePayload = {
  text: string;
  intent?: string;
  confidence?: number;
  citations?: Array<{ documentId: string; chunkId?: string; title?: string }>;
  metadata?: { [key: string]: JsonValue };
};

/**
 * One prior turn of the conversation, oldest first
 */
export interface ConversationTurn {
  role: string;
  content: string;
}

export function isConversationTurn(value: unknown): value is ConversationTurn {
  return (
    typeof value === 'object' &&
    value !== null &&
    'role' in value &&
    typeof value.role === 'string' &&
    'content' in value &&
    typeof value.content === 'string'
  );
}

/**
 * Per-level policy
 */
export interface LevelPolicy {
  name: CacheLevelName;
  enabled: boolean;
  ttlSeconds: number;
  keyStrategy: KeyStrategy;
  similarityThreshold: number; // only meaningful for semantic levels
  keyWindow: number; // prior turns folded into the exact key
  topK: number; // semantic candidates fetched per lookup
  costPerHitUsd: number; // estimated pipeline cost avoided by one hit
}

/**
 * Output of the key deriver
 */
export interface DerivedKey {
  exactKey: string;
  embedding?: number[];
}

/**
 * Stored envelope (backing store value)
 */
export interface CacheEnvelope {
  format: typeof CACHE_CONSTANTS.ENVELOPE_FORMAT;
  level: CacheLevelName;
  key: string;
  createdAt: number; // ms
  expiresAt: number; // ms, createdAt + ttlSeconds * 1000
  value: CachePayload;
}

/**
 * Lookup result
 * A miss is its own variant, never an absent value
 */
export interface CacheHit {
  hit: true;
  level: CacheLevelName;
  key: string;
  value: CachePayload;
  latencyMs: number;
  similarity?: number; // set for semantic hits
}

export interface CacheMiss {
  hit: false;
  latencyMs: number;
  skippedLevels: CacheLevelName[];
}

export type CacheResult = CacheHit | CacheMiss;

export interface PutResult {
  ok: boolean;
  levelsWritten: CacheLevelName[];
}

export interface InvalidateResult {
  removedCount: number;
}

export interface WarmEntry {
  query: string;
  context?: ConversationTurn[];
  value: CachePayload;
  levels: CacheLevelName[];
}

/**
 * Semantic index candidate
 */
export interface SemanticCandidate {
  key: string;
  score: number; // cosine similarity in [-1, 1]
  insertedAt: number;
}

export type HealthState = 'healthy' | 'unhealthy';

export interface CacheHealth {
  status: 'healthy' | 'degraded';
  store: HealthState;
  semanticIndex: HealthState | 'disabled';
}

/**
 * Metrics snapshot
 */
export interface LevelMetrics {
  hits: number;
  misses: number;
  skipped: number;
  hitRate: number; // hits / (hits + misses)
  averageLatencyMs: number;
}

export interface CacheMetricsSnapshot {
  perLevel: Record<CacheLevelName, LevelMetrics>;
  lookups: number;
  hits: number;
  overallHitRate: number; // hits / lookups
  estimatedCostSavedUsd: number;
  puts: number;
  invalidations: number;
}

/**
 * Clock used for entry timestamps
 */
export interface CacheClock {
  now(): number;
}

export const systemClock: CacheClock = {
  now: () => Date.now(),
};

/**
 * Cache Configuration Constants
 */
export const CACHE_CONSTANTS = {
  /**
   * Keyv namespace for backing store keys
   */
  STORE_NAMESPACE: 'response-cache',

  /**
   * Envelope format tag
   */
  ENVELOPE_FORMAT: 'response-cache/v1',

  /**
   * Qdrant collection for the semantic index
   */
  SEMANTIC_COLLECTION: 'response_cache_semantic',

  /**
   * Vector distance metric
   */
  DISTANCE_METRIC: 'Cosine' as const,

  /**
   * Default per-call budgets (milliseconds)
   */
  STORE_TIMEOUT_MS: 250,
  INDEX_TIMEOUT_MS: 500,
  EMBEDDING_TIMEOUT_MS: 2000,
} as const;

/**
 * Injection tokens
 */
export const CACHE_ENGINE_CONFIG = Symbol('CACHE_ENGINE_CONFIG');
export const CACHE_STORE = Symbol('CACHE_STORE');
export const SEMANTIC_INDEX = Symbol('SEMANTIC_INDEX');
export const CACHE_CLOCK = Symbol('CACHE_CLOCK');
