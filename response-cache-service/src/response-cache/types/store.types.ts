import { KeyPattern } from '../utils/key-pattern';
import { CacheLevelName, HealthState, SemanticCandidate } from './cache.types';

/**
 * Outcome of a store read.
 * `unavailable` covers connection errors and timeouts; callers treat it as
 * a miss but must not mistake it for a deleted entry.
 */
export type StoreRead =
  | { status: 'found'; value: string }
  | { status: 'absent' }
  | { status: 'unavailable' };

/**
 * Backing store adapter
 * TTL-aware string store; every operation degrades instead of throwing.
 */
export interface CacheStore {
  read(key: string): Promise<StoreRead>;
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  deleteMatching(pattern: KeyPattern): Promise<string[]>;
  ping(): Promise<HealthState>;
  close(): Promise<void>;
}

export interface SemanticIndexEntry {
  level: CacheLevelName;
  key: string;
  embedding: number[];
  insertedAt: number;
  expiresAt: number;
}

/**
 * Vector index over semantic-level keys.
 * Holds key references only; payloads live in the backing store.
 * Implementations reject on failure and the coordinator decides how to degrade.
 */
export interface SemanticIndex {
  readonly backend: 'qdrant' | 'memory';
  open(): Promise<void>;
  close(): Promise<void>;
  isAvailable(): boolean;
  query(
    level: CacheLevelName,
    embedding: number[],
    topK: number,
  ): Promise<SemanticCandidate[]>;
  insert(entry: SemanticIndexEntry): Promise<void>;
  remove(keys: string[]): Promise<void>;
  removeExpired(now: number): Promise<number>;
  healthCheck(): Promise<boolean>;
}
