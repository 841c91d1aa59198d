/**
 * In-process semantic index for local runs and tests.
 * Linear cosine scan over entries of the requested level.
 */

import type {
  CacheClock,
  CacheLevelName,
  SemanticCandidate,
} from '../types/cache.types';
import type { SemanticIndex, SemanticIndexEntry } from '../types/store.types';
import { cosineSimilarity } from '../utils/similarity';

interface IndexedVector extends SemanticIndexEntry {
  sequence: number;
}

export class InMemorySemanticIndex implements SemanticIndex {
  readonly backend = 'memory' as const;

  private readonly entries = new Map<string, IndexedVector>();
  private sequence = 0;
  private available = true;

  constructor(private readonly clock: CacheClock) {}

  async open(): Promise<void> {
    this.available = true;
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
    const now = this.clock.now();

    return [...this.entries.values()]
      .filter((entry) => entry.level === level && entry.expiresAt > now)
      .map((entry) => ({
        entry,
        score: cosineSimilarity(embedding, entry.embedding),
      }))
      .sort(
        (left, right) =>
          right.score - left.score ||
          right.entry.insertedAt - left.entry.insertedAt ||
          right.entry.sequence - left.entry.sequence,
      )
      .slice(0, topK)
      .map(({ entry, score }) => ({
        key: entry.key,
        score,
        insertedAt: entry.insertedAt,
      }));
  }

  async insert(entry: SemanticIndexEntry): Promise<void> {
    // re-inserting a key replaces its vector, like an upsert
    this.entries.set(entry.key, {
      ...entry,
      embedding: [...entry.embedding],
      sequence: ++this.sequence,
    });
  }

  async remove(keys: string[]): Promise<void> {
    for (const key of keys) {
      this.entries.delete(key);
    }
  }

  async removeExpired(now: number): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async healthCheck(): Promise<boolean> {
    return this.available;
  }

  size(): number {
    return this.entries.size;
  }
}
