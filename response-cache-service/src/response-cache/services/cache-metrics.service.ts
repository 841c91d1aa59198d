/**
 * Cache Metrics Aggregator
 * In-process counters, reset on restart or explicit reset()
 */

import { Inject, Injectable } from '@nestjs/common';
import {
  CACHE_ENGINE_CONFIG,
  CACHE_LEVELS,
  CacheLevelName,
  CacheMetricsSnapshot,
  LevelMetrics,
} from '../types/cache.types';
import type { CacheEngineConfig } from '../config/cache-engine.config';

interface LevelCounters {
  hits: number;
  misses: number;
  skipped: number;
  latencyTotalMs: number;
  latencySamples: number;
}

function emptyCounters(): LevelCounters {
  return { hits: 0, misses: 0, skipped: 0, latencyTotalMs: 0, latencySamples: 0 };
}

@Injectable()
export class CacheMetricsService {
  private perLevel = new Map<CacheLevelName, LevelCounters>();
  private lookups = 0;
  private hits = 0;
  private costSavedUsd = 0;
  private puts = 0;
  private invalidations = 0;

  constructor(
    @Inject(CACHE_ENGINE_CONFIG) private readonly config: CacheEngineConfig,
  ) {
    this.reset();
  }

  recordLevelHit(level: CacheLevelName, latencyMs: number): void {
    const counters = this.counters(level);
    counters.hits++;
    counters.latencyTotalMs += latencyMs;
    counters.latencySamples++;
    this.costSavedUsd += this.config.levels[level].costPerHitUsd;
  }

  recordLevelMiss(level: CacheLevelName, latencyMs: number): void {
    const counters = this.counters(level);
    counters.misses++;
    counters.latencyTotalMs += latencyMs;
    counters.latencySamples++;
  }

  recordLevelSkipped(level: CacheLevelName): void {
    this.counters(level).skipped++;
  }

  recordLookup(hit: boolean): void {
    this.lookups++;
    if (hit) this.hits++;
  }

  recordPut(): void {
    this.puts++;
  }

  recordInvalidation(): void {
    this.invalidations++;
  }

  snapshot(): CacheMetricsSnapshot {
    return {
      perLevel: {
        conversation: this.levelSnapshot('conversation'),
        intent: this.levelSnapshot('intent'),
        knowledge: this.levelSnapshot('knowledge'),
        full_response: this.levelSnapshot('full_response'),
      },
      lookups: this.lookups,
      hits: this.hits,
      overallHitRate: this.lookups > 0 ? this.hits / this.lookups : 0,
      estimatedCostSavedUsd: Math.round(this.costSavedUsd * 1e6) / 1e6,
      puts: this.puts,
      invalidations: this.invalidations,
    };
  }

  reset(): void {
    this.perLevel = new Map(
      CACHE_LEVELS.map((level): [CacheLevelName, LevelCounters] => [
        level,
        emptyCounters(),
      ]),
    );
    this.lookups = 0;
    this.hits = 0;
    this.costSavedUsd = 0;
    this.puts = 0;
    this.invalidations = 0;
  }

  private levelSnapshot(level: CacheLevelName): LevelMetrics {
    const counters = this.counters(level);
    const attempts = counters.hits + counters.misses;
    return {
      hits: counters.hits,
      misses: counters.misses,
      skipped: counters.skipped,
      hitRate: attempts > 0 ? counters.hits / attempts : 0,
      averageLatencyMs:
        counters.latencySamples > 0
          ? counters.latencyTotalMs / counters.latencySamples
          : 0,
    };
  }

  private counters(level: CacheLevelName): LevelCounters {
    let counters = this.perLevel.get(level);
    if (!counters) {
      counters = emptyCounters();
      this.perLevel.set(level, counters);
    }
    return counters;
  }
}
