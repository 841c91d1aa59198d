/**
 * Cache Invalidation Service
 * Scheduled semantic-index cleanup and event-driven invalidation
 *
 * 1. TTL cleanup: hourly cron purges index points whose entries expired
 *    (the backing store expires payloads on its own)
 * 2. Events: `cache.invalidate` from the knowledge-base indexer carries
 *    glob patterns to delete
 */

import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { LevelCoordinatorService } from './level-coordinator.service';
import { errorMessage } from '../errors/cache-errors';

export interface CacheInvalidationEvent {
  patterns: string[];
  reason?: string;
}

export interface CacheCleanupResult {
  success: boolean;
  message: string;
  removedVectors: number;
}

export interface InvalidationEventResult {
  removedCount: number;
  rejectedPatterns: string[];
}

@Injectable()
export class CacheInvalidationService {
  private readonly logger = new Logger(CacheInvalidationService.name);

  constructor(private readonly coordinator: LevelCoordinatorService) {}

  /**
   * Cron expression: '0 * * * *' = every hour at minute 0
   */
  @Cron('0 * * * *')
  async cleanupExpiredVectors(): Promise<void> {
    this.logger.log('Running scheduled semantic index cleanup...');

    const result = await this.manualCleanup();
    if (result.success) {
      this.logger.log(`✓ ${result.message}`);
    }
  }

  /**
   * Cleanup on demand (admin API)
   */
  async manualCleanup(): Promise<CacheCleanupResult> {
    try {
      const removedVectors = await this.coordinator.removeExpiredVectors();
      return {
        success: true,
        message: `Semantic index cleanup removed ${removedVectors} expired vectors`,
        removedVectors,
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Semantic index cleanup failed: ${message}`);
      return {
        success: false,
        message: `Semantic index cleanup failed: ${message}`,
        removedVectors: 0,
      };
    }
  }

  /**
   * Apply every pattern of an invalidation event. Invalid patterns are
   * logged and reported; the remaining ones still run.
   */
  async handleInvalidationEvent(
    event: CacheInvalidationEvent,
  ): Promise<InvalidationEventResult> {
    this.logger.log(
      `Received cache.invalidate event: patterns=${event.patterns.join(',')}${event.reason ? ` reason=${event.reason}` : ''}`,
    );

    let removedCount = 0;
    const rejectedPatterns: string[] = [];

    for (const pattern of event.patterns) {
      try {
        const result = await this.coordinator.invalidate(pattern);
        removedCount += result.removedCount;
      } catch (error) {
        rejectedPatterns.push(pattern);
        this.logger.warn(`Rejected invalidation pattern: ${errorMessage(error)}`);
      }
    }

    this.logger.log(
      `✓ cache.invalidate applied: removed=${removedCount} rejected=${rejectedPatterns.length}`,
    );
    return { removedCount, rejectedPatterns };
  }
}
