/**
 * Response Cache TCP Controller
 * Inter-service access for the conversation orchestrator and the
 * knowledge-base indexer
 *
 * TCP Endpoints:
 * 1. cache_get - lookup across levels
 * 2. cache_put - store a computed response
 * 3. cache_metrics - metrics snapshot
 * 4. get_cache_health - health check for service discovery
 * 5. cache.invalidate (event) - pattern invalidation after knowledge-base updates
 */

import { Controller, Logger } from '@nestjs/common';
import { EventPattern, MessagePattern, Payload } from '@nestjs/microservices';
import { LevelCoordinatorService } from './services/level-coordinator.service';
import {
  CacheInvalidationEvent,
  CacheInvalidationService,
} from './services/cache-invalidation.service';
import type {
  CacheGetMessage,
  CacheHealthResponseDto,
  CacheLookupResponseDto,
  CacheMetricsResponseDto,
  CachePutMessage,
  CacheStoreResponseDto,
  TcpResponse,
} from './dto/cache-response.dto';
import { errorMessage } from './errors/cache-errors';
import { isCacheLevelName, isConversationTurn } from './types/cache.types';

const INVALID_CONTEXT = 'context must be an array of { role, content } strings';

// TCP payloads skip the ValidationPipe, so turns are checked here
function isValidContext(context: unknown): boolean {
  return (
    context === undefined ||
    (Array.isArray(context) && context.every((turn) => isConversationTurn(turn)))
  );
}

@Controller()
export class ResponseCacheTcpController {
  private readonly logger = new Logger(ResponseCacheTcpController.name);

  constructor(
    private readonly coordinator: LevelCoordinatorService,
    private readonly cacheInvalidationService: CacheInvalidationService,
  ) {}

  /**
   * Input: { query, context? }
   * Output: { success, data?: CacheResult, error? }
   */
  @MessagePattern({ cmd: 'cache_get' })
  async cacheGet(
    @Payload() payload: CacheGetMessage,
  ): Promise<TcpResponse<CacheLookupResponseDto>> {
    if (typeof payload?.query !== 'string' || payload.query.length === 0) {
      return { success: false, error: 'query is required' };
    }
    if (!isValidContext(payload.context)) {
      return { success: false, error: INVALID_CONTEXT };
    }

    try {
      const data = await this.coordinator.get(
        payload.query,
        payload.context ?? [],
      );
      return { success: true, data };
    } catch (error: unknown) {
      this.logger.error(`TCP cache_get failed: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error) };
    }
  }

  /**
   * Input: { query, context?, value, levels }
   * Output: { success, data?: { ok, levelsWritten }, error? }
   */
  @MessagePattern({ cmd: 'cache_put' })
  async cachePut(
    @Payload() payload: CachePutMessage,
  ): Promise<TcpResponse<CacheStoreResponseDto>> {
    if (typeof payload?.query !== 'string' || payload.query.length === 0) {
      return { success: false, error: 'query is required' };
    }
    if (!isValidContext(payload.context)) {
      return { success: false, error: INVALID_CONTEXT };
    }
    if (
      !Array.isArray(payload.levels) ||
      !payload.levels.every((level) => isCacheLevelName(level))
    ) {
      return { success: false, error: 'levels must be known cache levels' };
    }
    if (typeof payload.value !== 'object' || payload.value === null) {
      return { success: false, error: 'value must be a JSON object' };
    }

    try {
      const data = await this.coordinator.put(
        payload.query,
        payload.context ?? [],
        payload.value,
        payload.levels,
      );
      return { success: true, data };
    } catch (error: unknown) {
      this.logger.error(`TCP cache_put failed: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error) };
    }
  }

  @MessagePattern({ cmd: 'cache_metrics' })
  cacheMetrics(): TcpResponse<CacheMetricsResponseDto> {
    return { success: true, data: this.coordinator.metricsSnapshot() };
  }

  @MessagePattern({ cmd: 'get_cache_health' })
  async getHealth(): Promise<TcpResponse<CacheHealthResponseDto>> {
    try {
      const data = await this.coordinator.health();
      this.logger.log(`TCP get_cache_health: ${data.status}`);
      return { success: true, data };
    } catch (error: unknown) {
      this.logger.error(`TCP get_cache_health failed: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error) };
    }
  }

  /**
   * Fire-and-forget invalidation from the knowledge-base indexer.
   * Input: { patterns: ["knowledge:*"], reason?: "document.updated" }
   */
  @EventPattern('cache.invalidate')
  async handleInvalidate(
    @Payload() payload: CacheInvalidationEvent,
  ): Promise<void> {
    if (!Array.isArray(payload?.patterns)) {
      this.logger.warn('cache.invalidate event without patterns ignored');
      return;
    }

    await this.cacheInvalidationService.handleInvalidationEvent({
      patterns: payload.patterns.filter(
        (pattern): pattern is string => typeof pattern === 'string',
      ),
      reason: payload.reason,
    });
  }
}
