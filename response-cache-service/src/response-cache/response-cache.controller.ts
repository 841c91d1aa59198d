/**
 * Response Cache HTTP Controller
 * Lookup and store endpoints for the conversation orchestrator, proxied
 * through the API gateway (GatewayAuthGuard)
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UseGuards,
  ValidationPipe,
} from '@nestjs/common';
import { GatewayAuthGuard } from '../common/guards/gateway-auth.guard';
import {
  CurrentUser,
  type CurrentUserData,
} from '../common/decorators/current-user.decorator';
import { LevelCoordinatorService } from './services/level-coordinator.service';
import { LookupRequestDto } from './dto/lookup-request.dto';
import { StoreEntryRequestDto } from './dto/store-entry-request.dto';
import type {
  CacheHealthResponseDto,
  CacheLookupResponseDto,
  CacheMetricsResponseDto,
  CacheStoreResponseDto,
} from './dto/cache-response.dto';

const bodyValidation = new ValidationPipe({ whitelist: true, transform: true });

@Controller('cache')
@UseGuards(GatewayAuthGuard)
export class ResponseCacheController {
  private readonly logger = new Logger(ResponseCacheController.name);

  constructor(private readonly coordinator: LevelCoordinatorService) {}

  /**
   * POST /cache/lookup
   *
   * Request:  { "query": "Where is my order?", "context": [{ "role": "user", "content": "hi" }] }
   * Response: { "hit": true, "level": "conversation", "key": "...", "value": {...}, "latencyMs": 3 }
   *        or { "hit": false, "latencyMs": 12, "skippedLevels": [] }
   */
  @Post('lookup')
  @HttpCode(HttpStatus.OK)
  async lookup(
    @Body(bodyValidation) body: LookupRequestDto,
    @CurrentUser() user: CurrentUserData,
  ): Promise<CacheLookupResponseDto> {
    const result = await this.coordinator.get(body.query, body.context ?? []);

    this.logger.log(
      `Cache lookup for user ${user.userId}: ${result.hit ? `hit (${result.level})` : 'miss'} ${result.latencyMs}ms`,
    );
    return result;
  }

  /**
   * POST /cache/entries
   * Store a computed response into the requested levels
   */
  @Post('entries')
  async store(
    @Body(bodyValidation) body: StoreEntryRequestDto,
  ): Promise<CacheStoreResponseDto> {
    return this.coordinator.put(
      body.query,
      body.context ?? [],
      body.value,
      body.levels,
    );
  }

  @Get('metrics')
  metrics(): CacheMetricsResponseDto {
    return this.coordinator.metricsSnapshot();
  }

  @Get('health')
  async health(): Promise<CacheHealthResponseDto> {
    return this.coordinator.health();
  }
}
