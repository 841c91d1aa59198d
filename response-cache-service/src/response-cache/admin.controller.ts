/**
 * Admin Controller
 * Cache maintenance for SUPER_ADMIN and ADMIN users (GatewayAuthGuard + RolesGuard)
 */

import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UseGuards,
  ValidationPipe,
} from '@nestjs/common';
import { GatewayAuthGuard } from '../common/guards/gateway-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { UserRole } from '../common/constants/roles.constant';
import {
  CurrentUser,
  type CurrentUserData,
} from '../common/decorators/current-user.decorator';
import { LevelCoordinatorService } from './services/level-coordinator.service';
import {
  CacheCleanupResult,
  CacheInvalidationService,
} from './services/cache-invalidation.service';
import {
  InvalidateQueryRequestDto,
  InvalidateRequestDto,
} from './dto/invalidate-request.dto';
import { WarmRequestDto } from './dto/warm-request.dto';
import type {
  CacheInvalidateResponseDto,
  CacheWarmResponseDto,
} from './dto/cache-response.dto';
import { InvalidPatternError } from './errors/cache-errors';

const bodyValidation = new ValidationPipe({ whitelist: true, transform: true });

@Controller('admin/cache')
@UseGuards(GatewayAuthGuard, RolesGuard)
@Roles(UserRole.SUPER_ADMIN, UserRole.ADMIN)
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    private readonly coordinator: LevelCoordinatorService,
    private readonly cacheInvalidationService: CacheInvalidationService,
  ) {}

  /**
   * POST /admin/cache/invalidate
   *
   * Request:  { "pattern": "knowledge:*" }
   * Response: { "removedCount": 42 }
   */
  @Post('invalidate')
  @HttpCode(HttpStatus.OK)
  async invalidate(
    @Body(bodyValidation) body: InvalidateRequestDto,
    @CurrentUser() user: CurrentUserData,
  ): Promise<CacheInvalidateResponseDto> {
    this.logger.log(
      `Cache invalidation "${body.pattern}" requested by ${user.role} ${user.userId}`,
    );

    try {
      return await this.coordinator.invalidate(body.pattern);
    } catch (error) {
      if (error instanceof InvalidPatternError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  @Post('invalidate-query')
  @HttpCode(HttpStatus.OK)
  async invalidateQuery(
    @Body(bodyValidation) body: InvalidateQueryRequestDto,
  ): Promise<CacheInvalidateResponseDto> {
    return this.coordinator.invalidateQuery(
      body.query,
      body.context ?? [],
      body.levels,
    );
  }

  @Post('warm')
  @HttpCode(HttpStatus.OK)
  async warm(
    @Body(bodyValidation) body: WarmRequestDto,
    @CurrentUser() user: CurrentUserData,
  ): Promise<CacheWarmResponseDto> {
    const { warmed, results } = await this.coordinator.warm(
      body.entries.map((entry) => ({
        query: entry.query,
        context: entry.context ?? [],
        value: entry.value,
        levels: entry.levels,
      })),
    );

    this.logger.log(
      `Cache warming by ${user.userId}: ${warmed}/${body.entries.length} entries`,
    );
    return { warmed, total: body.entries.length, results };
  }

  @Post('metrics/reset')
  @HttpCode(HttpStatus.NO_CONTENT)
  resetMetrics(@CurrentUser() user: CurrentUserData): void {
    this.logger.log(`Cache metrics reset by ${user.role} ${user.userId}`);
    this.coordinator.resetMetrics();
  }

  /**
   * POST /admin/cache/cleanup
   * Purge expired semantic index vectors now instead of waiting for the cron
   */
  @Post('cleanup')
  @HttpCode(HttpStatus.OK)
  async cleanup(): Promise<CacheCleanupResult> {
    return this.cacheInvalidationService.manualCleanup();
  }
}
