/**
 * Invalidation Request DTOs
 * Input for POST /admin/cache/invalidate and /admin/cache/invalidate-query
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { CACHE_LEVELS } from '../types/cache.types';
import type { CacheLevelName } from '../types/cache.types';
import { ConversationTurnDto } from './conversation-turn.dto';

export class InvalidateRequestDto {
  @IsString()
  @MaxLength(512)
  pattern!: string; // e.g. "knowledge:*"
}

export class InvalidateQueryRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  query!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ConversationTurnDto)
  context?: ConversationTurnDto[];

  @IsOptional()
  @IsArray()
  @IsIn(CACHE_LEVELS, { each: true })
  levels?: CacheLevelName[];
}
