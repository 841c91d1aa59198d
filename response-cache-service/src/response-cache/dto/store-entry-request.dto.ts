/**
 * Store Entry Request DTO
 * Input for POST /cache/entries and each entry of a warm request
 */

import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { CACHE_LEVELS } from '../types/cache.types';
import type { CacheLevelName, CachePayload } from '../types/cache.types';
import { ConversationTurnDto } from './conversation-turn.dto';

export class StoreEntryRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  query!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ConversationTurnDto)
  context?: ConversationTurnDto[];

  @IsObject()
  value!: CachePayload;

  @IsArray()
  @ArrayNotEmpty()
  @IsIn(CACHE_LEVELS, { each: true })
  levels!: CacheLevelName[];
}
