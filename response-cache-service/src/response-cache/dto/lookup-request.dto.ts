/**
 * Lookup Request DTO
 * Input for POST /cache/lookup
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { ConversationTurnDto } from './conversation-turn.dto';

export class LookupRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  query!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ConversationTurnDto)
  context?: ConversationTurnDto[]; // oldest first
}
