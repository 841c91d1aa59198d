import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  ValidateNested,
} from 'class-validator';
import { StoreEntryRequestDto } from './store-entry-request.dto';

export class WarmRequestDto {
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(500)
  @ValidateNested({ each: true })
  @Type(() => StoreEntryRequestDto)
  entries!: StoreEntryRequestDto[];
}
