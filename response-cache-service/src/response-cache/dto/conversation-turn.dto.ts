import { IsString, MaxLength } from 'class-validator';

export class ConversationTurnDto {
  @IsString()
  @MaxLength(32)
  role!: string;

  @IsString()
  @MaxLength(8000)
  content!: string;
}
