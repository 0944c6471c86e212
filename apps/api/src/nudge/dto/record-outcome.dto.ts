import { IsEnum, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { NudgeOutcome, RecordOutcomeRequestDto } from '@nudgeline/shared';

/**
 * Validated body for POST /nudges/outcome.
 */
export class RecordOutcomeBody implements RecordOutcomeRequestDto {
  @IsString()
  @IsNotEmpty()
  user_id!: string;

  @IsEnum(NudgeOutcome)
  outcome!: NudgeOutcome;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  template_id?: string;
}
