import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsDefined,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  GenerateNudgeRequestDto,
  HistoryEntry,
  NudgeContext,
  NudgeOutcome,
  PersonaConfigInput,
} from '@nudgeline/shared';
import { MAX_PERSONA_INTERVAL_MINUTES } from '../../catalog/catalog.types';
import { IsCalendarDateTime, IsHistoryTimestamp } from '../../common/validation/date-time.validators';

/**
 * Bucket fields are plain strings here: values outside the known set are
 * scored as neutral by the pipeline, not rejected.
 */
export class NudgeContextBody implements NudgeContext {
  @IsOptional()
  @IsString()
  time_of_day?: string;

  @IsOptional()
  @IsString()
  energy_level?: string;

  @IsOptional()
  @IsString()
  task_complexity?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  triggers?: string[];

  @IsOptional()
  @IsNumber()
  interruption_frequency?: number;

  @IsOptional()
  @IsNumber()
  deadline_proximity_minutes?: number;

  @IsOptional()
  @IsBoolean()
  in_flow_state?: boolean;
}

export class PersonaConfigBody implements PersonaConfigInput {
  @IsOptional()
  @IsString()
  id?: string;

  @IsOptional()
  @IsString()
  learning_style?: string;

  @IsOptional()
  @IsString()
  communication_pref?: string;

  @IsOptional()
  @IsString()
  work_pattern?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  motivation_triggers?: string[];

  @IsOptional()
  @IsNumber()
  cognitive_load_threshold?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_PERSONA_INTERVAL_MINUTES)
  nudge_interval_minutes?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  daily_nudge_limit?: number;
}

export class HistoryEntryBody implements HistoryEntry {
  // ISO-8601 calendar date-time or epoch ms
  @IsHistoryTimestamp()
  timestamp!: string | number;

  @IsString()
  template_id!: string;

  @IsOptional()
  @IsEnum(NudgeOutcome)
  outcome?: NudgeOutcome;
}

/**
 * Validated body for POST /nudges.
 */
export class GenerateNudgeBody implements GenerateNudgeRequestDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => PersonaConfigBody)
  persona?: PersonaConfigBody;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  persona_id?: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => NudgeContextBody)
  context!: NudgeContextBody;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HistoryEntryBody)
  history?: HistoryEntryBody[];

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  user_id?: string;

  @IsOptional()
  @IsCalendarDateTime()
  now?: string;
}
