// Nudge DTOs (packages/shared/src/dto/nudge.dto.ts)
// Endpoint: POST /nudges

import { NudgeIntensity, NudgeOutcome, TimingDecision } from '../enums';
import { HistoryEntry, NudgeContext } from './context.dto';
import { PersonaConfigInput } from './persona.dto';
import { Action } from './template.dto';

export interface TimingResult {
  decision: TimingDecision;

  /** Timing-fitness score the decision was based on (0.0–1.0) */
  score: number;

  intensity: NudgeIntensity;
  delay_minutes: number;

  /** ISO 8601 */
  deliver_at: string;

  /** Short machine-readable reason, e.g. "frequency_cap" */
  reason: string;
}

export interface FollowUpPlan {
  delay_minutes: number;
  type: string;
  /** ISO 8601 */
  due_at: string;
}

export interface Nudge {
  template_id: string;
  persona_id: string;
  message: string;
  timing: TimingResult;
  action_steps: Action[];
  total_duration_minutes: number;
  follow_up: FollowUpPlan;
  motivation_hooks: string[];
  /** ISO 8601 */
  generated_at: string;
}

export interface GenerateNudgeRequestDto {
  /**
   * Inline persona. Either this or persona_id is required.
   */
  persona?: PersonaConfigInput;

  /**
   * Catalog persona id (e.g. "INTJ").
   */
  persona_id?: string;

  context: NudgeContext;

  /**
   * Explicit history. When omitted and user_id is set, the server-side
   * interaction history for that user is used and updated.
   */
  history?: HistoryEntry[];

  user_id?: string;

  /**
   * ISO 8601 evaluation time. Defaults to the server clock.
   */
  now?: string;
}

/**
 * 200 body. A skip decision is answered with 204 and no body.
 */
export type NudgeResponseDto = Nudge;

// Endpoint: POST /nudges/outcome

export interface RecordOutcomeRequestDto {
  user_id: string;
  outcome: NudgeOutcome;
  /**
   * Delivered template to mark. Defaults to the user's newest entry.
   */
  template_id?: string;
}

/**
 * 200 body: the history entry as now stored.
 */
export type RecordOutcomeResponseDto = HistoryEntry;
