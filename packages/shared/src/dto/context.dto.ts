// Context DTOs (packages/shared/src/dto/context.dto.ts)

import { NudgeOutcome } from '../enums';

/**
 * Per-request situational signals.
 *
 * Bucket fields are expected to hold TimeOfDay / EnergyLevel /
 * TaskComplexity values but are typed as strings: anything outside the
 * known set is scored as neutral.
 */
export interface NudgeContext {
  time_of_day?: string;
  energy_level?: string;
  task_complexity?: string;

  /** Active behavioral trigger tags, e.g. "distraction" */
  triggers?: string[];

  /** Interruptions per hour */
  interruption_frequency?: number;

  /** Minutes until the user's next deadline */
  deadline_proximity_minutes?: number;

  /** Client-detected flow state; suppresses nudges while true */
  in_flow_state?: boolean;
}

/**
 * One delivered intervention.
 * timestamp is an ISO-8601 string or epoch milliseconds.
 */
export interface HistoryEntry {
  timestamp: string | number;
  template_id: string;
  /** Set once the user accepts or dismisses the nudge */
  outcome?: NudgeOutcome;
}
