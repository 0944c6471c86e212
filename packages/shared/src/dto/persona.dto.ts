// Persona DTOs (packages/shared/src/dto/persona.dto.ts)
// Endpoint: GET /catalog/personas

import { CommunicationPreference, LearningStyle, WorkPattern } from '../enums';

/**
 * Static behavioral profile for a user archetype.
 * Loaded once at startup and never mutated.
 */
export interface PersonaConfig {
  id: string;
  learning_style: LearningStyle;
  communication_pref: CommunicationPreference;
  work_pattern: WorkPattern;
  /**
   * Ordered, most important first.
   */
  motivation_triggers: string[];
  /**
   * 0.0–1.0. Actions whose complexity exceeds this are simplified.
   */
  cognitive_load_threshold: number;
  /**
   * Minimum minutes between two nudges (0–1440). Falls back to the
   * server-wide interval when absent.
   */
  nudge_interval_minutes?: number;
  /**
   * Nudges allowed per rolling 24h. Falls back to the server-wide limit.
   */
  daily_nudge_limit?: number;
}

/**
 * Persona as accepted inline on POST /nudges.
 * Enum fields are plain strings on the wire; unknown values are
 * normalized to neutral defaults rather than rejected.
 */
export interface PersonaConfigInput {
  id?: string;
  learning_style?: string;
  communication_pref?: string;
  work_pattern?: string;
  motivation_triggers?: string[];
  cognitive_load_threshold?: number;
  nudge_interval_minutes?: number;
  daily_nudge_limit?: number;
}
