import { Logger } from '@nestjs/common';
import {
  CommunicationPreference,
  LearningStyle,
  PersonaConfig,
  PersonaConfigInput,
  WorkPattern,
} from '@nudgeline/shared';
import { MAX_PERSONA_INTERVAL_MINUTES } from './catalog.types';

/**
 * Traits used when an inline persona omits a field or sends a value
 * outside the known set. flexible leaves durations untouched.
 */
export const DEFAULT_PERSONA_TRAITS = {
  id: 'custom',
  learning_style: LearningStyle.SYSTEMATIC,
  communication_pref: CommunicationPreference.DIRECT,
  work_pattern: WorkPattern.FLEXIBLE,
  cognitive_load_threshold: 0.7,
} as const;

const logger = new Logger('PersonaNormalizer');

function matchEnum<T extends string>(
  values: readonly T[],
  raw: string | undefined,
  field: string,
  fallback: T,
): T {
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  const match = values.find((v) => v === normalized);
  if (!match) {
    logger.warn(`Unknown persona ${field} "${raw}", using ${fallback}`);
    return fallback;
  }
  return match;
}

/**
 * Frequency overrides are kept only when they are whole, non-negative
 * numbers; anything else falls back to the server-wide setting.
 */
function optionalWholeNumber(raw: number | undefined, field: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!Number.isInteger(raw) || raw < 0) {
    logger.warn(`Ignoring persona ${field} ${raw}, using the server default`);
    return undefined;
  }
  return raw;
}

/**
 * Turn a wire persona into a frozen PersonaConfig.
 * Never throws: unknown values become DEFAULT_PERSONA_TRAITS.
 */
export function normalizePersona(input: PersonaConfigInput): PersonaConfig {
  const threshold = input.cognitive_load_threshold;
  const interval = optionalWholeNumber(input.nudge_interval_minutes, 'nudge_interval_minutes');
  const dailyLimit = optionalWholeNumber(input.daily_nudge_limit, 'daily_nudge_limit');

  const persona: PersonaConfig = {
    id: input.id?.trim() || DEFAULT_PERSONA_TRAITS.id,
    learning_style: matchEnum(
      Object.values(LearningStyle),
      input.learning_style,
      'learning_style',
      DEFAULT_PERSONA_TRAITS.learning_style,
    ),
    communication_pref: matchEnum(
      Object.values(CommunicationPreference),
      input.communication_pref,
      'communication_pref',
      DEFAULT_PERSONA_TRAITS.communication_pref,
    ),
    work_pattern: matchEnum(
      Object.values(WorkPattern),
      input.work_pattern,
      'work_pattern',
      DEFAULT_PERSONA_TRAITS.work_pattern,
    ),
    motivation_triggers: (input.motivation_triggers ?? []).filter(
      (t): t is string => typeof t === 'string' && t.trim().length > 0,
    ),
    cognitive_load_threshold:
      typeof threshold === 'number' && Number.isFinite(threshold)
        ? Math.max(0, Math.min(1, threshold))
        : DEFAULT_PERSONA_TRAITS.cognitive_load_threshold,
  };

  if (interval !== undefined) {
    persona.nudge_interval_minutes = Math.min(interval, MAX_PERSONA_INTERVAL_MINUTES);
  }
  if (dailyLimit !== undefined) {
    persona.daily_nudge_limit = dailyLimit;
  }

  return Object.freeze(persona);
}
