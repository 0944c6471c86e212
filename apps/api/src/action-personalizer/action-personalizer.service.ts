import { Injectable, Logger } from '@nestjs/common';
import {
  Action,
  CommunicationPreference,
  LearningStyle,
  PersonaConfig,
  WorkPattern,
} from '@nudgeline/shared';

/**
 * Communication style rewrites. Fixed and enumerable.
 */
export const DIRECT_PREFIX = 'Action required: ';
export const ENTHUSIASTIC_SUFFIX = " You've got this!";

/**
 * Learning style rewrites.
 */
export const SYSTEMATIC_FOLLOW_STEPS = ['Track progress', 'Review and adjust'];
export const EXPLORATORY_SUFFIX = ' (Try different approaches: A, B, or create your own)';

/** deep_focus personas get longer blocks */
export const DEEP_FOCUS_DURATION_FACTOR = 1.5;

/**
 * complexity = word_count / COMPLEXITY_WORD_SCALE, compared against the
 * persona's cognitive_load_threshold.
 */
export const COMPLEXITY_WORD_SCALE = 50;
export const SIMPLIFIED_WORD_LIMIT = 25;

/**
 * ActionPersonalizer
 *
 * Rewrites each template action for a persona, in this order:
 * 1) learning style (structure of the description)
 * 2) simplification when the description is too complex for the persona
 * 3) communication style (prefix/suffix)
 * 4) work pattern (duration scaling)
 *
 * Output has the same length and order as the input. Template actions are
 * never mutated; every returned Action is a fresh object.
 */
@Injectable()
export class ActionPersonalizerService {
  private readonly logger = new Logger(ActionPersonalizerService.name);

  personalize(actions: readonly Action[], persona: PersonaConfig): Action[] {
    return actions.map((action, index) => this.personalizeAction(action, index, persona));
  }

  private personalizeAction(action: Action, index: number, persona: PersonaConfig): Action {
    let description = this.applyLearningStyle(action.description.trim(), persona.learning_style);
    description = this.simplifyIfComplex(description, persona.cognitive_load_threshold);
    description = this.applyCommunicationStyle(description, persona.communication_pref);

    return {
      type: action.type,
      duration_minutes: this.scaleDuration(action.duration_minutes, persona.work_pattern),
      description,
      priority: action.priority ?? index + 1,
    };
  }

  applyLearningStyle(description: string, style: LearningStyle): string {
    switch (style) {
      case LearningStyle.SYSTEMATIC:
        return [description, ...SYSTEMATIC_FOLLOW_STEPS]
          .map((step, i) => `${i + 1}. ${step}`)
          .join('\n');
      case LearningStyle.EXPLORATORY:
        return `${description}${EXPLORATORY_SUFFIX}`;
      default:
        return description;
    }
  }

  applyCommunicationStyle(description: string, style: CommunicationPreference): string {
    switch (style) {
      case CommunicationPreference.DIRECT:
        return `${DIRECT_PREFIX}${description}`;
      case CommunicationPreference.ENTHUSIASTIC:
        return `${description}${ENTHUSIASTIC_SUFFIX}`;
      default:
        return description;
    }
  }

  scaleDuration(minutes: number, pattern: WorkPattern): number {
    const base = Number.isFinite(minutes) && minutes > 0 ? minutes : 0;
    if (pattern === WorkPattern.DEEP_FOCUS) {
      return Math.round(base * DEEP_FOCUS_DURATION_FACTOR);
    }
    return base;
  }

  /**
   * Keep the first SIMPLIFIED_WORD_LIMIT words when the description is
   * more complex than the persona handles. Line breaks inside the kept
   * words are preserved.
   */
  simplifyIfComplex(description: string, threshold: number): string {
    const words = description.split(/\s+/).filter(Boolean);
    const complexity = words.length / COMPLEXITY_WORD_SCALE;
    if (complexity <= threshold || words.length <= SIMPLIFIED_WORD_LIMIT) {
      return description;
    }

    this.logger.debug(
      `Simplifying action (complexity=${complexity.toFixed(2)} > threshold=${threshold})`,
    );

    const pattern = new RegExp(`^(\\s*\\S+){${SIMPLIFIED_WORD_LIMIT}}`);
    const match = description.match(pattern);
    return match ? match[0].trim() : description;
  }
}
