import { Injectable, Logger } from '@nestjs/common';
import {
  EnergyLevel,
  NudgeContext,
  TaskComplexity,
  TimeOfDay,
} from '@nudgeline/shared';
import { InvalidContextValue } from '../common/errors';

/**
 * Bucket → fitness lookups. Higher means a better moment to nudge.
 */
export const TIME_OF_DAY_VALUES: Record<TimeOfDay, number> = {
  [TimeOfDay.MORNING]: 1.0,
  [TimeOfDay.AFTERNOON]: 0.7,
  [TimeOfDay.EVENING]: 0.4,
};

export const ENERGY_LEVEL_VALUES: Record<EnergyLevel, number> = {
  [EnergyLevel.HIGH]: 1.0,
  [EnergyLevel.MEDIUM]: 0.6,
  [EnergyLevel.LOW]: 0.2,
};

export const TASK_COMPLEXITY_VALUES: Record<TaskComplexity, number> = {
  [TaskComplexity.LOW]: 1.0,
  [TaskComplexity.MEDIUM]: 0.6,
  [TaskComplexity.HIGH]: 0.3,
};

export const FACTOR_WEIGHTS = {
  time_of_day: 0.4,
  energy_level: 0.4,
  task_complexity: 0.2,
} as const;

/** Missing or unknown bucket */
export const NEUTRAL_VALUE = 0.5;

const INTERRUPTION_PENALTY_PER_EVENT = 0.02;
const MAX_INTERRUPTION_PENALTY = 0.2;

export interface ContextAssessment {
  /** Timing fitness, 0.0–1.0 */
  score: number;

  /** 1 - score */
  cognitive_load: number;

  factors: {
    time_of_day: number;
    energy_level: number;
    task_complexity: number;
    interruption_penalty: number;
  };

  warnings: InvalidContextValue[];
}

/**
 * ContextScorer
 *
 * Formula:
 *   score = 0.4 * time + 0.4 * energy + 0.2 * complexity - interruption_penalty
 *   interruption_penalty = min(0.2, 0.02 * interruptions_per_hour)
 *
 * clamped to [0, 1] and rounded to 4 decimal places.
 *
 * Pure apart from logging: unknown bucket values are scored as 0.5 and
 * reported as InvalidContextValue warnings, never thrown.
 */
@Injectable()
export class ContextScorerService {
  private readonly logger = new Logger(ContextScorerService.name);

  score(context: NudgeContext): number {
    return this.assess(context).score;
  }

  assess(context: NudgeContext): ContextAssessment {
    const warnings: InvalidContextValue[] = [];

    const timeOfDay = this.lookup(TIME_OF_DAY_VALUES, context.time_of_day, 'time_of_day', warnings);
    const energyLevel = this.lookup(ENERGY_LEVEL_VALUES, context.energy_level, 'energy_level', warnings);
    const taskComplexity = this.lookup(
      TASK_COMPLEXITY_VALUES,
      context.task_complexity,
      'task_complexity',
      warnings,
    );
    const interruptionPenalty = this.interruptionPenalty(context.interruption_frequency);

    const weighted =
      FACTOR_WEIGHTS.time_of_day * timeOfDay +
      FACTOR_WEIGHTS.energy_level * energyLevel +
      FACTOR_WEIGHTS.task_complexity * taskComplexity -
      interruptionPenalty;

    const score = this.round(Math.max(0, Math.min(1, weighted)));

    for (const warning of warnings) {
      this.logger.warn(warning.message);
    }

    return {
      score,
      cognitive_load: this.round(1 - score),
      factors: {
        time_of_day: timeOfDay,
        energy_level: energyLevel,
        task_complexity: taskComplexity,
        interruption_penalty: interruptionPenalty,
      },
      warnings,
    };
  }

  private lookup<K extends string>(
    table: Record<K, number>,
    raw: string | undefined,
    field: string,
    warnings: InvalidContextValue[],
  ): number {
    if (raw === undefined || raw === null) {
      return NEUTRAL_VALUE;
    }

    const key = String(raw).trim().toLowerCase();
    if (this.isKnownBucket(table, key)) {
      return table[key];
    }

    warnings.push(new InvalidContextValue(field, String(raw), NEUTRAL_VALUE));
    return NEUTRAL_VALUE;
  }

  private isKnownBucket<K extends string>(table: Record<K, number>, key: string): key is K {
    return Object.prototype.hasOwnProperty.call(table, key);
  }

  private interruptionPenalty(frequency: number | undefined): number {
    if (typeof frequency !== 'number' || !Number.isFinite(frequency) || frequency <= 0) {
      return 0;
    }
    return Math.min(MAX_INTERRUPTION_PENALTY, frequency * INTERRUPTION_PENALTY_PER_EVENT);
  }

  /**
   * Round to 4 decimal places to keep scores stable across float noise.
   */
  private round(value: number): number {
    return Math.round(value * 10000) / 10000;
  }
}
