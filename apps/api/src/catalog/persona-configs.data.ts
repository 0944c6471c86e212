/**
 * Persona Config Table
 *
 * Fixed archetype profiles. Loaded once by CatalogService, deep-frozen,
 * and never mutated.
 *
 * Personas that dislike interruptions get longer intervals and a lower
 * daily limit.
 */

import {
  CommunicationPreference,
  LearningStyle,
  PersonaConfig,
  WorkPattern,
} from '@nudgeline/shared';

export const PERSONA_CONFIGS: PersonaConfig[] = [
  // INTJ: structured, terse, long focus blocks
  {
    id: 'INTJ',
    learning_style: LearningStyle.SYSTEMATIC,
    communication_pref: CommunicationPreference.DIRECT,
    work_pattern: WorkPattern.DEEP_FOCUS,
    motivation_triggers: ['mastery', 'autonomy', 'achievement'],
    cognitive_load_threshold: 0.8,
    nudge_interval_minutes: 45,
    daily_nudge_limit: 4,
  },

  // ENFP: playful, discovery-driven, switches often
  {
    id: 'ENFP',
    learning_style: LearningStyle.EXPLORATORY,
    communication_pref: CommunicationPreference.ENTHUSIASTIC,
    work_pattern: WorkPattern.FLEXIBLE,
    motivation_triggers: ['novelty', 'recognition', 'creativity'],
    cognitive_load_threshold: 0.6,
    nudge_interval_minutes: 35,
    daily_nudge_limit: 4,
  },

  // ISTJ: checklist-minded, steady pace
  {
    id: 'ISTJ',
    learning_style: LearningStyle.SYSTEMATIC,
    communication_pref: CommunicationPreference.DIRECT,
    work_pattern: WorkPattern.FLEXIBLE,
    motivation_triggers: ['progress', 'feedback', 'efficiency'],
    cognitive_load_threshold: 0.7,
    nudge_interval_minutes: 30,
    daily_nudge_limit: 5,
  },

  // ESFP: social energy, deep sprints when engaged
  {
    id: 'ESFP',
    learning_style: LearningStyle.EXPLORATORY,
    communication_pref: CommunicationPreference.ENTHUSIASTIC,
    work_pattern: WorkPattern.DEEP_FOCUS,
    motivation_triggers: ['connection', 'challenge', 'purpose'],
    cognitive_load_threshold: 0.5,
    nudge_interval_minutes: 60,
    daily_nudge_limit: 3,
  },
];
