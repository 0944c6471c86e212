/**
 * Intervention Template Catalog
 *
 * Catalog order matters: TemplateSelector breaks exact ties in favor of
 * the earlier entry. general_check_in is the designated default and
 * carries a trigger tag of its own so it can also be matched directly.
 */

import { InterventionTemplate } from '@nudgeline/shared';

export const DEFAULT_TEMPLATE_ID = 'general_check_in';

export const INTERVENTION_TEMPLATES: InterventionTemplate[] = [
  {
    id: 'focus',
    headline: 'Protect your focus block',
    triggers: ['distraction', 'task_switching', 'low_productivity'],
    actions: [
      { type: 'environment', duration_minutes: 5, description: 'Clear workspace, close unnecessary tabs' },
      { type: 'technique', duration_minutes: 25, description: 'Use Pomodoro method with 25min work blocks' },
      { type: 'break', duration_minutes: 5, description: 'Take a short walk, stretch exercises' },
    ],
    follow_up: { delay_minutes: 60, type: 'progress_check' },
  },
  {
    id: 'motivation',
    headline: 'Get the first step moving',
    triggers: ['procrastination', 'low_energy', 'task_avoidance'],
    actions: [
      { type: 'goal_setting', duration_minutes: 10, description: 'Break task into 3 achievable sub-goals' },
      { type: 'reward', duration_minutes: 2, description: 'Define concrete reward for completion' },
      { type: 'accountability', duration_minutes: 5, description: 'Share goal with accountability partner' },
    ],
    follow_up: { delay_minutes: 120, type: 'motivation_check' },
  },
  {
    id: 'energy_recovery',
    headline: 'Recharge before the next push',
    triggers: ['fatigue', 'low_energy', 'long_session'],
    actions: [
      { type: 'break', duration_minutes: 10, description: 'Step away from the screen and hydrate' },
      { type: 'movement', duration_minutes: 5, description: 'Do a short round of stretches or a walk' },
    ],
    follow_up: { delay_minutes: 45, type: 'energy_check' },
  },
  {
    id: 'overload',
    headline: 'Lighten the cognitive load',
    triggers: ['task_switching', 'context_overload', 'too_many_tabs', 'interruptions'],
    actions: [
      { type: 'triage', duration_minutes: 10, description: 'List open tasks and pick the single most important one' },
      { type: 'environment', duration_minutes: 5, description: 'Mute notifications for the next work block' },
      { type: 'technique', duration_minutes: 30, description: 'Work on the chosen task only until the block ends' },
    ],
    follow_up: { delay_minutes: 90, type: 'load_check' },
  },
  {
    id: DEFAULT_TEMPLATE_ID,
    headline: 'Quick check-in',
    triggers: ['check_in'],
    actions: [
      { type: 'reflection', duration_minutes: 3, description: 'Note what you are working on and how it is going' },
    ],
    follow_up: { delay_minutes: 180, type: 'check_in' },
  },
];
