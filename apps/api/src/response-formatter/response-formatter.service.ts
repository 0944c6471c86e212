import { Injectable } from '@nestjs/common';
import {
  Action,
  CommunicationPreference,
  InterventionTemplate,
  Nudge,
  PersonaConfig,
  TimingDecision,
  TimingResult,
} from '@nudgeline/shared';
import { ConfigurationError } from '../common/errors';

const MINUTE_MS = 60 * 1000;

/**
 * Motivation triggers that become hooks on the nudge.
 * Persona triggers outside this set are not surfaced.
 */
export const ENGAGEMENT_TRIGGERS: ReadonlySet<string> = new Set([
  'autonomy',
  'mastery',
  'purpose',
  'challenge',
  'feedback',
  'progress',
  'recognition',
]);

/**
 * ResponseFormatter
 *
 * Assembles the final Nudge. A skip decision yields null, which is the
 * "timing isn't appropriate" answer rather than an error.
 */
@Injectable()
export class ResponseFormatterService {
  format(
    template: InterventionTemplate,
    actions: Action[],
    timing: TimingResult,
    persona: PersonaConfig,
    now: Date = new Date(),
  ): Nudge | null {
    if (timing.decision === TimingDecision.SKIP) {
      return null;
    }
    if (actions.length === 0) {
      throw new ConfigurationError(`Template "${template.id}" produced no action steps`);
    }

    const deliverAtMs = Date.parse(timing.deliver_at);
    const followUpBase = Number.isFinite(deliverAtMs) ? deliverAtMs : now.getTime();

    return {
      template_id: template.id,
      persona_id: persona.id,
      message: this.buildMessage(template.headline, persona.communication_pref),
      timing,
      action_steps: actions,
      total_duration_minutes: actions.reduce((sum, a) => sum + a.duration_minutes, 0),
      follow_up: {
        delay_minutes: template.follow_up.delay_minutes,
        type: template.follow_up.type,
        due_at: new Date(
          followUpBase + template.follow_up.delay_minutes * MINUTE_MS,
        ).toISOString(),
      },
      motivation_hooks: this.motivationHooks(persona),
      generated_at: now.toISOString(),
    };
  }

  buildMessage(headline: string, style: CommunicationPreference): string {
    const base = headline.trim().replace(/[.!]+$/, '');
    switch (style) {
      case CommunicationPreference.DIRECT:
        return `${base}. Start now.`;
      case CommunicationPreference.ENTHUSIASTIC:
        return `${base}! Let's make it count.`;
      default:
        return `${base}.`;
    }
  }

  /**
   * Persona triggers in persona order, de-duplicated, restricted to the
   * engagement vocabulary.
   */
  motivationHooks(persona: PersonaConfig): string[] {
    const hooks: string[] = [];
    for (const trigger of persona.motivation_triggers) {
      const normalized = trigger.trim().toLowerCase();
      if (ENGAGEMENT_TRIGGERS.has(normalized) && !hooks.includes(normalized)) {
        hooks.push(normalized);
      }
    }
    return hooks;
  }
}
