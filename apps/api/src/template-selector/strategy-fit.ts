import { InterventionTemplate, NudgeContext, PersonaConfig } from '@nudgeline/shared';

/**
 * Injection token for the strategy-fit scorer.
 */
export const STRATEGY_FIT_SCORER = 'STRATEGY_FIT_SCORER';

/**
 * Pluggable model rating how well a template suits a persona in a context.
 * Higher wins; only consulted between templates with the same trigger
 * overlap. persona is absent when the selector is called without one.
 */
export type StrategyFitScorer = (
  template: InterventionTemplate,
  persona: PersonaConfig | undefined,
  context: NudgeContext,
) => number;

/**
 * Placeholder model: every template fits equally, so ties fall through
 * to catalog order.
 */
export const constantStrategyFit: StrategyFitScorer = () => 0.5;
