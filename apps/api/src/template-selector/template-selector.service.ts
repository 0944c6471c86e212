import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InterventionTemplate, NudgeContext, PersonaConfig } from '@nudgeline/shared';
import { ConfigurationError } from '../common/errors';
import { TemplateCatalog } from '../catalog/catalog.types';
import {
  constantStrategyFit,
  STRATEGY_FIT_SCORER,
  StrategyFitScorer,
} from './strategy-fit';

interface RankedTemplate {
  template: InterventionTemplate;
  index: number;
  hitCount: number;
  fit: number;
}

/**
 * TemplateSelector
 *
 * Ranking policy:
 * 1) Only templates whose trigger tags intersect the context triggers
 * 2) Largest number of DISTINCT matching tags
 * 3) Higher strategy-fit score (NaN and infinities score 0)
 * 4) Earlier catalog position
 *
 * No match → the catalog's default template. Never returns undefined.
 * Empty catalog or unresolvable default → ConfigurationError.
 */
@Injectable()
export class TemplateSelectorService {
  private readonly logger = new Logger(TemplateSelectorService.name);
  private readonly strategyFit: StrategyFitScorer;

  constructor(
    @Optional() @Inject(STRATEGY_FIT_SCORER) strategyFit?: StrategyFitScorer,
  ) {
    this.strategyFit = strategyFit ?? constantStrategyFit;
  }

  select(
    catalog: TemplateCatalog,
    context: NudgeContext,
    persona?: PersonaConfig,
  ): InterventionTemplate {
    if (catalog.templates.length === 0) {
      throw new ConfigurationError('Cannot select an intervention: template catalog is empty');
    }

    const activeTriggers = this.normalizeTags(context.triggers ?? []);

    const ranked: RankedTemplate[] = catalog.templates
      .map((template, index) => ({
        template,
        index,
        hitCount: this.countDistinctHits(template.triggers, activeTriggers),
        fit: 0,
      }))
      .filter((candidate) => candidate.hitCount > 0)
      .map((candidate) => ({
        ...candidate,
        fit: this.fitFor(candidate.template, persona, context),
      }));

    ranked.sort((a, b) => {
      if (b.hitCount !== a.hitCount) {
        return b.hitCount - a.hitCount;
      }
      if (b.fit !== a.fit) {
        return b.fit - a.fit;
      }
      return a.index - b.index;
    });

    const best = ranked[0];
    if (best) {
      this.logger.debug(
        `Selected template ${best.template.id} (hits=${best.hitCount}, fit=${best.fit}, candidates=${ranked.length})`,
      );
      return best.template;
    }

    return this.getDefaultTemplate(catalog);
  }

  getDefaultTemplate(catalog: TemplateCatalog): InterventionTemplate {
    const fallback = catalog.templates.find((t) => t.id === catalog.defaultTemplateId);
    if (!fallback) {
      throw new ConfigurationError(
        `Default template "${catalog.defaultTemplateId}" is not in the catalog`,
      );
    }
    this.logger.debug(`No trigger match, falling back to ${fallback.id}`);
    return fallback;
  }

  /** Non-finite scorer output counts as 0 */
  private fitFor(
    template: InterventionTemplate,
    persona: PersonaConfig | undefined,
    context: NudgeContext,
  ): number {
    const fit = this.strategyFit(template, persona, context);
    return Number.isFinite(fit) ? fit : 0;
  }

  /**
   * Count DISTINCT template tags present in the active set.
   * A tag listed twice on a template counts once.
   */
  private countDistinctHits(templateTags: string[], active: Set<string>): number {
    let hits = 0;
    for (const tag of this.normalizeTags(templateTags)) {
      if (active.has(tag)) {
        hits++;
      }
    }
    return hits;
  }

  private normalizeTags(tags: string[]): Set<string> {
    const normalized = new Set<string>();
    for (const tag of tags) {
      if (typeof tag !== 'string') {
        continue;
      }
      const value = tag.trim().toLowerCase();
      if (value) {
        normalized.add(value);
      }
    }
    return normalized;
  }
}
