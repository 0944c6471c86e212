import { Test, TestingModule } from '@nestjs/testing';
import { InterventionTemplate } from '@nudgeline/shared';
import { TemplateSelectorService } from './template-selector.service';
import { STRATEGY_FIT_SCORER, StrategyFitScorer } from './strategy-fit';
import { TemplateCatalog } from '../catalog/catalog.types';
import { ConfigurationError } from '../common/errors';

function makeTemplate(id: string, triggers: string[]): InterventionTemplate {
  return {
    id,
    headline: `Headline ${id}`,
    triggers,
    actions: [{ type: 'step', duration_minutes: 5, description: `Do ${id}` }],
    follow_up: { delay_minutes: 30, type: 'check' },
  };
}

const CATALOG: TemplateCatalog = {
  templates: [
    makeTemplate('focus', ['distraction', 'task_switching']),
    makeTemplate('overload', ['task_switching', 'interruptions', 'too_many_tabs']),
    makeTemplate('motivation', ['procrastination', 'low_energy']),
    makeTemplate('energy', ['low_energy', 'fatigue']),
    makeTemplate('fallback', ['check_in']),
  ],
  defaultTemplateId: 'fallback',
};

/**
 * TemplateSelectorService Unit Tests
 *
 * Policy: largest distinct trigger overlap, then strategy fit, then
 * catalog order. No overlap → default template.
 */
describe('TemplateSelectorService', () => {
  let service: TemplateSelectorService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TemplateSelectorService],
    }).compile();

    service = module.get<TemplateSelectorService>(TemplateSelectorService);
  });

  describe('matching', () => {
    it('should return a template whose triggers intersect the context triggers', () => {
      const template = service.select(CATALOG, { triggers: ['distraction'] });

      expect(template.id).toBe('focus');
      expect(template.triggers).toContain('distraction');
    });

    it('should prefer the template with the largest intersection', () => {
      // focus: 1 hit (task_switching), overload: 2 hits
      const template = service.select(CATALOG, {
        triggers: ['task_switching', 'interruptions'],
      });

      expect(template.id).toBe('overload');
    });

    it('should break exact ties by catalog order', () => {
      // motivation and energy both hit low_energy once; motivation is first
      const template = service.select(CATALOG, { triggers: ['low_energy'] });

      expect(template.id).toBe('motivation');
    });

    it('should count a repeated context trigger once', () => {
      const template = service.select(CATALOG, {
        triggers: ['distraction', 'distraction', 'distraction', 'interruptions'],
      });

      // focus: 1 distinct hit, overload: 1 distinct hit → catalog order
      expect(template.id).toBe('focus');
    });

    it('should match triggers case-insensitively', () => {
      const template = service.select(CATALOG, { triggers: [' FATIGUE '] });

      expect(template.id).toBe('energy');
    });
  });

  describe('fallback', () => {
    it('should return the default template when nothing matches', () => {
      const template = service.select(CATALOG, { triggers: ['weather'] });

      expect(template.id).toBe('fallback');
    });

    it('should return the default template when the context has no triggers', () => {
      expect(service.select(CATALOG, {}).id).toBe('fallback');
      expect(service.select(CATALOG, { triggers: [] }).id).toBe('fallback');
    });
  });

  describe('configuration errors', () => {
    it('should throw ConfigurationError for an empty catalog', () => {
      const empty: TemplateCatalog = { templates: [], defaultTemplateId: 'fallback' };

      expect(() => service.select(empty, { triggers: ['distraction'] })).toThrow(ConfigurationError);
    });

    it('should throw ConfigurationError when the default template is missing and nothing matches', () => {
      const broken: TemplateCatalog = {
        templates: CATALOG.templates,
        defaultTemplateId: 'does-not-exist',
      };

      expect(() => service.select(broken, { triggers: ['weather'] })).toThrow(
        'Default template "does-not-exist" is not in the catalog',
      );
    });
  });

  describe('determinism', () => {
    it('should return the same template on repeated runs', () => {
      const context = { triggers: ['low_energy', 'fatigue', 'procrastination'] };

      const first = service.select(CATALOG, context);
      const second = service.select(CATALOG, context);

      expect(first).toBe(second);
    });
  });
});

describe('TemplateSelectorService with a strategy-fit scorer', () => {
  let service: TemplateSelectorService;
  const fit = jest.fn<number, Parameters<StrategyFitScorer>>();

  beforeEach(async () => {
    fit.mockImplementation((template) => (template.id === 'energy' ? 0.9 : 0.1));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TemplateSelectorService,
        { provide: STRATEGY_FIT_SCORER, useValue: fit },
      ],
    }).compile();

    service = module.get<TemplateSelectorService>(TemplateSelectorService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should use the fit score to break equal-overlap ties', () => {
    const template = service.select(CATALOG, { triggers: ['low_energy'] });

    expect(template.id).toBe('energy');
  });

  it('should not let the fit score outrank a larger overlap', () => {
    const template = service.select(CATALOG, { triggers: ['low_energy', 'procrastination'] });

    expect(template.id).toBe('motivation');
  });

  it('should only score matching candidates', () => {
    service.select(CATALOG, { triggers: ['low_energy'] });

    const scoredIds = fit.mock.calls.map(([template]) => template.id);
    expect(scoredIds).toEqual(['motivation', 'energy']);
  });

  /** TEST: a NaN fit must not make the ranking depend on sort internals */
  it('should score a NaN fit as 0', () => {
    fit.mockImplementation((template) => (template.id === 'motivation' ? Number.NaN : 0.2));

    expect(service.select(CATALOG, { triggers: ['low_energy'] }).id).toBe('energy');
  });

  it('should score an infinite fit as 0', () => {
    fit.mockImplementation((template) => (template.id === 'energy' ? Number.POSITIVE_INFINITY : 0.1));

    expect(service.select(CATALOG, { triggers: ['low_energy'] }).id).toBe('motivation');
  });
});
