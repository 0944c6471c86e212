import { InterventionTemplate, PersonaConfig } from '@nudgeline/shared';
import { validatePersonaTable, validateTemplateCatalog } from './catalog.validation';
import { PERSONA_CONFIGS } from './persona-configs.data';
import { DEFAULT_TEMPLATE_ID, INTERVENTION_TEMPLATES } from './intervention-templates.data';
import { ConfigurationError } from '../common/errors';

function template(overrides: Partial<InterventionTemplate> = {}): InterventionTemplate {
  return {
    id: 'focus',
    headline: 'Focus',
    triggers: ['distraction'],
    actions: [{ type: 'environment', duration_minutes: 5, description: 'Clear workspace' }],
    follow_up: { delay_minutes: 60, type: 'progress_check' },
    ...overrides,
  };
}

describe('validateTemplateCatalog', () => {
  it('should accept the shipped catalog', () => {
    expect(() =>
      validateTemplateCatalog({ templates: INTERVENTION_TEMPLATES, defaultTemplateId: DEFAULT_TEMPLATE_ID }),
    ).not.toThrow();
  });

  it('should reject an empty catalog', () => {
    expect(() => validateTemplateCatalog({ templates: [], defaultTemplateId: 'focus' })).toThrow(
      'Intervention template catalog is empty',
    );
  });

  it('should reject duplicate ids', () => {
    expect(() =>
      validateTemplateCatalog({ templates: [template(), template()], defaultTemplateId: 'focus' }),
    ).toThrow('Duplicate intervention template id "focus"');
  });

  it('should reject a template without triggers', () => {
    expect(() =>
      validateTemplateCatalog({ templates: [template({ triggers: [] })], defaultTemplateId: 'focus' }),
    ).toThrow('Template "focus" has no trigger tags');
  });

  it('should reject a template without actions', () => {
    expect(() =>
      validateTemplateCatalog({ templates: [template({ actions: [] })], defaultTemplateId: 'focus' }),
    ).toThrow('Template "focus" has no actions');
  });

  it('should reject blank descriptions and negative durations', () => {
    const blank = template({ actions: [{ type: 'x', duration_minutes: 5, description: '  ' }] });
    const negative = template({ actions: [{ type: 'x', duration_minutes: -1, description: 'Do it' }] });

    expect(() => validateTemplateCatalog({ templates: [blank], defaultTemplateId: 'focus' })).toThrow(
      'Template "focus" action #1 has an empty description',
    );
    expect(() => validateTemplateCatalog({ templates: [negative], defaultTemplateId: 'focus' })).toThrow(
      ConfigurationError,
    );
  });

  it('should reject a default that is not in the catalog', () => {
    expect(() => validateTemplateCatalog({ templates: [template()], defaultTemplateId: 'missing' })).toThrow(
      'Default template "missing" is not in the catalog',
    );
  });
});

describe('validatePersonaTable', () => {
  it('should accept the shipped personas', () => {
    expect(() => validatePersonaTable(PERSONA_CONFIGS)).not.toThrow();
  });

  it('should reject a threshold outside [0, 1]', () => {
    const bad: PersonaConfig = { ...PERSONA_CONFIGS[0], id: 'BAD', cognitive_load_threshold: 1.2 };

    expect(() => validatePersonaTable([bad])).toThrow(
      'Persona "BAD" cognitive_load_threshold 1.2 is outside [0, 1]',
    );
  });

  it('should reject an interval that is fractional, negative or longer than a day', () => {
    const withInterval = (nudge_interval_minutes: number): PersonaConfig => ({
      ...PERSONA_CONFIGS[0],
      id: 'BAD',
      nudge_interval_minutes,
    });

    expect(() => validatePersonaTable([withInterval(1441)])).toThrow(
      'Persona "BAD" nudge_interval_minutes 1441 is outside [0, 1440]',
    );
    expect(() => validatePersonaTable([withInterval(-1)])).toThrow(ConfigurationError);
    expect(() => validatePersonaTable([withInterval(12.5)])).toThrow(ConfigurationError);
    expect(() => validatePersonaTable([withInterval(0)])).not.toThrow();
  });

  it('should reject a daily limit that is not a whole number', () => {
    const bad: PersonaConfig = { ...PERSONA_CONFIGS[0], id: 'BAD', daily_nudge_limit: 2.5 };

    expect(() => validatePersonaTable([bad])).toThrow(
      'Persona "BAD" daily_nudge_limit 2.5 must be a non-negative integer',
    );
  });

  it('should reject duplicate ids', () => {
    expect(() => validatePersonaTable([PERSONA_CONFIGS[0], PERSONA_CONFIGS[0]])).toThrow(
      'Duplicate persona id "INTJ"',
    );
  });
});
