import { ConfigurationError } from '../common/errors';
import { MAX_PERSONA_INTERVAL_MINUTES, PersonaTable, TemplateCatalog } from './catalog.types';

/**
 * Startup checks for the template catalog.
 *
 * Throws ConfigurationError on the first problem found:
 * - empty catalog
 * - duplicate template ids
 * - template without trigger tags or without actions
 * - action with an empty description or a negative/non-finite duration
 * - defaultTemplateId not present in the catalog
 */
export function validateTemplateCatalog(catalog: TemplateCatalog): void {
  if (catalog.templates.length === 0) {
    throw new ConfigurationError('Intervention template catalog is empty');
  }

  const seen = new Set<string>();
  for (const template of catalog.templates) {
    if (seen.has(template.id)) {
      throw new ConfigurationError(`Duplicate intervention template id "${template.id}"`);
    }
    seen.add(template.id);

    if (template.triggers.length === 0) {
      throw new ConfigurationError(`Template "${template.id}" has no trigger tags`);
    }
    if (template.actions.length === 0) {
      throw new ConfigurationError(`Template "${template.id}" has no actions`);
    }

    template.actions.forEach((action, index) => {
      if (!action.description.trim()) {
        throw new ConfigurationError(
          `Template "${template.id}" action #${index + 1} has an empty description`,
        );
      }
      if (!Number.isFinite(action.duration_minutes) || action.duration_minutes < 0) {
        throw new ConfigurationError(
          `Template "${template.id}" action #${index + 1} has invalid duration ${action.duration_minutes}`,
        );
      }
    });
  }

  if (!seen.has(catalog.defaultTemplateId)) {
    throw new ConfigurationError(
      `Default template "${catalog.defaultTemplateId}" is not in the catalog`,
    );
  }
}

export function validatePersonaTable(personas: PersonaTable): void {
  const seen = new Set<string>();
  for (const persona of personas) {
    if (seen.has(persona.id)) {
      throw new ConfigurationError(`Duplicate persona id "${persona.id}"`);
    }
    seen.add(persona.id);

    const threshold = persona.cognitive_load_threshold;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new ConfigurationError(
        `Persona "${persona.id}" cognitive_load_threshold ${threshold} is outside [0, 1]`,
      );
    }

    const interval = persona.nudge_interval_minutes;
    if (
      interval !== undefined &&
      (!Number.isInteger(interval) || interval < 0 || interval > MAX_PERSONA_INTERVAL_MINUTES)
    ) {
      throw new ConfigurationError(
        `Persona "${persona.id}" nudge_interval_minutes ${interval} is outside [0, ${MAX_PERSONA_INTERVAL_MINUTES}]`,
      );
    }

    const limit = persona.daily_nudge_limit;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new ConfigurationError(
        `Persona "${persona.id}" daily_nudge_limit ${limit} must be a non-negative integer`,
      );
    }
  }
}
