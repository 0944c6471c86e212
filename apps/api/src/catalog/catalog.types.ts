import { InterventionTemplate, PersonaConfig } from '@nudgeline/shared';

/**
 * Injection tokens. Overridable so tests (or another deployment) can
 * supply their own tables.
 */
export const PERSONA_TABLE = 'PERSONA_TABLE';
export const TEMPLATE_CATALOG = 'TEMPLATE_CATALOG';

/**
 * Ordered template list plus the id of the fallback used when no
 * template's triggers match.
 */
export interface TemplateCatalog {
  templates: readonly InterventionTemplate[];
  defaultTemplateId: string;
}

export type PersonaTable = readonly PersonaConfig[];

/**
 * Upper bound for a persona's nudge interval. Keeps every gate inside the
 * daily window, which is what the history store retains.
 */
export const MAX_PERSONA_INTERVAL_MINUTES = 24 * 60;
