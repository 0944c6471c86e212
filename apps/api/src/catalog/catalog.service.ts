import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InterventionTemplate, PersonaConfig } from '@nudgeline/shared';
import { deepFreeze } from '../common/utils/deep-freeze';
import {
  PERSONA_TABLE,
  PersonaTable,
  TEMPLATE_CATALOG,
  TemplateCatalog,
} from './catalog.types';
import { validatePersonaTable, validateTemplateCatalog } from './catalog.validation';

/**
 * CatalogService
 *
 * Owns the persona table and the intervention template catalog.
 * Both are validated and deep-frozen once, when the module initializes;
 * a broken catalog stops the application from booting.
 */
@Injectable()
export class CatalogService implements OnModuleInit {
  private readonly logger = new Logger(CatalogService.name);
  private readonly personasById: Map<string, PersonaConfig>;

  constructor(
    @Inject(PERSONA_TABLE) private readonly personas: PersonaTable,
    @Inject(TEMPLATE_CATALOG) private readonly catalog: TemplateCatalog,
  ) {
    this.personasById = new Map(personas.map((p) => [p.id, p]));
  }

  onModuleInit() {
    validatePersonaTable(this.personas);
    validateTemplateCatalog(this.catalog);
    deepFreeze(this.personas);
    deepFreeze(this.catalog);

    this.logger.log(
      `Loaded ${this.personas.length} personas and ${this.catalog.templates.length} templates ` +
      `(default: ${this.catalog.defaultTemplateId})`,
    );
  }

  getPersona(id: string): PersonaConfig | undefined {
    return this.personasById.get(id);
  }

  listPersonas(): PersonaConfig[] {
    return [...this.personas];
  }

  getCatalog(): TemplateCatalog {
    return this.catalog;
  }

  getTemplates(): InterventionTemplate[] {
    return [...this.catalog.templates];
  }

  getDefaultTemplateId(): string {
    return this.catalog.defaultTemplateId;
  }
}
