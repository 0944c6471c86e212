import { Module } from '@nestjs/common';
import { CatalogController } from './catalog.controller';
import { CatalogService } from './catalog.service';
import { PERSONA_TABLE, TEMPLATE_CATALOG, TemplateCatalog } from './catalog.types';
import { PERSONA_CONFIGS } from './persona-configs.data';
import {
  DEFAULT_TEMPLATE_ID,
  INTERVENTION_TEMPLATES,
} from './intervention-templates.data';

const DEFAULT_CATALOG: TemplateCatalog = {
  templates: INTERVENTION_TEMPLATES,
  defaultTemplateId: DEFAULT_TEMPLATE_ID,
};

/**
 * CatalogModule
 *
 * Exports CatalogService for use by:
 * - nudge (persona lookup, catalog passed to the pipeline)
 */
@Module({
  controllers: [CatalogController],
  providers: [
    CatalogService,
    { provide: PERSONA_TABLE, useValue: PERSONA_CONFIGS },
    { provide: TEMPLATE_CATALOG, useValue: DEFAULT_CATALOG },
  ],
  exports: [CatalogService],
})
export class CatalogModule {}
