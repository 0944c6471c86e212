import { Controller, Get } from '@nestjs/common';
import { InterventionTemplate, PersonaConfig } from '@nudgeline/shared';
import { CatalogService } from './catalog.service';

/**
 * Read-only catalog endpoints:
 * - GET /catalog/personas
 * - GET /catalog/templates
 */
@Controller('catalog')
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get('personas')
  listPersonas(): PersonaConfig[] {
    return this.catalogService.listPersonas();
  }

  @Get('templates')
  listTemplates(): InterventionTemplate[] {
    return this.catalogService.getTemplates();
  }
}
