import { Test, TestingModule } from '@nestjs/testing';
import { CatalogModule } from './catalog.module';
import { CatalogService } from './catalog.service';
import { TEMPLATE_CATALOG, TemplateCatalog } from './catalog.types';
import { ConfigurationError } from '../common/errors';

/**
 * CatalogService Unit Tests
 *
 * Runs against the shipped persona table and template catalog.
 */
describe('CatalogService', () => {
  let module: TestingModule;
  let service: CatalogService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [CatalogModule],
    }).compile();
    await module.init();

    service = module.get<CatalogService>(CatalogService);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('personas', () => {
    it('should list the four archetypes', () => {
      expect(service.listPersonas().map((p) => p.id)).toEqual(['INTJ', 'ENFP', 'ISTJ', 'ESFP']);
    });

    it('should look personas up by id', () => {
      const persona = service.getPersona('ENFP');

      expect(persona?.learning_style).toBe('exploratory');
      expect(persona?.communication_pref).toBe('enthusiastic');
      expect(persona?.cognitive_load_threshold).toBe(0.6);
    });

    it('should return undefined for an unknown id', () => {
      expect(service.getPersona('XXXX')).toBeUndefined();
    });
  });

  describe('templates', () => {
    it('should keep catalog order', () => {
      expect(service.getTemplates().map((t) => t.id)).toEqual([
        'focus',
        'motivation',
        'energy_recovery',
        'overload',
        'general_check_in',
      ]);
    });

    it('should expose the default template id', () => {
      expect(service.getDefaultTemplateId()).toBe('general_check_in');
    });

    it('should freeze the catalog after init', () => {
      const [first] = service.getCatalog().templates;

      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.actions[0])).toBe(true);
    });
  });
});

describe('CatalogService with a broken catalog', () => {
  it('should refuse to initialize an empty catalog', async () => {
    const empty: TemplateCatalog = { templates: [], defaultTemplateId: 'general_check_in' };
    const module = await Test.createTestingModule({
      imports: [CatalogModule],
    })
      .overrideProvider(TEMPLATE_CATALOG)
      .useValue(empty)
      .compile();

    await expect(module.init()).rejects.toThrow(ConfigurationError);
  });
});
