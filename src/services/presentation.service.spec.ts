import { Test, TestingModule } from '@nestjs/testing';
import { buildTemplate, FixtureLayout, readDeck, TITLE_SLIDE } from '../../test/fixtures/pptx-template';
import { ConfigurationError } from '../errors/deck-generation.errors';
import { TemplateRegistryService } from '../templates/template-registry.service';
import { TemplateDescriptor } from '../types/presentation';
import { PresentationService, validateLayouts } from './presentation.service';

describe('PresentationService', () => {
  let service: PresentationService;
  let descriptor: TemplateDescriptor;
  let templateData: Buffer;

  const mockRegistry = {
    getTemplate: jest.fn(() => descriptor),
    loadTemplate: jest.fn(async () => templateData),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    descriptor = {
      id: 'default',
      name: 'Default',
      description: 'Test template',
      file: 'default.pptx',
      coverLayout: 0,
      contentLayouts: [1, 2, 3],
    };
    templateData = await buildTemplate();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PresentationService,
        { provide: TemplateRegistryService, useValue: mockRegistry },
      ],
    }).compile();

    service = module.get<PresentationService>(PresentationService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('renderDeck', () => {
    it('renders a cover and rotates content layouts', async () => {
      const buffer = await service.renderDeck('Deck', 'A\n-x\n-y\n\nB\n-z', 'default');

      const { slides } = await readDeck(buffer);
      expect(mockRegistry.getTemplate).toHaveBeenCalledWith('default');
      expect(slides).toEqual([
        {
          path: 'ppt/slides/slide1.xml',
          layout: 'ppt/slideLayouts/slideLayout1.xml',
          placeholders: { 0: ['Deck'], 1: [''] },
        },
        {
          path: 'ppt/slides/slide2.xml',
          layout: 'ppt/slideLayouts/slideLayout2.xml',
          placeholders: { 0: ['A'], 1: ['x', 'y'] },
        },
        {
          path: 'ppt/slides/slide3.xml',
          layout: 'ppt/slideLayouts/slideLayout3.xml',
          placeholders: { 0: ['B'], 1: ['z'], 2: [''] },
        },
      ]);
    });

    it('produces only the cover when the outline has no bullets', async () => {
      const buffer = await service.renderDeck('Deck', 'Only titles\nNothing else', 'default');

      const { slides } = await readDeck(buffer);
      expect(slides).toHaveLength(1);
      expect(slides[0].placeholders[0]).toEqual(['Deck']);
    });

    it('fails before rendering when a content layout is out of range', async () => {
      descriptor = { ...descriptor, contentLayouts: [1, 5] };

      await expect(service.renderDeck('Deck', 'A\n-x', 'default')).rejects.toThrow(
        new ConfigurationError('Content layout index 5 is out of range (template "default" has 4 layouts)'),
      );
    });

    it('fails when a content layout has no title placeholder', async () => {
      const bodyOnly: FixtureLayout = { name: 'Body only', placeholders: [{ idx: 1, name: 'Body 1' }] };
      templateData = await buildTemplate([TITLE_SLIDE, bodyOnly]);
      descriptor = { ...descriptor, contentLayouts: [1] };

      await expect(service.renderDeck('Deck', 'A\n-x', 'default')).rejects.toThrow(
        new ConfigurationError('Layout 1 of template "default" has no title placeholder'),
      );
    });

    it('propagates a missing template file', async () => {
      mockRegistry.loadTemplate.mockRejectedValueOnce(new ConfigurationError('Template file not found: /tmp/x.pptx'));

      await expect(service.renderDeck('Deck', 'A\n-x', 'default')).rejects.toThrow('Template file not found: /tmp/x.pptx');
    });
  });

  describe('validateLayouts', () => {
    it('accepts indices below the layout count', () => {
      expect(() => validateLayouts(descriptor, 4)).not.toThrow();
    });

    it('names an out-of-range cover layout', () => {
      expect(() => validateLayouts({ ...descriptor, coverLayout: 9 }, 4)).toThrow(
        'Cover layout index 9 is out of range (template "default" has 4 layouts)',
      );
    });

    it('treats the layout count itself as out of range', () => {
      expect(() => validateLayouts(descriptor, 3)).toThrow(
        'Content layout index 3 is out of range (template "default" has 3 layouts)',
      );
    });

    it('rejects an empty content layout list', () => {
      expect(() => validateLayouts({ ...descriptor, contentLayouts: [] }, 4)).toThrow(ConfigurationError);
    });
  });
});
