import { Injectable, Logger } from '@nestjs/common';
import { ConfigurationError } from '../errors/deck-generation.errors';
import { assignSlides } from '../outline/outline-parser';
import { PptxDocument } from '../rendering/pptx-document';
import { TemplateRegistryService } from '../templates/template-registry.service';
import { TemplateDescriptor } from '../types/presentation';

/**
 * Check every layout a template descriptor names against the layouts its file
 * actually provides. Runs before any slide is created.
 */
export function validateLayouts(template: TemplateDescriptor, layoutCount: number): void {
  const check = (kind: string, index: number) => {
    if (!Number.isInteger(index) || index < 0 || index >= layoutCount) {
      throw new ConfigurationError(
        `${kind} layout index ${index} is out of range (template "${template.id}" has ${layoutCount} layouts)`,
      );
    }
  };

  check('Cover', template.coverLayout);
  if (template.contentLayouts.length === 0) {
    throw new ConfigurationError(`Template "${template.id}" has no content layouts`);
  }
  template.contentLayouts.forEach((index) => check('Content', index));
}

@Injectable()
export class PresentationService {
  private readonly logger = new Logger(PresentationService.name);

  constructor(private readonly templateRegistry: TemplateRegistryService) {}

  /**
   * Render a cover slide plus one slide per outline section into the chosen template.
   */
  async renderDeck(title: string, outlineText: string, templateId: string): Promise<Buffer> {
    const template = this.templateRegistry.getTemplate(templateId);
    const document = await PptxDocument.open(await this.templateRegistry.loadTemplate(template));

    validateLayouts(template, document.layoutCount);
    const specs = assignSlides(title, outlineText, template.contentLayouts);

    const cover = await document.addSlide(template.coverLayout);
    cover.title?.setText(title);
    cover.placeholder(1)?.setText('');

    for (const spec of specs) {
      const slide = await document.addSlide(spec.layoutIndex);
      if (!slide.title) {
        throw new ConfigurationError(
          `Layout ${spec.layoutIndex} of template "${template.id}" has no title placeholder`,
        );
      }
      slide.title.setText(spec.title);
      slide.placeholder(1)?.setParagraphs(spec.bullets);
    }

    this.logger.log(`Rendered "${title}" with template ${template.id}: 1 cover + ${specs.length} content slides`);
    return document.toBuffer();
  }
}
