import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { DEFAULT_TEMPLATE_ID, TemplatesConfig } from '../config/templates.config';
import { ConfigurationError } from '../errors/deck-generation.errors';
import { hasErrorCode } from '../errors/errno';
import { TemplateDescriptor } from '../types/presentation';

@Injectable()
export class TemplateRegistryService {
  private readonly logger = new Logger(TemplateRegistryService.name);
  private readonly templates = new Map<string, TemplateDescriptor>();
  private readonly directory: string;

  constructor(private readonly configService: ConfigService) {
    const config = this.configService.getOrThrow<TemplatesConfig>('templates');
    this.directory = config.directory;
    for (const descriptor of config.catalog) {
      this.templates.set(descriptor.id, descriptor);
    }
  }

  listTemplates(): TemplateDescriptor[] {
    return [...this.templates.values()];
  }

  hasTemplate(id: string): boolean {
    return this.templates.has(id);
  }

  /**
   * Look up a template; unknown ids fall back to the default template.
   */
  getTemplate(id: string): TemplateDescriptor {
    const descriptor = this.templates.get(id);
    if (descriptor) {
      return descriptor;
    }

    const fallback = this.templates.get(DEFAULT_TEMPLATE_ID);
    if (!fallback) {
      throw new ConfigurationError(`Unknown template "${id}" and no "${DEFAULT_TEMPLATE_ID}" template registered`);
    }
    this.logger.warn(`Unknown template "${id}", using "${DEFAULT_TEMPLATE_ID}"`);
    return fallback;
  }

  resolveTemplatePath(descriptor: TemplateDescriptor): string {
    return path.resolve(this.directory, descriptor.file);
  }

  async loadTemplate(descriptor: TemplateDescriptor): Promise<Buffer> {
    const templatePath = this.resolveTemplatePath(descriptor);
    try {
      return await fs.readFile(templatePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new ConfigurationError(`Template file not found: ${templatePath}`);
      }
      throw error;
    }
  }
}
