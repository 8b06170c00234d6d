import { Injectable, Logger } from '@nestjs/common';
import { buildOutlinePrompt, buildTitlePrompt } from '../prompts/outline.prompts';
import { GeneratedOutline } from '../types/presentation';
import { LlmClientService } from './llm-client.service';

@Injectable()
export class OutlineGenerationService {
  private readonly logger = new Logger(OutlineGenerationService.name);

  constructor(private readonly llmClient: LlmClientService) {}

  async generateOutline(keyword: string): Promise<GeneratedOutline> {
    const topic = keyword.trim();
    this.logger.log(`Generating title and outline for "${topic}"`);

    const title = await this.llmClient.generate(buildTitlePrompt(topic));
    const outline = await this.llmClient.generate(buildOutlinePrompt(topic));

    return { title, outline };
  }
}
