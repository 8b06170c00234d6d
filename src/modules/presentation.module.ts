import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { FrontendController } from '../controllers/frontend.controller';
import { PresentationController } from '../controllers/presentation.controller';
import { GeneratedFileStoreService } from '../services/generated-file-store.service';
import { LlmClientService } from '../services/llm-client.service';
import { OutlineGenerationService } from '../services/outline-generation.service';
import { PresentationService } from '../services/presentation.service';
import { TemplateRegistryService } from '../templates/template-registry.service';

@Module({
  imports: [
    HttpModule,
    ConfigModule,
  ],
  controllers: [PresentationController, FrontendController],
  providers: [
    TemplateRegistryService,
    LlmClientService,
    OutlineGenerationService,
    PresentationService,
    GeneratedFileStoreService,
  ],
})
export class PresentationModule {}
