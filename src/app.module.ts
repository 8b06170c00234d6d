import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import llmConfig from './config/llm.config';
import templatesConfig from './config/templates.config';
import { PresentationModule } from './modules/presentation.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [appConfig, llmConfig, templatesConfig],
    }),
    PresentationModule,
  ],
})
export class AppModule {}
