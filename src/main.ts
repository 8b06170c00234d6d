import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AppConfig } from './config/app.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');
  const config = app.get(ConfigService).getOrThrow<AppConfig>('app');

  // '*' keeps the API open to any front end, as in local development.
  const origins = config.corsOrigins.includes('*') ? true : config.corsOrigins;
  app.enableCors({
    origin: origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Outline Deck Generator API')
      .setDescription('Generate an outline from a keyword and render it into a PowerPoint deck')
      .setVersion('1.0')
      .addTag('Presentations', 'Outline generation, rendering and download')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  await app.listen(config.port);

  logger.log(`Outline Deck Generator is running on: http://localhost:${config.port}`);
  logger.log(`Swagger documentation available at: http://localhost:${config.port}/docs`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start server', error);
  process.exit(1);
});
