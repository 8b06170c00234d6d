import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Post,
  StreamableFile,
  UseInterceptors,
} from '@nestjs/common';
import { NoFilesInterceptor } from '@nestjs/platform-express';
import { ApiConsumes, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { createReadStream } from 'node:fs';
import {
  ErrorResponseDto,
  GeneratedFileDto,
  GenerateOutlineDto,
  GeneratePresentationDto,
  OutlineResponseDto,
  TemplateDto,
} from '../dto/presentation.dto';
import { DEFAULT_TEMPLATE_ID } from '../config/templates.config';
import { errorMessage, toHttpException } from '../errors/http-exception.mapper';
import { GeneratedFileStoreService } from '../services/generated-file-store.service';
import { OutlineGenerationService } from '../services/outline-generation.service';
import { PresentationService } from '../services/presentation.service';
import { TemplateRegistryService } from '../templates/template-registry.service';
import { GeneratedFile, GeneratedOutline, HealthStatus, TemplateDescriptor } from '../types/presentation';

export const PPTX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.presentationml.presentation';

function failure(error: string, detail: string, status: HttpStatus): HttpException {
  return new HttpException({ error, detail, timestamp: new Date().toISOString() }, status);
}

@ApiTags('Presentations')
@Controller()
export class PresentationController {
  private readonly logger = new Logger(PresentationController.name);

  constructor(
    private readonly templateRegistry: TemplateRegistryService,
    private readonly outlineGeneration: OutlineGenerationService,
    private readonly presentationService: PresentationService,
    private readonly fileStore: GeneratedFileStoreService,
  ) {}

  @Get('api/templates')
  @ApiOperation({ summary: 'List available presentation templates' })
  @ApiResponse({ status: 200, type: [TemplateDto] })
  listTemplates(): TemplateDescriptor[] {
    return this.templateRegistry.listTemplates();
  }

  @Post('api/outline')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(NoFilesInterceptor())
  @ApiConsumes('application/json', 'application/x-www-form-urlencoded', 'multipart/form-data')
  @ApiOperation({ summary: 'Generate a title and an editable outline for a keyword' })
  @ApiResponse({ status: 200, type: OutlineResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid request' })
  @ApiResponse({ status: 500, description: 'LLM not configured', type: ErrorResponseDto })
  @ApiResponse({ status: 503, description: 'LLM service failed', type: ErrorResponseDto })
  async generateOutline(@Body() dto: GenerateOutlineDto): Promise<GeneratedOutline> {
    this.logger.log(`Generating outline for keyword: ${dto.keyword}`);

    try {
      return await this.outlineGeneration.generateOutline(dto.keyword);
    } catch (error) {
      this.logger.error(`Outline generation failed: ${errorMessage(error)}`);
      throw toHttpException(error, 'Outline Generation Failed');
    }
  }

  @Post('api/generate')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(NoFilesInterceptor())
  @ApiConsumes('application/json', 'application/x-www-form-urlencoded', 'multipart/form-data')
  @ApiOperation({ summary: 'Render an edited outline into a .pptx file' })
  @ApiResponse({ status: 200, type: GeneratedFileDto })
  @ApiResponse({ status: 400, description: 'Invalid request or unknown template', type: ErrorResponseDto })
  @ApiResponse({ status: 500, description: 'Rendering failed', type: ErrorResponseDto })
  async generatePresentation(@Body() dto: GeneratePresentationDto): Promise<GeneratedFile> {
    const templateId = dto.template ?? DEFAULT_TEMPLATE_ID;
    if (!this.templateRegistry.hasTemplate(templateId)) {
      throw failure('Invalid Template', `Unknown template "${templateId}"`, HttpStatus.BAD_REQUEST);
    }

    this.logger.log(`Generating presentation "${dto.title}" with template ${templateId}`);

    try {
      const deck = await this.presentationService.renderDeck(dto.title, dto.content, templateId);
      const filename = await this.fileStore.save(deck);
      return { filename, url: `/download/${filename}` };
    } catch (error) {
      this.logger.error(`Presentation generation failed: ${errorMessage(error)}`);
      throw toHttpException(error, 'Presentation Generation Failed');
    }
  }

  @Get('download/:filename')
  @ApiOperation({ summary: 'Download a generated presentation' })
  @ApiResponse({ status: 200, description: 'The .pptx file' })
  @ApiResponse({ status: 404, description: 'File not found', type: ErrorResponseDto })
  async download(@Param('filename') filename: string): Promise<StreamableFile> {
    if (!this.fileStore.isValidFilename(filename)) {
      throw failure('Invalid File Name', `"${filename}" is not a generated presentation`, HttpStatus.BAD_REQUEST);
    }
    if (!(await this.fileStore.exists(filename))) {
      throw failure('File Not Found', `No generated presentation named "${filename}"`, HttpStatus.NOT_FOUND);
    }

    return new StreamableFile(createReadStream(this.fileStore.resolve(filename)), {
      type: PPTX_MIME_TYPE,
      disposition: `attachment; filename="${filename}"`,
    });
  }

  @Get('api/health')
  @ApiOperation({ summary: 'Check service health' })
  @ApiResponse({ status: 200, description: 'Service is healthy' })
  healthCheck(): HealthStatus {
    return {
      status: 'healthy',
      service: 'presentations',
      timestamp: new Date().toISOString(),
    };
  }
}
