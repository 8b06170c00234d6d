import { Controller, Get, Header, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiExcludeController } from '@nestjs/swagger';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { AppConfig } from '../config/app.config';
import { errorMessage } from '../errors/http-exception.mapper';

@ApiExcludeController()
@Controller()
export class FrontendController {
  private readonly logger = new Logger(FrontendController.name);
  private readonly frontendFile: string;

  constructor(private readonly configService: ConfigService) {
    this.frontendFile = path.resolve(this.configService.getOrThrow<AppConfig>('app').frontendFile);
  }

  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  async index(): Promise<string> {
    try {
      return await fs.readFile(this.frontendFile, 'utf8');
    } catch (error) {
      this.logger.warn(`Front end not available at ${this.frontendFile}: ${errorMessage(error)}`);
      throw new NotFoundException('Front end not available');
    }
  }
}
