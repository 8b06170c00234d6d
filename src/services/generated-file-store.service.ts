import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { AppConfig } from '../config/app.config';
import { hasErrorCode } from '../errors/errno';

const FILENAME_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*\.pptx$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `PPT_yyyyMMdd-HHmmss`, in local time. */
export function timestampedBaseName(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `PPT_${date}-${time}`;
}

/**
 * Flat-file storage for rendered decks, served back by name.
 */
@Injectable()
export class GeneratedFileStoreService implements OnModuleInit {
  private readonly logger = new Logger(GeneratedFileStoreService.name);
  private readonly directory: string;

  constructor(private readonly configService: ConfigService) {
    this.directory = path.resolve(this.configService.getOrThrow<AppConfig>('app').generatedDir);
  }

  async onModuleInit(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
  }

  isValidFilename(filename: string): boolean {
    return FILENAME_PATTERN.test(filename) && path.basename(filename) === filename;
  }

  resolve(filename: string): string {
    return path.join(this.directory, filename);
  }

  async exists(filename: string): Promise<boolean> {
    if (!this.isValidFilename(filename)) {
      return false;
    }
    try {
      const stats = await fs.stat(this.resolve(filename));
      return stats.isFile();
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Write a deck under a fresh timestamped name and return that name. Requests
   * landing in the same second get `-1`, `-2`, ... appended.
   */
  async save(data: Buffer, now: Date = new Date()): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    const baseName = timestampedBaseName(now);

    for (let attempt = 0; ; attempt++) {
      const filename = attempt === 0 ? `${baseName}.pptx` : `${baseName}-${attempt}.pptx`;
      try {
        await fs.writeFile(this.resolve(filename), data, { flag: 'wx' });
        this.logger.log(`Saved ${filename} (${data.length} bytes)`);
        return filename;
      } catch (error) {
        if (hasErrorCode(error, 'EEXIST')) {
          continue;
        }
        throw error;
      }
    }
  }
}
