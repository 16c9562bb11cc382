import { Injectable } from '@nestjs/common';
import { promises as fs } from 'fs';
import { PageSourcePort } from '../../../application/ports/output/page-source.port';
import { ConfigurationError, errorMessage } from '../../../domain/errors/export.errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * One page URL per line; surrounding whitespace is dropped and blank lines
 * are skipped.
 */
export function parsePageList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * File Page Source Adapter
 * Implements PageSourcePort over a plain-text file
 */
@Injectable()
export class FilePageSourceAdapter implements PageSourcePort {
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(FilePageSourceAdapter.name);
  }

  async readPageUrls(source: string): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(source, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read page list ${source}: ${errorMessage(error)}`);
    }

    const pageUrls = parsePageList(content);
    if (pageUrls.length === 0) {
      throw new ConfigurationError(`No pages found in ${source}`);
    }

    this.logger.debug({ source, count: pageUrls.length }, 'Page list loaded');
    return pageUrls;
  }
}
