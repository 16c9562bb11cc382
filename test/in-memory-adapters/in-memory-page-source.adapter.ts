import { Injectable } from '@nestjs/common';
import { PageSourcePort } from '../../src/application/ports/output/page-source.port';
import { ConfigurationError } from '../../src/domain/errors/export.errors';

/**
 * In-Memory Page Source Adapter
 */
@Injectable()
export class InMemoryPageSourceAdapter implements PageSourcePort {
  private readonly lists = new Map<string, string[]>();

  async readPageUrls(source: string): Promise<string[]> {
    const pageUrls = this.lists.get(source);
    if (!pageUrls || pageUrls.length === 0) {
      throw new ConfigurationError(`No pages found in ${source}`);
    }
    return [...pageUrls];
  }

  setPages(source: string, pageUrls: string[]): void {
    this.lists.set(source, [...pageUrls]);
  }
}
