import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  ExportBatchCommand,
  ExportBatchPort,
  ExportBatchReport,
} from '../ports/input/export-batch.port';
import type { PageSourcePort } from '../ports/output/page-source.port';
import { PAGE_SOURCE_PORT } from '../ports/tokens';
import { ExportPageUseCase } from './export-page.use-case';
import { ExportResult } from '../../domain/entities/export-result.entity';

/**
 * Export Batch Use Case
 * Reads the page list and exports the pages one after another
 */
@Injectable()
export class ExportBatchUseCase implements ExportBatchPort {
  private readonly logger = new Logger(ExportBatchUseCase.name);

  constructor(
    @Inject(PAGE_SOURCE_PORT) private readonly pageSource: PageSourcePort,
    private readonly exportPage: ExportPageUseCase,
  ) {}

  async execute(command: ExportBatchCommand): Promise<ExportBatchReport> {
    const runId = uuidv4();
    const startedAt = new Date();

    const pageUrls = await this.pageSource.readPageUrls(command.pagesFile);
    this.logger.log(
      `Run ${runId}: exporting ${pageUrls.length} page(s) from ${command.pagesFile} to ${command.outputDir}`,
    );

    const results: ExportResult[] = [];
    for (const [index, pageUrl] of pageUrls.entries()) {
      this.logger.log(`[${index + 1}/${pageUrls.length}] Processing ${pageUrl}`);
      // one export task in flight at a time
      results.push(await this.exportPage.execute({ pageUrl, outputDir: command.outputDir }));
    }

    const succeeded = results.filter(ExportResult.isSuccess).length;
    const report: ExportBatchReport = {
      runId,
      startedAt,
      finishedAt: new Date(),
      results,
      succeeded,
      failed: results.length - succeeded,
    };

    this.logger.log(
      `Run ${runId} finished: ${report.succeeded} succeeded, ${report.failed} failed`,
    );
    return report;
  }
}
