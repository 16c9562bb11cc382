import type { ExportResult } from '../../../domain/entities/export-result.entity';

/**
 * Export Batch Command
 */
export interface ExportBatchCommand {
  /** Location of the page list, read through the page source */
  pagesFile: string;
  outputDir: string;
}

/**
 * Export Batch Report
 */
export interface ExportBatchReport {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  results: ExportResult[];
  succeeded: number;
  failed: number;
}

/**
 * Export Batch Port (Driving Port / Use Case Interface)
 */
export interface ExportBatchPort {
  /**
   * @throws ConfigurationError when the page list is unusable
   */
  execute(command: ExportBatchCommand): Promise<ExportBatchReport>;
}
