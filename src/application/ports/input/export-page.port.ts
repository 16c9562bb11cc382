import type { ExportResult } from '../../../domain/entities/export-result.entity';

/**
 * Export Page Command
 */
export interface ExportPageCommand {
  pageUrl: string;
  outputDir: string;
}

/**
 * Export Page Port (Driving Port / Use Case Interface)
 * Runs parse → request → poll → locate → download for one page
 */
export interface ExportPagePort {
  /**
   * Never rejects: every failure is returned as a failure result.
   */
  execute(command: ExportPageCommand): Promise<ExportResult>;
}
