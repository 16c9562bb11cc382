import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/configuration';
import { ExportPageCommand, ExportPagePort } from '../ports/input/export-page.port';
import type { ExportApiPort } from '../ports/output/export-api.port';
import type { ArtifactDownloaderPort } from '../ports/output/artifact-downloader.port';
import { ARTIFACT_DOWNLOADER_PORT, EXPORT_API_PORT } from '../ports/tokens';
import { PollExportTaskUseCase } from './poll-export-task.use-case';
import { LocateArtifactUseCase } from './locate-artifact.use-case';
import { ExportTaskEntity } from '../../domain/entities/export-task.entity';
import { ExportResult, PageExportStep } from '../../domain/entities/export-result.entity';
import { PageReference } from '../../domain/value-objects/page-reference.vo';
import {
  ArtifactNotFoundError,
  DownloadError,
  ExportError,
  ExportRequestError,
  MalformedURLError,
  TaskFailedError,
  TaskPollError,
  errorMessage,
} from '../../domain/errors/export.errors';

/**
 * Export Page Use Case
 * Runs one page through Parsed → Requested → Polling → Located → Downloaded.
 *
 * This is the per-page error boundary: whatever step fails, the page ends up
 * as exactly one failure result and the batch moves on.
 */
@Injectable()
export class ExportPageUseCase implements ExportPagePort {
  private readonly logger = new Logger(ExportPageUseCase.name);
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;

  constructor(
    @Inject(EXPORT_API_PORT) private readonly exportApi: ExportApiPort,
    private readonly pollExportTask: PollExportTaskUseCase,
    private readonly locateArtifact: LocateArtifactUseCase,
    @Inject(ARTIFACT_DOWNLOADER_PORT) private readonly downloader: ArtifactDownloaderPort,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {
    const exportConfig = this.configService.get('export', { infer: true });

    this.pollIntervalMs = exportConfig.pollIntervalMs;
    this.maxWaitMs = exportConfig.maxWaitMs;
  }

  async execute(command: ExportPageCommand): Promise<ExportResult> {
    const { pageUrl, outputDir } = command;
    let step: PageExportStep = 'parse';
    let page: PageReference | undefined;
    let taskId: string | undefined;

    try {
      page = PageReference.parse(pageUrl);

      step = 'request';
      const task = await this.exportApi.requestPdfExport(page);
      taskId = task.taskId;
      this.logger.log(`Page ${page.pageId}: export started as task ${taskId}`);

      step = 'poll';
      const finished = await this.pollExportTask.execute({
        task,
        intervalMs: this.pollIntervalMs,
        maxWaitMs: this.maxWaitMs,
      });
      if (ExportTaskEntity.isFailed(finished)) {
        throw new TaskFailedError(finished.taskId, finished.message);
      }

      step = 'locate';
      const artifactUrl = await this.locateArtifact.execute(finished);

      step = 'download';
      const artifact = await this.downloader.download({
        url: artifactUrl,
        directory: outputDir,
        fileName: page.suggestedFileName(),
      });
      this.logger.log(`Page ${page.pageId}: saved ${artifact.filePath} (${artifact.sizeBytes} bytes)`);

      return ExportResult.succeeded(page, artifact.filePath, artifact.sizeBytes);
    } catch (error) {
      const failure = toExportError(step, pageUrl, taskId, error);
      this.logger.warn(`Export of ${pageUrl} failed during ${step}: ${failure.message}`);
      return ExportResult.failed(pageUrl, step, failure, page);
    }
  }
}

/**
 * Classifies an error that escaped a pipeline step. Errors outside the
 * export taxonomy are attributed to the step that was running.
 */
export function toExportError(
  step: PageExportStep,
  pageUrl: string,
  taskId: string | undefined,
  error: unknown,
): ExportError {
  if (error instanceof ExportError) {
    return error;
  }

  const message = errorMessage(error);
  const options = { cause: error };

  switch (step) {
    case 'parse':
      return new MalformedURLError(pageUrl, message);
    case 'request':
      return new ExportRequestError('other', message, undefined, options);
    case 'poll':
      return new TaskPollError(taskId ?? 'unknown', message, options);
    case 'locate':
      return new ArtifactNotFoundError(taskId ?? 'unknown', message, options);
    case 'download':
      return new DownloadError(message, undefined, options);
  }
}
