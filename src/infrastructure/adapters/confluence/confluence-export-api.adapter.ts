import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../../config/configuration';
import { ExportApiPort } from '../../../application/ports/output/export-api.port';
import {
  ExportTaskEntity,
  TaskStatusSnapshot,
} from '../../../domain/entities/export-task.entity';
import { PageReference } from '../../../domain/value-objects/page-reference.vo';
import {
  ArtifactNotFoundError,
  ExportRequestError,
  TaskPollError,
  errorMessage,
} from '../../../domain/errors/export.errors';
import { HttpClientService, HttpResponse } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import {
  extractArtifactLink,
  extractTaskId,
  taskProgressSchema,
  toTaskSnapshot,
  tryParseJson,
} from './export-response.parser';

const EXPORT_ACTION_PATH = '/wiki/spaces/flyingpdf/pdfpageexport.action';
const TASK_PROGRESS_PATH = '/wiki/services/api/v1/task';

function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Confluence Export API Adapter
 * Implements ExportApiPort against the PDF export action and the long-running
 * task API, authenticated with HTTP Basic credentials.
 */
@Injectable()
export class ConfluenceExportApiAdapter implements ExportApiPort {
  private readonly baseUrl: string;
  private readonly siteOrigin: string;
  private readonly authHeaders: Record<string, string>;
  private readonly timeout: number;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly httpClient: HttpClientService,
    private readonly configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    const confluence = this.configService.get('confluence', { infer: true });
    const credentials = Buffer.from(`${confluence.username}:${confluence.apiToken}`).toString(
      'base64',
    );

    this.baseUrl = confluence.baseUrl;
    this.siteOrigin = new URL(confluence.baseUrl).origin;
    this.authHeaders = {
      authorization: `Basic ${credentials}`,
      'x-atlassian-token': 'no-check',
    };
    this.timeout = this.configService.get('export', { infer: true }).requestTimeoutMs;
    this.logger = logger.forContext(ConfluenceExportApiAdapter.name);
  }

  async requestPdfExport(page: PageReference): Promise<ExportTaskEntity> {
    const url = `${this.baseUrl}${EXPORT_ACTION_PATH}?pageId=${encodeURIComponent(page.pageId)}`;

    this.logger.info({ pageId: page.pageId, spaceKey: page.spaceKey }, 'Requesting PDF export');

    let response: HttpResponse;
    try {
      response = await this.httpClient.get(url, { headers: this.authHeaders, timeout: this.timeout });
    } catch (error) {
      throw new ExportRequestError(
        'other',
        `Export request for page ${page.pageId} failed: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      );
    }

    if (!isSuccessStatus(response.statusCode)) {
      throw ExportRequestError.fromStatus(response.statusCode, page.pageId);
    }

    const taskId = extractTaskId(response.body);
    if (!taskId) {
      throw new ExportRequestError(
        'other',
        `Export response for page ${page.pageId} did not contain a task id`,
        response.statusCode,
      );
    }

    return ExportTaskEntity.create({ taskId, pageId: page.pageId });
  }

  async getTaskStatus(taskId: string): Promise<TaskStatusSnapshot> {
    const url = `${this.baseUrl}${TASK_PROGRESS_PATH}/${encodeURIComponent(taskId)}/progress`;

    let response: HttpResponse;
    try {
      response = await this.httpClient.get(url, { headers: this.authHeaders, timeout: this.timeout });
    } catch (error) {
      throw new TaskPollError(taskId, errorMessage(error), { cause: error });
    }

    if (response.statusCode !== 200) {
      throw new TaskPollError(taskId, `status endpoint returned HTTP ${response.statusCode}`);
    }

    const parsed = taskProgressSchema.safeParse(tryParseJson(response.body));
    if (!parsed.success) {
      const issues = parsed.error.errors
        .map((e) => `${e.path.join('.') || '(body)'}: ${e.message}`)
        .join('; ');
      throw new TaskPollError(taskId, `unexpected status response (${issues})`);
    }

    const snapshot = toTaskSnapshot(parsed.data);
    this.logger.withTaskId(taskId).debug({ ...snapshot }, 'Task progress');
    return snapshot;
  }

  async findArtifactUrl(taskId: string, resultLocation: string): Promise<string | undefined> {
    const resultUrl = this.resolveResultUrl(resultLocation);

    // A result on another host is the presigned link itself; never send it credentials.
    if (new URL(resultUrl).origin !== this.siteOrigin) {
      return resultUrl;
    }

    let response: HttpResponse;
    try {
      response = await this.httpClient.get(resultUrl, {
        headers: this.authHeaders,
        timeout: this.timeout,
      });
    } catch (error) {
      throw new ArtifactNotFoundError(taskId, `result request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!isSuccessStatus(response.statusCode)) {
      throw new ArtifactNotFoundError(
        taskId,
        `result endpoint returned HTTP ${response.statusCode}`,
      );
    }

    return extractArtifactLink(response.body);
  }

  private resolveResultUrl(resultLocation: string): string {
    const location = resultLocation.trim();
    if (location.startsWith('/')) {
      return `${this.baseUrl}${location}`;
    }
    if (/^https?:\/\//i.test(location)) {
      return location;
    }
    return `${this.baseUrl}/${location}`;
  }
}
