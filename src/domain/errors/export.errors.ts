/**
 * Export Error Taxonomy
 *
 * Every failure the pipeline can report carries a stable `code` and a short
 * `summaryCause` label that is shown in the batch summary. Only
 * `ConfigurationError` is fatal to a run; everything else is recorded against
 * the page that raised it.
 */
export enum ExportErrorCode {
  MALFORMED_URL = 'MALFORMED_URL',
  EXPORT_REQUEST_FAILED = 'EXPORT_REQUEST_FAILED',
  TASK_TIMEOUT = 'TASK_TIMEOUT',
  TASK_POLL_FAILED = 'TASK_POLL_FAILED',
  TASK_FAILED = 'TASK_FAILED',
  ARTIFACT_NOT_FOUND = 'ARTIFACT_NOT_FOUND',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
}

export abstract class ExportError extends Error {
  abstract readonly code: ExportErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  abstract get summaryCause(): string;

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      cause: this.summaryCause,
      message: this.message,
    };
  }
}

export class MalformedURLError extends ExportError {
  readonly code = ExportErrorCode.MALFORMED_URL;

  constructor(
    public readonly url: string,
    detail: string,
  ) {
    super(`Malformed page URL "${url}": ${detail}`);
  }

  get summaryCause(): string {
    return 'malformed url';
  }
}

export type ExportRequestFailureReason = 'not-found' | 'auth' | 'other';

export class ExportRequestError extends ExportError {
  readonly code = ExportErrorCode.EXPORT_REQUEST_FAILED;

  constructor(
    public readonly reason: ExportRequestFailureReason,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /**
   * Maps a non-2xx status of the export endpoint onto a failure reason.
   */
  static fromStatus(statusCode: number, pageId: string): ExportRequestError {
    if (statusCode === 404) {
      return new ExportRequestError(
        'not-found',
        `Page ${pageId} or the PDF export add-on was not found (HTTP 404)`,
        statusCode,
      );
    }
    if (statusCode === 401 || statusCode === 403) {
      return new ExportRequestError(
        'auth',
        `Not authorized to export page ${pageId} (HTTP ${statusCode})`,
        statusCode,
      );
    }
    return new ExportRequestError(
      'other',
      `Export request for page ${pageId} failed (HTTP ${statusCode})`,
      statusCode,
    );
  }

  get summaryCause(): string {
    return `export request: ${this.reason.replace('-', ' ')}`;
  }
}

export class TaskTimeoutError extends ExportError {
  readonly code = ExportErrorCode.TASK_TIMEOUT;

  constructor(
    public readonly taskId: string,
    public readonly maxWaitMs: number,
  ) {
    super(`Task ${taskId} did not complete within ${maxWaitMs}ms`);
  }

  get summaryCause(): string {
    return 'timeout';
  }
}

export class TaskPollError extends ExportError {
  readonly code = ExportErrorCode.TASK_POLL_FAILED;

  constructor(
    public readonly taskId: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Polling task ${taskId} failed: ${detail}`, options);
  }

  get summaryCause(): string {
    return 'task poll';
  }
}

export class TaskFailedError extends ExportError {
  readonly code = ExportErrorCode.TASK_FAILED;

  constructor(
    public readonly taskId: string,
    detail?: string,
  ) {
    super(`Export task ${taskId} failed${detail ? `: ${detail}` : ''}`);
  }

  get summaryCause(): string {
    return 'task failed';
  }
}

export class ArtifactNotFoundError extends ExportError {
  readonly code = ExportErrorCode.ARTIFACT_NOT_FOUND;

  constructor(
    public readonly taskId: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`No download link for task ${taskId}: ${detail}`, options);
  }

  get summaryCause(): string {
    return 'artifact not found';
  }
}

export class DownloadError extends ExportError {
  readonly code = ExportErrorCode.DOWNLOAD_FAILED;

  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get summaryCause(): string {
    return 'download';
  }
}

export class ConfigurationError extends ExportError {
  readonly code = ExportErrorCode.CONFIGURATION_INVALID;

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
  }

  get summaryCause(): string {
    return 'configuration';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
