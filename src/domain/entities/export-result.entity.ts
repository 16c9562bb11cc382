import { freeze } from 'immer';
import { ExportError, ExportErrorCode } from '../errors/export.errors';
import { PageReference } from '../value-objects/page-reference.vo';

/**
 * Export Result - the outcome of exporting one page from the input list
 */
export type PageExportStep = 'parse' | 'request' | 'poll' | 'locate' | 'download';

export interface ExportFailureDetail {
  readonly code: ExportErrorCode;
  readonly cause: string;
  readonly message: string;
}

export interface ExportSuccess {
  readonly outcome: 'success';
  readonly pageUrl: string;
  readonly page: PageReference;
  readonly filePath: string;
  readonly sizeBytes: number;
}

export interface ExportFailure {
  readonly outcome: 'failure';
  readonly pageUrl: string;
  readonly page?: PageReference;
  readonly step: PageExportStep;
  readonly error: ExportFailureDetail;
}

export type ExportResult = ExportSuccess | ExportFailure;

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ExportResult {
  export function succeeded(
    page: PageReference,
    filePath: string,
    sizeBytes: number,
  ): ExportSuccess {
    return freeze<ExportSuccess>({
      outcome: 'success',
      pageUrl: page.url,
      page,
      filePath,
      sizeBytes,
    });
  }

  export function failed(
    pageUrl: string,
    step: PageExportStep,
    error: ExportError,
    page?: PageReference,
  ): ExportFailure {
    return freeze<ExportFailure>({
      outcome: 'failure',
      pageUrl,
      page,
      step,
      error: freeze<ExportFailureDetail>({
        code: error.code,
        cause: error.summaryCause,
        message: error.message,
      }),
    });
  }

  export function isSuccess(result: ExportResult): result is ExportSuccess {
    return result.outcome === 'success';
  }

  export function isFailure(result: ExportResult): result is ExportFailure {
    return result.outcome === 'failure';
  }
}
