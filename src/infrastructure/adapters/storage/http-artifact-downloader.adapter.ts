import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import type { AppConfig } from '../../../config/configuration';
import {
  ArtifactDownloaderPort,
  DownloadArtifactRequest,
  DownloadedArtifact,
} from '../../../application/ports/output/artifact-downloader.port';
import { DownloadError, errorMessage } from '../../../domain/errors/export.errors';
import {
  HttpClientService,
  StreamResponse,
  redactQuery,
} from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * The only headers sent to object storage. Presigned URLs carry their own
 * authorization; wiki credentials must never reach this request.
 */
export const DOWNLOAD_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  accept: 'application/pdf, */*',
});

/**
 * HTTP Artifact Downloader Adapter
 * Implements ArtifactDownloaderPort by streaming a presigned URL to disk
 */
@Injectable()
export class HttpArtifactDownloaderAdapter implements ArtifactDownloaderPort {
  private readonly timeout: number;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly httpClient: HttpClientService,
    private readonly configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    this.timeout = this.configService.get('export', { infer: true }).requestTimeoutMs;
    this.logger = logger.forContext(HttpArtifactDownloaderAdapter.name);
  }

  async download(request: DownloadArtifactRequest): Promise<DownloadedArtifact> {
    const { url, directory, fileName } = request;
    const filePath = path.join(directory, fileName);

    this.logger.info({ url: redactQuery(url), filePath }, 'Downloading artifact');

    let response: StreamResponse;
    try {
      response = await this.httpClient.downloadToStream(url, {
        headers: { ...DOWNLOAD_HEADERS },
        timeout: this.timeout,
      });
    } catch (error) {
      throw new DownloadError(`Download of ${fileName} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      response.body.resume();
      throw new DownloadError(
        `Download of ${fileName} failed (HTTP ${response.statusCode})`,
        response.statusCode,
      );
    }

    // A failed download must leave an existing file of the same name intact
    const partPath = `${filePath}.${process.pid}.part`;

    try {
      await fs.mkdir(directory, { recursive: true });
      await pipeline(response.body, createWriteStream(partPath));
      await fs.rename(partPath, filePath);
      const { size } = await fs.stat(filePath);

      this.logger.info({ filePath, sizeBytes: size }, 'Artifact saved');
      return { filePath, sizeBytes: size };
    } catch (error) {
      response.body.destroy();
      await fs.rm(partPath, { force: true }).catch((rmError: unknown) =>
        this.logger.warn(
          { partPath, error: errorMessage(rmError) },
          'Could not remove partial download',
        ),
      );
      throw new DownloadError(`Writing ${filePath} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }
  }
}
