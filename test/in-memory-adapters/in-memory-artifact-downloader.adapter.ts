import { Injectable } from '@nestjs/common';
import * as path from 'path';
import {
  ArtifactDownloaderPort,
  DownloadArtifactRequest,
  DownloadedArtifact,
} from '../../src/application/ports/output/artifact-downloader.port';

/**
 * In-Memory Artifact Downloader Adapter
 * Records download requests instead of touching the network or disk
 */
@Injectable()
export class InMemoryArtifactDownloaderAdapter implements ArtifactDownloaderPort {
  private readonly downloads: DownloadArtifactRequest[] = [];
  private failure?: Error;

  constructor(private readonly sizeBytes = 1024) {}

  async download(request: DownloadArtifactRequest): Promise<DownloadedArtifact> {
    this.downloads.push({ ...request });

    if (this.failure) {
      throw this.failure;
    }

    return {
      filePath: path.join(request.directory, request.fileName),
      sizeBytes: this.sizeBytes,
    };
  }

  failWith(error: Error): void {
    this.failure = error;
  }

  get requests(): readonly DownloadArtifactRequest[] {
    return this.downloads;
  }
}
