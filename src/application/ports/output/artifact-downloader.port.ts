/**
 * Download Artifact Request
 */
export interface DownloadArtifactRequest {
  url: string;
  directory: string;
  fileName: string;
}

/**
 * Downloaded Artifact
 */
export interface DownloadedArtifact {
  filePath: string;
  sizeBytes: number;
}

/**
 * Artifact Downloader Port (Driven Port)
 * Fetches a presigned object-storage URL into local storage. Implementations
 * must not send the wiki credentials.
 */
export interface ArtifactDownloaderPort {
  /**
   * @throws DownloadError
   */
  download(request: DownloadArtifactRequest): Promise<DownloadedArtifact>;
}
