/**
 * Injection tokens for the output ports. Adapters are bound to these in
 * InfrastructureModule; use cases depend only on the port interfaces.
 */
export const EXPORT_API_PORT = 'ExportApiPort';
export const ARTIFACT_DOWNLOADER_PORT = 'ArtifactDownloaderPort';
export const PAGE_SOURCE_PORT = 'PageSourcePort';
