import { Module } from '@nestjs/common';
import { SharedModule } from '../shared/shared.module';
import {
  ARTIFACT_DOWNLOADER_PORT,
  EXPORT_API_PORT,
  PAGE_SOURCE_PORT,
} from '../application/ports/tokens';

// Adapters (implementations)
import { ConfluenceExportApiAdapter } from './adapters/confluence/confluence-export-api.adapter';
import { HttpArtifactDownloaderAdapter } from './adapters/storage/http-artifact-downloader.adapter';
import { FilePageSourceAdapter } from './adapters/page-source/file-page-source.adapter';

/**
 * Infrastructure Module
 * Binds every output port token to its adapter
 */
@Module({
  imports: [SharedModule],
  providers: [
    {
      provide: EXPORT_API_PORT,
      useClass: ConfluenceExportApiAdapter,
    },
    {
      provide: ARTIFACT_DOWNLOADER_PORT,
      useClass: HttpArtifactDownloaderAdapter,
    },
    {
      provide: PAGE_SOURCE_PORT,
      useClass: FilePageSourceAdapter,
    },
  ],
  exports: [EXPORT_API_PORT, ARTIFACT_DOWNLOADER_PORT, PAGE_SOURCE_PORT],
})
export class InfrastructureModule {}
