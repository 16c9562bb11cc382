import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import {
  PollExportTaskUseCase,
  LocateArtifactUseCase,
  ExportPageUseCase,
  ExportBatchUseCase,
} from './use-cases';

/**
 * Application Module
 *
 * Use cases depend on output ports only; InfrastructureModule supplies the
 * adapters behind the port tokens.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    PollExportTaskUseCase,
    LocateArtifactUseCase,
    ExportPageUseCase,
    ExportBatchUseCase,
  ],
  exports: [ExportBatchUseCase],
})
export class ApplicationModule {}
