/**
 * Use Cases Barrel Export
 */
export { PollExportTaskUseCase } from './poll-export-task.use-case';
export { LocateArtifactUseCase } from './locate-artifact.use-case';
export { ExportPageUseCase } from './export-page.use-case';
export { ExportBatchUseCase } from './export-batch.use-case';
