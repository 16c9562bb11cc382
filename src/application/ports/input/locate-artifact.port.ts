import type { ExportTaskEntity } from '../../../domain/entities/export-task.entity';

/**
 * Locate Artifact Port (Driving Port / Use Case Interface)
 * Turns a completed task into the presigned URL of its PDF
 */
export interface LocateArtifactPort {
  /**
   * @throws ArtifactNotFoundError
   */
  execute(task: ExportTaskEntity): Promise<string>;
}
