import type { ExportTaskEntity, TaskStatusSnapshot } from '../../../domain/entities/export-task.entity';
import type { PageReference } from '../../../domain/value-objects/page-reference.vo';

/**
 * Export API Port (Driven Port)
 * The wiki's PDF export add-on and its task endpoints
 */
export interface ExportApiPort {
  /**
   * Starts a PDF export of one page.
   * @throws ExportRequestError
   */
  requestPdfExport(page: PageReference): Promise<ExportTaskEntity>;

  /**
   * Reads the current remote state of a task.
   * @throws TaskPollError
   */
  getTaskStatus(taskId: string): Promise<TaskStatusSnapshot>;

  /**
   * Follows a completed task's result location to the presigned download link.
   * Resolves to `undefined` when the result carries no link.
   * @throws ArtifactNotFoundError when the result cannot be read
   */
  findArtifactUrl(taskId: string, resultLocation: string): Promise<string | undefined>;
}
