import type { ExportTaskEntity } from '../../../domain/entities/export-task.entity';

/**
 * Poll Export Task Command
 */
export interface PollExportTaskCommand {
  task: ExportTaskEntity;
  intervalMs: number;
  maxWaitMs: number;
}

/**
 * Poll Export Task Port (Driving Port / Use Case Interface)
 * Waits for an export task to reach `complete` or `failed`
 */
export interface PollExportTaskPort {
  /**
   * Resolves with the task in its terminal remote state.
   * @throws TaskTimeoutError when the maximum wait elapses first
   * @throws TaskPollError when a status request fails
   */
  execute(command: PollExportTaskCommand): Promise<ExportTaskEntity>;
}
