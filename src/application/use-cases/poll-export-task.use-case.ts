import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  PollExportTaskCommand,
  PollExportTaskPort,
} from '../ports/input/poll-export-task.port';
import type { ExportApiPort } from '../ports/output/export-api.port';
import { EXPORT_API_PORT } from '../ports/tokens';
import {
  ExportTaskEntity,
  TaskStatusSnapshot,
} from '../../domain/entities/export-task.entity';
import {
  TaskPollError,
  TaskTimeoutError,
  errorMessage,
} from '../../domain/errors/export.errors';

/**
 * Poll Export Task Use Case
 * Re-queries the task status at a fixed interval until the remote side
 * reports `complete` or `failed`, or the maximum wait has elapsed.
 */
@Injectable()
export class PollExportTaskUseCase implements PollExportTaskPort {
  private readonly logger = new Logger(PollExportTaskUseCase.name);

  constructor(@Inject(EXPORT_API_PORT) private readonly exportApi: ExportApiPort) {}

  async execute(command: PollExportTaskCommand): Promise<ExportTaskEntity> {
    const { intervalMs, maxWaitMs } = command;
    if (intervalMs <= 0 || maxWaitMs <= 0) {
      throw new RangeError('Poll interval and maximum wait must be positive');
    }

    let task = command.task;
    if (ExportTaskEntity.isTerminal(task)) {
      return task;
    }

    const deadline = Date.now() + maxWaitMs;
    let attempts = 0;

    while (true) {
      attempts++;
      task = ExportTaskEntity.applySnapshot(task, await this.fetchStatus(task.taskId));

      this.logger.log(`Task ${task.taskId}: ${task.progress}% complete (${task.status})`);

      if (ExportTaskEntity.isTerminal(task)) {
        this.logger.debug(
          `Task ${task.taskId} reached ${task.status} after ${attempts} poll(s): ` +
            JSON.stringify(ExportTaskEntity.toJSON(task)),
        );
        return task;
      }

      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        this.logger.warn(`Task ${task.taskId} still ${task.status} after ${maxWaitMs}ms`);
        throw new TaskTimeoutError(task.taskId, maxWaitMs);
      }

      await this.delay(Math.min(intervalMs, remainingMs));
    }
  }

  private async fetchStatus(taskId: string): Promise<TaskStatusSnapshot> {
    try {
      return await this.exportApi.getTaskStatus(taskId);
    } catch (error) {
      if (error instanceof TaskPollError) {
        throw error;
      }
      throw new TaskPollError(taskId, errorMessage(error), { cause: error });
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
