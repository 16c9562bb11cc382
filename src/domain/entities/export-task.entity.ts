import { freeze, produce } from 'immer';

/**
 * Export Task Entity - the add-on's asynchronous job for one page export
 *
 * Status Transitions:
 * pending → running → complete (success path)
 * pending → running → failed (error path)
 * pending → complete | failed (fast exports skip running)
 *
 * A task is never edited locally: every change comes from a freshly fetched
 * remote status and yields a new frozen instance.
 */
export type ExportTaskStatus = 'pending' | 'running' | 'complete' | 'failed';

export interface ExportTaskEntity {
  readonly taskId: string;
  readonly pageId: string;
  readonly status: ExportTaskStatus;
  readonly progress: number;
  readonly resultLocation?: string;
  readonly message?: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Snapshot of the remote task as reported by the status endpoint
 */
export interface TaskStatusSnapshot {
  status: ExportTaskStatus;
  progress: number;
  resultLocation?: string;
  message?: string;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ExportTaskEntity {
  const TERMINAL_STATUSES: ReadonlyArray<ExportTaskStatus> = ['complete', 'failed'];

  export interface CreateProps {
    taskId: string;
    pageId: string;
    createdAt?: Date;
  }

  export function create(props: CreateProps): ExportTaskEntity {
    if (!props.taskId || props.taskId.trim().length === 0) {
      throw new Error('Task ID is required');
    }
    if (!props.pageId || props.pageId.trim().length === 0) {
      throw new Error('Page ID is required');
    }

    const createdAt = props.createdAt ?? new Date();
    return freeze<ExportTaskEntity>(
      {
        taskId: props.taskId.trim(),
        pageId: props.pageId,
        status: 'pending',
        progress: 0,
        createdAt,
        updatedAt: createdAt,
      },
      true,
    );
  }

  export function isTerminal(task: ExportTaskEntity): boolean {
    return TERMINAL_STATUSES.includes(task.status);
  }

  export function isComplete(task: ExportTaskEntity): boolean {
    return task.status === 'complete';
  }

  export function isFailed(task: ExportTaskEntity): boolean {
    return task.status === 'failed';
  }

  /**
   * Applies a remote status snapshot. A terminal task no longer changes.
   */
  export function applySnapshot(
    task: ExportTaskEntity,
    snapshot: TaskStatusSnapshot,
  ): ExportTaskEntity {
    if (isTerminal(task)) {
      throw new Error(`Task ${task.taskId} is already ${task.status}`);
    }

    return produce(task, (draft) => {
      draft.status = snapshot.status;
      draft.progress = Math.min(100, Math.max(0, snapshot.progress));
      draft.resultLocation = snapshot.resultLocation;
      draft.message = snapshot.message;
      draft.updatedAt = new Date();
    });
  }

  export function toJSON(task: ExportTaskEntity) {
    return {
      taskId: task.taskId,
      pageId: task.pageId,
      status: task.status,
      progress: task.progress,
      resultLocation: task.resultLocation,
      message: task.message,
      createdAt: task.createdAt.toISOString(),
      updatedAt: task.updatedAt.toISOString(),
    };
  }
}
