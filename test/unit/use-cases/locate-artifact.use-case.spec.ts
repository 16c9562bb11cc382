import { describe, it, expect, beforeEach } from 'vitest';
import {
  LocateArtifactUseCase,
  normalizeArtifactUrl,
} from '../../../src/application/use-cases/locate-artifact.use-case';
import {
  ExportTaskEntity,
  TaskStatusSnapshot,
} from '../../../src/domain/entities/export-task.entity';
import { ArtifactNotFoundError } from '../../../src/domain/errors/export.errors';
import { InMemoryExportApiAdapter, completedStatus, runningStatus } from '../../in-memory-adapters';

describe('LocateArtifactUseCase', () => {
  let exportApi: InMemoryExportApiAdapter;
  let useCase: LocateArtifactUseCase;

  const taskWith = (snapshot: TaskStatusSnapshot) =>
    ExportTaskEntity.applySnapshot(
      ExportTaskEntity.create({ taskId: 'task-1', pageId: '100' }),
      snapshot,
    );

  beforeEach(() => {
    exportApi = new InMemoryExportApiAdapter();
    useCase = new LocateArtifactUseCase(exportApi);
  });

  it('should resolve the download link of a completed task', async () => {
    exportApi.configureExport('100', {
      taskId: 'task-1',
      artifactUrl: 'https://bucket.s3.example.com/exports/page.pdf?X-Amz-Signature=abc',
    });

    const url = await useCase.execute(taskWith(completedStatus('/wiki/download/results/task-1')));

    expect(url).toBe('https://bucket.s3.example.com/exports/page.pdf?X-Amz-Signature=abc');
    expect(exportApi.artifactLookups).toEqual([
      { taskId: 'task-1', resultLocation: '/wiki/download/results/task-1' },
    ]);
  });

  it('should percent-encode characters that are not valid in a request target', async () => {
    exportApi.configureExport('100', {
      taskId: 'task-1',
      artifactUrl: ' https://bucket.s3.example.com/exports/release notes.pdf ',
    });

    const url = await useCase.execute(taskWith(completedStatus('/r')));

    expect(url).toBe('https://bucket.s3.example.com/exports/release%20notes.pdf');
  });

  it('should fail for a task that has not completed', async () => {
    await expect(useCase.execute(taskWith(runningStatus(40)))).rejects.toMatchObject({
      message: 'No download link for task task-1: task is running, not complete',
    });
    expect(exportApi.artifactLookups).toHaveLength(0);
  });

  it('should fail for a completed task without a result location', async () => {
    const error = useCase.execute(taskWith(completedStatus()));

    await expect(error).rejects.toBeInstanceOf(ArtifactNotFoundError);
    await expect(error).rejects.toMatchObject({
      message: 'No download link for task task-1: completed task has no result location',
    });
    expect(exportApi.artifactLookups).toHaveLength(0);
  });

  it('should fail when the result contains no link', async () => {
    exportApi.configureExport('100', { taskId: 'task-1' });

    await expect(useCase.execute(taskWith(completedStatus('/r')))).rejects.toMatchObject({
      summaryCause: 'artifact not found',
      message: 'No download link for task task-1: task result contains no download link',
    });
  });

  describe('normalizeArtifactUrl', () => {
    it('should reject a link that is not a URL', () => {
      expect(() => normalizeArtifactUrl('task-1', 'exports/page.pdf')).toThrow(
        'No download link for task task-1: "exports/page.pdf" is not a valid URL',
      );
    });

    it('should reject links that are not http(s)', () => {
      expect(() => normalizeArtifactUrl('task-1', 'ftp://files.example.com/page.pdf')).toThrow(
        'No download link for task task-1: unsupported link protocol ftp:',
      );
    });
  });
});
