import { Inject, Injectable, Logger } from '@nestjs/common';
import { LocateArtifactPort } from '../ports/input/locate-artifact.port';
import type { ExportApiPort } from '../ports/output/export-api.port';
import { EXPORT_API_PORT } from '../ports/tokens';
import { ExportTaskEntity } from '../../domain/entities/export-task.entity';
import { ArtifactNotFoundError } from '../../domain/errors/export.errors';

/**
 * Locate Artifact Use Case
 * Resolves the presigned object-storage URL of a completed export
 */
@Injectable()
export class LocateArtifactUseCase implements LocateArtifactPort {
  private readonly logger = new Logger(LocateArtifactUseCase.name);

  constructor(@Inject(EXPORT_API_PORT) private readonly exportApi: ExportApiPort) {}

  async execute(task: ExportTaskEntity): Promise<string> {
    if (!ExportTaskEntity.isComplete(task)) {
      throw new ArtifactNotFoundError(task.taskId, `task is ${task.status}, not complete`);
    }
    if (!task.resultLocation) {
      throw new ArtifactNotFoundError(task.taskId, 'completed task has no result location');
    }

    const link = await this.exportApi.findArtifactUrl(task.taskId, task.resultLocation);
    if (!link) {
      throw new ArtifactNotFoundError(task.taskId, 'task result contains no download link');
    }

    const artifactUrl = normalizeArtifactUrl(task.taskId, link);
    this.logger.debug(`Task ${task.taskId} artifact located at ${new URL(artifactUrl).host}`);
    return artifactUrl;
  }
}

/**
 * Parses the link and re-serializes it, which percent-encodes characters
 * such as spaces that are not valid in a request target.
 */
export function normalizeArtifactUrl(taskId: string, link: string): string {
  let parsed: URL;
  try {
    parsed = new URL(link.trim());
  } catch (error) {
    throw new ArtifactNotFoundError(taskId, `"${link}" is not a valid URL`, { cause: error });
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new ArtifactNotFoundError(taskId, `unsupported link protocol ${parsed.protocol}`);
  }

  return parsed.toString();
}
