import { JSDOM } from 'jsdom';
import { z } from 'zod';
import type { TaskStatusSnapshot } from '../../../domain/entities/export-task.entity';

export const TASK_ID_META_NAME = 'ajs-taskId';

const LINK_FIELDS = ['url', 'downloadUrl', 'location', 'href'] as const;
const FAILED_STATES = new Set(['FAILED', 'ERROR', 'CANCELLED', 'CANCELED']);
const ABSOLUTE_HTTP_URL = /^https?:\/\/\S+$/i;

/**
 * Body of `GET /wiki/services/api/v1/task/{taskId}/progress`
 */
export const taskProgressSchema = z.object({
  progress: z.number().default(0),
  state: z.string().nullish(),
  result: z.string().nullish(),
  message: z.string().nullish(),
});

export type TaskProgressResponse = z.infer<typeof taskProgressSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function tryParseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

function withDocument<T>(html: string, read: (document: Document) => T): T {
  const { window } = new JSDOM(html);
  try {
    return read(window.document);
  } finally {
    window.close();
  }
}

/**
 * Reads the task id from the export action's response: the `ajs-taskId`
 * meta tag of the HTML page, or a `taskId` field when the body is JSON.
 */
export function extractTaskId(body: string): string | undefined {
  const text = body.trim();
  if (text.length === 0) {
    return undefined;
  }

  const json = tryParseJson(text);
  if (isRecord(json)) {
    const taskId = json['taskId'];
    if (typeof taskId === 'string' || typeof taskId === 'number') {
      return String(taskId).trim() || undefined;
    }
    return undefined;
  }

  return withDocument(text, (document) => {
    const content = document
      .querySelector(`meta[name="${TASK_ID_META_NAME}"]`)
      ?.getAttribute('content')
      ?.trim();
    return content || undefined;
  });
}

export function toTaskSnapshot(response: TaskProgressResponse): TaskStatusSnapshot {
  const state = response.state?.trim() ?? '';
  const status: TaskStatusSnapshot['status'] = FAILED_STATES.has(state.toUpperCase())
    ? 'failed'
    : response.progress >= 100
      ? 'complete'
      : response.progress > 0
        ? 'running'
        : 'pending';

  return {
    status,
    progress: response.progress,
    resultLocation: response.result?.trim() || undefined,
    message: response.message?.trim() || state || undefined,
  };
}

/**
 * Pulls the download link out of a task result body. Accepted forms, in
 * order: a JSON string, a JSON object with a link field, a bare (possibly
 * quoted) URL, an HTML document with an absolute anchor.
 */
export function extractArtifactLink(body: string): string | undefined {
  const text = body.trim();
  if (text.length === 0) {
    return undefined;
  }

  const json = tryParseJson(text);
  if (typeof json === 'string') {
    return json.trim() || undefined;
  }
  if (isRecord(json)) {
    for (const field of LINK_FIELDS) {
      const value = json[field];
      if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
      }
    }
    return undefined;
  }

  const unquoted = text.replace(/^["']+|["']+$/g, '');
  if (ABSOLUTE_HTTP_URL.test(unquoted)) {
    return unquoted;
  }

  if (text.startsWith('<')) {
    return withDocument(text, (document) => {
      for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
        const href = anchor.getAttribute('href')?.trim();
        if (href && ABSOLUTE_HTTP_URL.test(href)) {
          return href;
        }
      }
      return undefined;
    });
  }

  return undefined;
}
