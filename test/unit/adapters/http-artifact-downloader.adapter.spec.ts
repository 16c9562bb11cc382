import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { MockAgent, MockPool } from 'undici';
import { HttpArtifactDownloaderAdapter } from '../../../src/infrastructure/adapters/storage/http-artifact-downloader.adapter';
import { DownloadError } from '../../../src/domain/errors/export.errors';
import { HttpClientService } from '../../../src/shared/http/http-client.service';
import {
  STORAGE_ORIGIN,
  captureHeaders,
  createConfigService,
  createHttpClient,
  createMockAgent,
  createTestLogger,
} from '../helpers/mock-factories';

const OBJECT_PATH = '/exports/page.pdf?X-Amz-Signature=abc';
const PDF_BYTES = '%PDF-1.4 test';

describe('HttpArtifactDownloaderAdapter', () => {
  let mockAgent: MockAgent;
  let storage: MockPool;
  let httpClient: HttpClientService;
  let adapter: HttpArtifactDownloaderAdapter;
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wiki-pdf-download-'));
    mockAgent = createMockAgent();
    storage = mockAgent.get<MockPool>(STORAGE_ORIGIN);
    httpClient = createHttpClient(mockAgent);
    adapter = new HttpArtifactDownloaderAdapter(
      httpClient,
      createConfigService(),
      createTestLogger(),
    );
  });

  afterEach(async () => {
    await mockAgent.close();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should stream the object into a new directory', async () => {
    storage.intercept({ path: OBJECT_PATH, method: 'GET' }).reply(200, PDF_BYTES);
    const directory = path.join(workDir, 'exported', 'nested');

    const artifact = await adapter.download({
      url: `${STORAGE_ORIGIN}${OBJECT_PATH}`,
      directory,
      fileName: 'Page.pdf',
    });

    expect(artifact).toEqual({ filePath: path.join(directory, 'Page.pdf'), sizeBytes: 13 });
    await expect(fs.readFile(artifact.filePath, 'utf8')).resolves.toBe(PDF_BYTES);
  });

  it('should send no credentials to object storage', async () => {
    let seenHeaders: Record<string, string> = {};
    storage.intercept({ path: OBJECT_PATH, method: 'GET' }).reply((options) => {
      seenHeaders = captureHeaders(options.headers);
      return { statusCode: 200, data: PDF_BYTES };
    });

    await adapter.download({
      url: `${STORAGE_ORIGIN}${OBJECT_PATH}`,
      directory: workDir,
      fileName: 'Page.pdf',
    });

    expect(seenHeaders).toEqual({ accept: 'application/pdf, */*' });
  });

  it('should fail without writing a file when storage refuses the request', async () => {
    storage.intercept({ path: OBJECT_PATH, method: 'GET' }).reply(403, '<Error>AccessDenied</Error>');

    const download = adapter.download({
      url: `${STORAGE_ORIGIN}${OBJECT_PATH}`,
      directory: workDir,
      fileName: 'Page.pdf',
    });

    await expect(download).rejects.toBeInstanceOf(DownloadError);
    await expect(download).rejects.toMatchObject({
      statusCode: 403,
      message: 'Download of Page.pdf failed (HTTP 403)',
    });
    expect(existsSync(path.join(workDir, 'Page.pdf'))).toBe(false);
  });

  it('should fail without writing a file on a transport error', async () => {
    storage
      .intercept({ path: OBJECT_PATH, method: 'GET' })
      .replyWithError(new Error('connect ECONNREFUSED'));

    await expect(
      adapter.download({
        url: `${STORAGE_ORIGIN}${OBJECT_PATH}`,
        directory: workDir,
        fileName: 'Page.pdf',
      }),
    ).rejects.toMatchObject({
      summaryCause: 'download',
      message: 'Download of Page.pdf failed: connect ECONNREFUSED',
    });
    expect(existsSync(path.join(workDir, 'Page.pdf'))).toBe(false);
  });

  it('should report a directory that cannot be created', async () => {
    storage.intercept({ path: OBJECT_PATH, method: 'GET' }).reply(200, PDF_BYTES);
    const blocker = path.join(workDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const directory = path.join(blocker, 'sub');

    const download = adapter.download({
      url: `${STORAGE_ORIGIN}${OBJECT_PATH}`,
      directory,
      fileName: 'Page.pdf',
    });

    await expect(download).rejects.toBeInstanceOf(DownloadError);
    await expect(download).rejects.toThrow(`Writing ${path.join(directory, 'Page.pdf')} failed`);
  });

  it('should keep an earlier file with the same name when a later download breaks', async () => {
    async function* brokenBody() {
      yield Buffer.from('%PDF-1.4 partial');
      throw new Error('socket reset');
    }
    vi.spyOn(httpClient, 'downloadToStream')
      .mockResolvedValueOnce({ statusCode: 200, headers: {}, body: Readable.from([PDF_BYTES]) })
      .mockResolvedValueOnce({ statusCode: 200, headers: {}, body: Readable.from(brokenBody()) });
    const request = {
      url: `${STORAGE_ORIGIN}${OBJECT_PATH}`,
      directory: workDir,
      fileName: 'Home.pdf',
    };

    const first = await adapter.download(request);
    await expect(adapter.download(request)).rejects.toThrow(
      `Writing ${first.filePath} failed: socket reset`,
    );

    await expect(fs.readFile(first.filePath, 'utf8')).resolves.toBe(PDF_BYTES);
    expect(await fs.readdir(workDir)).toEqual(['Home.pdf']);
  });
});
