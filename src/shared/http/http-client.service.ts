import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { Dispatcher } from 'undici';
import { Readable } from 'stream';
import { PinoLoggerService } from '../logging/pino-logger.service';

export const HTTP_DISPATCHER = 'HttpDispatcher';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer;
  timeout?: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

export interface StreamResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: Readable;
}

/**
 * Thin wrapper over one process-wide undici dispatcher. Requests are never
 * retried here; callers decide what a failed status means.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly defaultTimeout = 30000;
  private readonly logger: PinoLoggerService;

  constructor(
    logger: PinoLoggerService,
    @Inject(HTTP_DISPATCHER) private readonly dispatcher: Dispatcher,
  ) {
    this.logger = logger.forContext(HttpClientService.name);
  }

  /**
   * Sends a request and buffers the response body as text.
   */
  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await this.dispatch(url, options);
    const body = await response.body.text();

    this.logger.debug(
      { url: redactQuery(url), statusCode: response.statusCode, bytes: body.length },
      'HTTP response received',
    );

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body,
    };
  }

  /**
   * Sends a request and hands the unread body to the caller, who must consume
   * or discard it.
   */
  async requestStream(url: string, options: HttpRequestOptions = {}): Promise<StreamResponse> {
    const response = await this.dispatch(url, options);

    this.logger.debug(
      { url: redactQuery(url), statusCode: response.statusCode },
      'HTTP stream opened',
    );

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
    };
  }

  async get(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async downloadToStream(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<StreamResponse> {
    return this.requestStream(url, { ...options, method: 'GET' });
  }

  private async dispatch(
    url: string,
    options: HttpRequestOptions,
  ): Promise<Dispatcher.ResponseData> {
    const parsedUrl = new URL(url);
    const timeout = options.timeout ?? this.defaultTimeout;

    return this.dispatcher.request({
      origin: parsedUrl.origin,
      path: parsedUrl.pathname + parsedUrl.search,
      method: options.method || 'GET',
      headers: options.headers,
      body: options.body,
      headersTimeout: timeout,
      bodyTimeout: timeout,
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }
}

/**
 * Presigned URLs carry their signature in the query string; keep it out of logs.
 */
export function redactQuery(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : `${url.slice(0, queryStart)}?…`;
}
