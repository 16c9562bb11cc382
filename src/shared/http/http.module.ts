import { Module } from '@nestjs/common';
import { Agent } from 'undici';
import { HTTP_DISPATCHER, HttpClientService } from './http-client.service';

/**
 * One keep-alive connection pool for the whole run. Wiki calls and presigned
 * downloads share it; it holds no per-page state.
 */
@Module({
  providers: [
    {
      provide: HTTP_DISPATCHER,
      useFactory: () =>
        new Agent({
          connections: 10,
          pipelining: 1,
          keepAliveTimeout: 30000,
          keepAliveMaxTimeout: 60000,
        }),
    },
    HttpClientService,
  ],
  exports: [HttpClientService],
})
export class HttpModule {}
