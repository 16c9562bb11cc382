import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

/**
 * Reads `.env` (when present) into the environment and validates it once at
 * startup. A missing credential makes context creation fail with a
 * ConfigurationError before any page is touched.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [configuration],
      cache: true,
    }),
  ],
})
export class ConfigModule {}
