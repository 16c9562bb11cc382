import { Global, Module } from '@nestjs/common';
import { PinoLoggerService } from './pino-logger.service';

/**
 * Provides the pino-backed logger to every module. ConfigModule is global,
 * so the logger picks up LOG_LEVEL and NODE_ENV without importing it here.
 */
@Global()
@Module({
  providers: [PinoLoggerService],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
