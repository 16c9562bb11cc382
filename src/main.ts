#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import type { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { ExportBatchUseCase } from './application/use-cases/export-batch.use-case';
import { renderSummaryTable } from './application/services/summary-table';
import { ConfigurationError } from './domain/errors/export.errors';

/**
 * Runs one batch export: reads the page list, exports every page in order,
 * prints the summary table and exits 0 only when every page succeeded.
 */
async function bootstrap(): Promise<number> {
  // abortOnError off so a ConfigurationError reaches the handler below
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });

  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const appLogger = app.get(PinoLoggerService);
  const logger = appLogger.forContext('Bootstrap');

  app.useLogger(appLogger);
  app.enableShutdownHooks();

  const exportConfig = configService.get('export', { infer: true });
  logger.info(
    {
      baseUrl: configService.get('confluence', { infer: true }).baseUrl,
      pagesFile: exportConfig.pagesFile,
      outputDir: exportConfig.outputDir,
      pollIntervalMs: exportConfig.pollIntervalMs,
      maxWaitMs: exportConfig.maxWaitMs,
    },
    'Wiki PDF export started',
  );

  try {
    const report = await app.get(ExportBatchUseCase).execute({
      pagesFile: exportConfig.pagesFile,
      outputDir: exportConfig.outputDir,
    });

    process.stdout.write(`\n${renderSummaryTable(report.results)}\n`);
    return report.failed > 0 ? 1 : 0;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error('Wiki PDF export failed:', error);
    }
    process.exitCode = 1;
  });
