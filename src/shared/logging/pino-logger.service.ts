import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Level, Logger } from 'pino';
import type { AppConfig } from '../../config/configuration';

type LogFields = Record<string, unknown>;

/**
 * Pino-backed logger used both as Nest's application logger (use cases log
 * through `new Logger(Name)`) and directly by adapters for structured logs.
 */
@Injectable()
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    this.logger = pino({
      level: this.configService.get('logLevel', { infer: true }) || 'info',
      ...(nodeEnv === 'development' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname,service,env',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      // Wiki credentials travel in request headers
      redact: ['headers.authorization', '*.headers.authorization', 'apiToken', '*.apiToken'],
      base: {
        service: 'wiki-pdf-exporter',
        env: nodeEnv,
      },
    });
  }

  /**
   * Nest passes the logging context as the last optional parameter.
   */
  log(message: unknown, ...optionalParams: unknown[]): void {
    this.writeNest('info', message, optionalParams);
  }

  info(message: string): void;
  info(fields: LogFields, message: string): void;
  info(fieldsOrMessage: LogFields | string, message?: string): void {
    this.write('info', fieldsOrMessage, message);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    if (isFields(message)) {
      this.write('error', message, typeof optionalParams[0] === 'string' ? optionalParams[0] : '');
      return;
    }
    // Nest's Logger.error(message, stack, context)
    const [stack, context] = optionalParams;
    this.logger.error(
      {
        context: typeof context === 'string' ? context : this.context,
        ...(typeof stack === 'string' && { stack }),
      },
      String(message),
    );
  }

  warn(message: string): void;
  warn(fields: LogFields, message: string): void;
  warn(message: unknown, ...optionalParams: unknown[]): void;
  warn(message: unknown, ...optionalParams: unknown[]): void {
    if (isFields(message)) {
      this.write('warn', message, typeof optionalParams[0] === 'string' ? optionalParams[0] : '');
    } else {
      this.writeNest('warn', message, optionalParams);
    }
  }

  debug(message: string): void;
  debug(fields: LogFields, message: string): void;
  debug(message: unknown, ...optionalParams: unknown[]): void;
  debug(message: unknown, ...optionalParams: unknown[]): void {
    if (isFields(message)) {
      this.write('debug', message, typeof optionalParams[0] === 'string' ? optionalParams[0] : '');
    } else {
      this.writeNest('debug', message, optionalParams);
    }
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.writeNest('trace', message, optionalParams);
  }

  child(bindings: LogFields): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }

  /**
   * Logger whose context is fixed for its owner, leaving the shared
   * instance's context alone.
   */
  forContext(context: string): PinoLoggerService {
    const scoped = this.child({});
    scoped.context = context;
    return scoped;
  }

  withTaskId(taskId: string): PinoLoggerService {
    return this.child({ taskId });
  }

  private write(level: Level, fieldsOrMessage: LogFields | string, message?: string): void {
    if (typeof fieldsOrMessage === 'string') {
      this.logger[level]({ context: this.context }, fieldsOrMessage);
    } else {
      this.logger[level]({ ...fieldsOrMessage, context: this.context }, message ?? '');
    }
  }

  private writeNest(level: Level, message: unknown, optionalParams: unknown[]): void {
    const last = optionalParams[optionalParams.length - 1];
    const context = typeof last === 'string' ? last : this.context;
    this.logger[level]({ context }, String(message));
  }
}

function isFields(value: unknown): value is LogFields {
  return typeof value === 'object' && value !== null && !(value instanceof Error);
}
