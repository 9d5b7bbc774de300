import {
  Injectable,
  LoggerService as NestLoggerService,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import * as winston from 'winston';

type Level = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const line = winston.format.printf(
  ({ level, message, timestamp, context, stack }) =>
    `${timestamp} ${level} ${context ? `[${context}] ` : ''}${message}${
      stack ? `\n${stack}` : ''
    }`,
);

/**
 * Application logger. Implements Nest's LoggerService so it can replace the
 * framework logger (`app.useLogger`) and be injected anywhere.
 */
@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logger: winston.Logger;

  constructor(@Optional() configService?: ConfigService) {
    const nodeEnv =
      configService?.get<string>('app.nodeEnv') ?? process.env.NODE_ENV;
    const level =
      configService?.get<string>('app.logLevel') ??
      process.env.LOG_LEVEL ??
      'debug';
    const logDir =
      configService?.get<string>('app.logDir') ?? process.env.LOG_DIR ?? 'logs';

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(winston.format.colorize(), line),
      }),
    ];

    if (nodeEnv !== 'test') {
      transports.push(
        new winston.transports.File({
          filename: path.join(logDir, 'error.log'),
          level: 'error',
        }),
        new winston.transports.File({
          filename: path.join(logDir, 'combined.log'),
        }),
      );
    }

    this.logger = winston.createLogger({
      level,
      silent: nodeEnv === 'test',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
      transports,
    });
  }

  log(message: unknown, context?: string) {
    this.write('info', message, { context });
  }

  error(message: unknown, trace?: unknown, context?: string) {
    this.write('error', message, {
      context,
      stack: trace instanceof Error ? trace.stack : trace,
    });
  }

  warn(message: unknown, context?: string) {
    this.write('warn', message, { context });
  }

  debug(message: unknown, context?: string) {
    this.write('debug', message, { context });
  }

  verbose(message: unknown, context?: string) {
    this.write('verbose', message, { context });
  }

  private write(
    level: Level,
    message: unknown,
    meta: { context?: string; stack?: unknown },
  ) {
    if (message instanceof Error) {
      this.logger.log(level, message.message, {
        ...meta,
        stack: meta.stack ?? message.stack,
      });
      return;
    }

    const text =
      typeof message === 'string' ? message : JSON.stringify(message);
    this.logger.log(level, text, meta);
  }
}
