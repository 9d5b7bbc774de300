import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { LoggerService } from '@/shared/logger/logger.service';
import { GameError } from '../errors/game.errors';

const GAME_ERROR_STATUS: Record<GameError['code'], HttpStatus> = {
  ALREADY_QUEUED: HttpStatus.CONFLICT,
  DUPLICATE_PARTICIPANT: HttpStatus.CONFLICT,
  UNKNOWN_MATCH: HttpStatus.NOT_FOUND,
  UNKNOWN_SESSION: HttpStatus.NOT_FOUND,
  DELIVERY_FAILED: HttpStatus.BAD_GATEWAY,
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | string[] = 'Internal server error';

    if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      const body = exception.getResponse();
      message =
        typeof body === 'object' &&
        body !== null &&
        'message' in body &&
        (typeof body.message === 'string' || Array.isArray(body.message))
          ? body.message
          : exception.message;
    } else if (exception instanceof GameError) {
      statusCode = GAME_ERROR_STATUS[exception.code];
      message = exception.message;
    } else {
      this.logger.error(
        `Unhandled error on ${request.method} ${request.url}`,
        exception instanceof Error ? exception.stack : String(exception),
        'HttpExceptionFilter',
      );
    }

    response.status(statusCode).json({
      success: false,
      statusCode,
      message,
      path: request.url,
      timestamp: new Date().toISOString(),
    });
  }
}
