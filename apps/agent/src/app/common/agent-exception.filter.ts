import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger
} from '@nestjs/common';
import { Response } from 'express';

import {
  AdmissionRejectedError,
  AgentCoreError,
  AgentErrorCode
} from './agent.errors';

const STATUS_BY_CODE: Record<AgentErrorCode, HttpStatus> = {
  VALIDATION_FAILED: HttpStatus.BAD_REQUEST,
  ADMISSION_REJECTED: HttpStatus.TOO_MANY_REQUESTS,
  THREAD_ACCESS_DENIED: HttpStatus.FORBIDDEN,
  THREAD_BUSY: HttpStatus.CONFLICT,
  NODE_FAILURE: HttpStatus.INTERNAL_SERVER_ERROR,
  STORE_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  CHECKPOINT_CONFLICT: HttpStatus.CONFLICT,
  JUDGE_FAILURE: HttpStatus.INTERNAL_SERVER_ERROR
};

@Catch()
export class AgentExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AgentExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    const message =
      exception instanceof Error ? exception.message : String(exception);

    if (exception instanceof AdmissionRejectedError) {
      response.setHeader('Retry-After', String(exception.retryAfterSeconds));
      response.status(HttpStatus.TOO_MANY_REQUESTS).json({
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        error: 'rate_limited',
        message,
        retryAfter: exception.retryAfterSeconds
      });
      return;
    }

    if (exception instanceof AgentCoreError) {
      const status = STATUS_BY_CODE[exception.code];
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`${exception.code}: ${message}`);
      } else {
        this.logger.warn(`${exception.code}: ${message}`);
      }
      response.status(status).json({
        statusCode: status,
        error: exception.code.toLowerCase(),
        message
      });
      return;
    }

    // Auth errors raised by extractUserId() outside the guard
    const isAuthError =
      /^(Authorization header|Malformed JWT|Bearer token)/i.test(message);

    if (isAuthError) {
      this.logger.warn(`Auth error: ${message}`);
      response.status(HttpStatus.UNAUTHORIZED).json({
        statusCode: 401,
        message: 'Authentication required'
      });
      return;
    }

    // Pass through NestJS HttpExceptions (validation errors, 404s, etc.)
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      response.status(status).json(body);
      return;
    }

    // Unexpected errors. Never re-throw from a @Catch() filter
    this.logger.error(
      `Unhandled error: ${message}`,
      exception instanceof Error ? exception.stack : undefined
    );
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: 500,
      message: 'Internal server error'
    });
  }
}
