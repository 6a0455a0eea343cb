import { Injectable, Logger, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { NextFunction, Request, Response } from 'express';

export const CORRELATION_ID_HEADER = 'x-correlation-id';
export const TRACE_ID_HEADER = 'x-trace-id';

const SAFE_ID = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Echoes a caller-supplied `X-Correlation-ID` (or mints one) and logs one
 * line per finished request.
 */
@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  use(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.header(CORRELATION_ID_HEADER);
    const correlationId =
      incoming && SAFE_ID.test(incoming) ? incoming : randomUUID();
    const startedAt = Date.now();

    res.setHeader(CORRELATION_ID_HEADER, correlationId);
    res.on('finish', () => {
      this.logger.log(
        `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms correlationId=${correlationId}`
      );
    });

    next();
  }
}
