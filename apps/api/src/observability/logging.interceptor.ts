import { randomUUID } from 'node:crypto';

import { CallHandler, ExecutionContext, HttpException, Injectable, NestInterceptor } from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';

import { redactPII } from './redaction';
import { StructuredLoggerService } from './structured-logger.service';

function resolveRequestId(request: Request): string {
  const incoming = request.headers['x-request-id'];
  if (typeof incoming === 'string' && incoming.length > 0) return incoming;
  if (Array.isArray(incoming) && incoming.length > 0) return incoming[0];
  return randomUUID();
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor<unknown, unknown> {
  constructor(private readonly logger: StructuredLoggerService) {}

  intercept(context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const requestId = resolveRequestId(request);
    response.setHeader('X-Request-Id', requestId);
    const startedAt = Date.now();

    this.logger.log({
      event: 'request_received',
      requestId,
      path: request.originalUrl,
      method: request.method,
      body: redactPII(request.body)
    });

    return next.handle().pipe(
      tap((data) => {
        this.logger.log({
          event: 'request_completed',
          requestId,
          durationMs: Date.now() - startedAt,
          statusCode: response.statusCode,
          response: redactPII(data)
        });
      }),
      catchError((error: unknown) => {
        const entry = {
          event: 'request_failed',
          requestId,
          durationMs: Date.now() - startedAt,
          message: error instanceof Error ? error.message : 'Unhandled error'
        };

        // Structured engine errors surface as 4xx and are expected traffic.
        if (error instanceof HttpException && error.getStatus() < 500) {
          this.logger.warn({ ...entry, statusCode: error.getStatus(), response: redactPII(error.getResponse()) });
        } else {
          this.logger.error(entry, error instanceof Error ? error.stack : undefined);
        }
        throw error;
      })
    );
  }
}
