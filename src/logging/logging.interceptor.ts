import {
  Injectable,
  Inject,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import type { Request, Response } from 'express';
import { errorMessage } from '../common/result';
import { LoggerService, type LogContext } from './logger.service';

export const CORRELATION_HEADER = 'X-Correlation-ID';

const INBOUND_ID_HEADERS = ['x-request-id', 'x-correlation-id'] as const;

/**
 * First inbound request id, or a fresh UUID
 */
export function resolveCorrelationId(
  headers: IncomingHttpHeaders,
  generate: () => string = randomUUID,
): string {
  for (const name of INBOUND_ID_HEADERS) {
    const raw = headers[name];
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (value) {
      return value;
    }
  }
  return generate();
}

/**
 * Template name and recipient count, when the request carries them.
 * Context values and addresses are never logged.
 */
export function describeMailRequest(request: Pick<Request, 'query' | 'body'>): LogContext {
  const summary: LogContext = {};
  const body: unknown = request.body;
  const templateFromQuery = request.query?.template_name;

  if (typeof templateFromQuery === 'string') {
    summary.template = templateFromQuery;
  } else if (isRecord(body) && typeof body.template_name === 'string') {
    summary.template = body.template_name;
  }

  if (isRecord(body) && Array.isArray(body.recipients)) {
    summary.recipientCount = body.recipients.length;
  }

  return summary;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger: LoggerService;

  constructor(@Inject(LoggerService) logger: LoggerService) {
    this.logger = logger.child('HTTP');
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const correlationId = resolveCorrelationId(request.headers);
    response.setHeader(CORRELATION_HEADER, correlationId);

    const logger = this.logger.withCorrelationId(correlationId);
    const route = { method: request.method, url: request.originalUrl ?? request.url };
    const startTime = Date.now();

    logger.debug('Incoming request', {
      ...route,
      ...describeMailRequest(request),
      ip: request.ip,
      userAgent: request.get('user-agent') ?? '',
    });

    return next.handle().pipe(
      tap({
        next: () => {
          logger.info('Request completed', {
            ...route,
            statusCode: response.statusCode,
            duration: Date.now() - startTime,
          });
        },
        error: (error: unknown) => {
          // The exception filter has not written the status yet
          const statusCode = error instanceof HttpException ? error.getStatus() : 500;
          const fields = { ...route, statusCode, duration: Date.now() - startTime };

          if (statusCode >= 500) {
            logger.error('Request failed', error, fields);
          } else {
            logger.warn('Request rejected', { ...fields, reason: errorMessage(error) });
          }
        },
      }),
    );
  }
}
