import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { createLogger } from '../utils/logger';
import {
  BACKEND_ERROR_MESSAGE,
  INVALID_PAYLOAD_MESSAGE,
  INVALID_SIGNATURE_MESSAGE,
} from '../constants/error-messages.constants';

export interface ErrorResponseBody {
  error: string;
  requestId?: string;
}

/**
 * Every failure leaves as `{ error, requestId }`. Server-side failures never expose their
 * message; Slack only needs the status to decide whether to retry.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = createLogger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const body: ErrorResponseBody = {
      error: resolveClientMessage(exception, status),
      requestId: request.requestId,
    };

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        'unhandled_exception',
        exception instanceof Error ? exception : undefined,
        {
          event: 'unhandled_exception',
          method: request.method,
          path: request.path,
          status,
          request_id: request.requestId,
          retry_num: request.slackRetryNum ?? null,
        },
      );
    } else {
      this.logger.http('request_rejected', {
        event: 'request_rejected',
        method: request.method,
        path: request.path,
        status,
        request_id: request.requestId,
      });
    }

    response.status(status).json(body);
  }
}

function resolveClientMessage(exception: unknown, status: number): string {
  if (!(exception instanceof HttpException) || status >= HttpStatus.INTERNAL_SERVER_ERROR) {
    return BACKEND_ERROR_MESSAGE;
  }

  const payload = exception.getResponse();
  if (typeof payload === 'string') {
    return payload;
  }

  if (
    typeof payload === 'object' &&
    payload !== null &&
    'message' in payload &&
    typeof payload.message === 'string'
  ) {
    return payload.message;
  }

  return status === HttpStatus.UNAUTHORIZED ? INVALID_SIGNATURE_MESSAGE : INVALID_PAYLOAD_MESSAGE;
}
