import { Response, Request } from 'express';
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { loggerInstance } from '../logger/logger';
import { setFlash } from '../helpers/flash-helper';
import { backUrl, isAjaxRequest, isRecord } from '../helpers/request';
import { isDomainError } from 'src/errors/domain-error.base';

export function resolveStatus(exception: unknown): number {
  if (exception instanceof HttpException) return exception.getStatus();
  if (isDomainError(exception)) return HttpStatus.BAD_REQUEST;
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

export function resolveMessage(exception: unknown): string {
  if (exception instanceof HttpException) {
    const body = exception.getResponse();
    if (typeof body === 'string') return body;
    if (isRecord(body)) {
      const { message } = body;
      if (Array.isArray(message) && message.length > 0) {
        return String(message[0]);
      }
      if (typeof message === 'string') return message;
    }
    return exception.message;
  }
  if (isDomainError(exception)) return exception.message;
  // internal details stay in the log
  return 'Internal server error';
}

function resolveCode(exception: unknown, status: number): string {
  if (isDomainError(exception)) return exception.code;
  if (exception instanceof HttpException) {
    return HttpStatus[status] ?? 'HTTP_ERROR';
  }
  return 'INTERNAL_SERVER_ERROR';
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = resolveStatus(exception);
    const message = resolveMessage(exception);
    const errorCode = resolveCode(exception, status);

    loggerInstance.log(
      status >= 500 ? 'error' : 'warn',
      `[Exception] ${request.method} ${request.url}`,
      {
        context: 'AllExceptionsFilter',
        status,
        errorCode,
        message,
        // stacks only for server faults
        stack:
          status >= 500 && exception instanceof Error
            ? exception.stack
            : undefined,
        query: request.query,
        ip: request.ip,
      },
    );

    if (isAjaxRequest(request)) {
      return response.status(status).json({
        statusCode: status,
        code: errorCode,
        message,
        timestamp: new Date().toISOString(),
      });
    }

    if (request.method === 'GET' || request.method === 'HEAD') {
      return response.status(status).render('error', { status, message });
    }

    setFlash(request, 'error', message);
    return response.redirect(HttpStatus.SEE_OTHER, backUrl(request));
  }
}
