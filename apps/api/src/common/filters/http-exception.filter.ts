import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  detail: string | string[];
  path: string;
  timestamp: string;
}

/**
 * Pull the human-readable part out of an HttpException response.
 * Nest puts it in `message`: a string, or a string[] for validation errors.
 */
function detailOf(exception: HttpException): string | string[] {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  if (response && typeof response === 'object' && 'message' in response) {
    const { message } = response;
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((item): item is string => typeof item === 'string')) {
      return message;
    }
  }
  return exception.message;
}

// HttpStatus.BAD_REQUEST -> "Bad Request"
function statusText(status: number): string {
  const name: string | undefined = HttpStatus[status];
  if (!name) return 'Error';
  return name
    .split('_')
    .map(word => word.charAt(0) + word.slice(1).toLowerCase())
    .join(' ');
}

export function buildErrorBody(status: number, detail: string | string[], path: string): ErrorResponseBody {
  return {
    statusCode: status,
    error: statusText(status),
    detail,
    path,
    timestamp: new Date().toISOString(),
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let detail: string | string[] = 'Internal server error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      detail = detailOf(exception);
    } else {
      const err = exception instanceof Error ? exception : new Error(String(exception));
      this.logger.error(`Unhandled error on ${request.method} ${request.url}: ${err.message}`, err.stack);
    }

    response.status(status).json(buildErrorBody(status, detail, request.url));
  }
}
