/**
 * Maps conversion failures to HTTP responses.
 *
 * client → 400 with the error's message and field
 * cancelled → 503
 * server and unknown errors → 500 with a generic message; details are logged
 */

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ConversionError } from '../../conversion/errors/conversion-errors';

export interface ErrorResponseBody {
  statusCode: number;
  message: string | string[];
  error: string;
  code?: string;
  field?: string;
}

const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export function toErrorResponse(exception: unknown): ErrorResponseBody {
  if (exception instanceof ConversionError) {
    switch (exception.kind) {
      case 'client':
        return {
          statusCode: HttpStatus.BAD_REQUEST,
          message: exception.message,
          error: 'Bad Request',
          code: exception.code,
          ...(exception.field ? { field: exception.field } : {}),
        };
      case 'cancelled':
        return {
          statusCode: HttpStatus.SERVICE_UNAVAILABLE,
          message: exception.message,
          error: 'Service Unavailable',
          code: exception.code,
        };
      case 'server':
        return {
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          message: INTERNAL_ERROR_MESSAGE,
          error: 'Internal Server Error',
          code: exception.code,
        };
    }
  }

  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return {
        statusCode: exception.getStatus(),
        message: response,
        error: exception.message,
      };
    }

    const message =
      'message' in response &&
      (typeof response.message === 'string' || Array.isArray(response.message))
        ? response.message
        : exception.message;
    const error =
      'error' in response && typeof response.error === 'string'
        ? response.error
        : exception.message;

    return { statusCode: exception.getStatus(), message, error };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    message: INTERNAL_ERROR_MESSAGE,
    error: 'Internal Server Error',
  };
}

@Catch()
export class ConversionExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ConversionExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const body = toErrorResponse(exception);

    if (body.statusCode >= 500) {
      this.logger.error(
        exception instanceof Error ? exception.message : String(exception),
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(
        `${body.statusCode} ${body.code ?? body.error}: ${JSON.stringify(body.message)}`,
      );
    }

    if (res.headersSent) {
      return;
    }

    res.status(body.statusCode).json(body);
  }
}
