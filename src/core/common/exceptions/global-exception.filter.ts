import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Logger } from 'nestjs-pino';
import { Response } from 'express';
import { RequestWithCorrelationId } from '../../logger/correlation-id.middleware';
import { ErrorResponseDto } from '../dto/error-response.dto';
import { translateStorageError } from './storage-error.util';

interface HttpErrorBody {
  message: string;
  details?: string[];
}

function readStringList(value: unknown): string[] | undefined {
  if (Array.isArray(value) && value.every(item => typeof item === 'string')) {
    return value;
  }
  return undefined;
}

/**
 * Pulls message and detail lines out of whatever body an HttpException
 * was built with (plain string, ValidationPipe's message array, or the
 * `{ message, errors }` object raised by assertValid).
 */
export function describeHttpException(exception: HttpException): HttpErrorBody {
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return { message: response };
  }

  const message = 'message' in response ? response.message : undefined;
  const messageList = readStringList(message);
  if (messageList) {
    return { message: 'Validation failed', details: messageList };
  }

  return {
    message: typeof message === 'string' ? message : exception.message,
    details: 'errors' in response ? readStringList(response.errors) : undefined,
  };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: Logger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<RequestWithCorrelationId>();

    const translated = translateStorageError(exception);

    let status: number;
    let body: HttpErrorBody;

    if (translated instanceof HttpException) {
      status = translated.getStatus();
      body = describeHttpException(translated);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      body = { message: 'Internal server error' };

      this.logger.error('Unhandled exception occurred', {
        context: 'GlobalExceptionFilter',
        correlationId: request.correlationId,
        method: request.method,
        url: request.url,
        exceptionMessage:
          translated instanceof Error ? translated.message : String(translated),
        stack: translated instanceof Error ? translated.stack : undefined,
      });
    }

    const errorResponse = new ErrorResponseDto(
      status,
      body.message,
      request.url,
      body.details,
    );

    this.logger.error('HTTP error response', {
      context: 'GlobalExceptionFilter',
      correlationId: request.correlationId,
      statusCode: status,
      message: body.message,
      method: request.method,
      url: request.url,
      userAgent: request.headers['user-agent'],
      ip: request.ip,
    });

    response.status(status).json(errorResponse);
  }
}
