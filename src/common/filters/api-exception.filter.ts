import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import type { ErrorEnvelope } from '../interfaces/api-envelope.interface';

const INTERNAL_ERROR_MESSAGE = 'Internal Error';

function messageOf(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') {
    return body;
  }

  if ('message' in body) {
    const { message } = body;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
}

/**
 * Renders every error as `{ success: false, error: <status>, message }`.
 *
 * HttpExceptions keep their status and message. Anything else is logged and
 * reported as a 500 with a fixed message, so internals never reach clients.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const envelope = this.toEnvelope(exception);

    response.status(envelope.error).json(envelope);
  }

  toEnvelope(exception: unknown): ErrorEnvelope {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`${status} ${exception.message}`, exception.stack);
      }
      return { success: false, error: status, message: messageOf(exception) };
    }

    const cause =
      exception instanceof Error ? exception : new Error(String(exception));
    this.logger.error(`Unhandled error: ${cause.message}`, cause.stack);

    return {
      success: false,
      error: HttpStatus.INTERNAL_SERVER_ERROR,
      message: INTERNAL_ERROR_MESSAGE,
    };
  }
}
