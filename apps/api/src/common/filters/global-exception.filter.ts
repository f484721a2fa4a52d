import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import type { ApiError, LayoutErrorCode } from '@sheetplan/shared';
import { LayoutError } from '@sheetplan/shared';

/** Text that could not be read at all is the caller's malformed input */
const BAD_REQUEST_CODES: ReadonlySet<LayoutErrorCode> = new Set<LayoutErrorCode>([
  'INVALID_INPUT',
  'NO_JSON_OBJECT_FOUND',
  'MALFORMED_JSON',
]);

export interface ErrorDescription {
  status: number;
  body: ApiError;
}

/** Map any thrown value to an HTTP status and error envelope */
export function describeException(exception: unknown): ErrorDescription {
  let status = HttpStatus.INTERNAL_SERVER_ERROR;
  let code = 'INTERNAL_ERROR';
  let message = 'An unexpected error occurred';
  let details: unknown = undefined;

  if (exception instanceof LayoutError) {
    status = BAD_REQUEST_CODES.has(exception.code)
      ? HttpStatus.BAD_REQUEST
      : HttpStatus.UNPROCESSABLE_ENTITY;
    code = exception.code;
    message = exception.message;
    details = exception.details;
  } else if (exception instanceof HttpException) {
    status = exception.getStatus();
    const response = exception.getResponse();
    if (typeof response === 'string') {
      message = response;
    } else if (typeof response === 'object' && response !== null) {
      const resp: Record<string, unknown> = { ...response };
      if (typeof resp['message'] === 'string') message = resp['message'];
      if (typeof resp['error'] === 'string') code = resp['error'];
      details = resp['details'];
    }
  } else if (exception instanceof ZodError) {
    status = HttpStatus.UNPROCESSABLE_ENTITY;
    code = 'VALIDATION_ERROR';
    message = 'Request validation failed';
    details = exception.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
    }));
  } else if (exception instanceof Error) {
    message = exception.message;
  }

  return { status, body: { success: false, error: { code, message, details } } };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const { status, body } = describeException(exception);

    if (status >= 500) {
      this.logger.error(
        `[${body.error.code}] ${body.error.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`[${body.error.code}] ${body.error.message}`);
    }

    reply.status(status).send(body);
  }
}
