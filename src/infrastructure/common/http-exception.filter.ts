import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { FailureResponseDto } from '../controllers/dto/bucket-responses.dto';
import { ILoggerPort } from '../logging/logger.port';
import { BucketInspectionException } from './bucket-inspection.exception';

/**
 * Renders every error as `{ status: "fail", reason, ... }`.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  constructor(@Inject('ILoggerPort') private readonly logger: ILoggerPort) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;
    const payload = this.toPayload(exception);

    const logMessage = `[${request.method}] ${request.url}: ${payload.reason}`;
    if (status >= 500) {
      this.logger.error(logMessage, exception, HttpErrorFilter.name, {
        status,
      });
    } else {
      this.logger.warn(logMessage, HttpErrorFilter.name, { status });
    }

    reply.status(status).send(payload);
  }

  private toPayload(exception: unknown): FailureResponseDto {
    if (exception instanceof BucketInspectionException) {
      const response = exception.getResponse();
      if (isFailureResponse(response)) return response;
    }
    if (exception instanceof HttpException) {
      return { status: 'fail', reason: describeHttpException(exception) };
    }
    const message =
      exception instanceof Error ? exception.message : String(exception);
    return { status: 'fail', reason: `Unexpected error: ${message}` };
  }
}

function isFailureResponse(value: unknown): value is FailureResponseDto {
  return (
    typeof value === 'object' &&
    value !== null &&
    'status' in value &&
    value.status === 'fail' &&
    'reason' in value &&
    typeof value.reason === 'string'
  );
}

function describeHttpException(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;
  if (
    typeof response === 'object' &&
    response !== null &&
    'message' in response
  ) {
    const { message } = response;
    if (Array.isArray(message)) return message.join(', ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}
