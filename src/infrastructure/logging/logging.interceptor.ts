import {
  CallHandler,
  ExecutionContext,
  Inject,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { HttpException } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { ILoggerPort } from './logger.port';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(@Inject('ILoggerPort') private readonly logger: ILoggerPort) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<FastifyRequest>();
    const { method, url } = request;
    const startTime = Date.now();

    this.logger.debug('Request received', LoggingInterceptor.name, {
      method,
      url,
      query: request.query,
      params: request.params,
    });

    return next.handle().pipe(
      tap(() => {
        this.logger.info('Request completed', LoggingInterceptor.name, {
          method,
          url,
          statusCode: http.getResponse<FastifyReply>().statusCode,
          duration: Date.now() - startTime,
        });
      }),
      catchError((error: unknown) => {
        this.logger.warn('Request failed', LoggingInterceptor.name, {
          method,
          url,
          statusCode: error instanceof HttpException ? error.getStatus() : 500,
          duration: Date.now() - startTime,
        });
        return throwError(() => error);
      }),
    );
  }
}
