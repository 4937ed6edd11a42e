import { Injectable, NestMiddleware } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  IncomingHttpHeaders,
  IncomingMessage,
  ServerResponse,
} from 'node:http';
import { randomUUID } from 'node:crypto';
import { RequestContextService } from './request-context.service';

function headerValue(
  headers: IncomingHttpHeaders,
  name: string,
): string | undefined {
  const value = headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first || undefined;
}

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  constructor(
    private readonly requestContext: RequestContextService,
    private readonly config: ConfigService,
  ) {}

  use(req: IncomingMessage, _res: ServerResponse, next: () => void) {
    const reqId = headerValue(req.headers, 'x-request-id') ?? randomUUID();
    const corrId = headerValue(req.headers, 'x-correlation-id') ?? reqId;
    const serviceName = this.config.get<string>(
      'app.serviceName',
      'bucket-health',
    );

    this.requestContext.runWith(
      { requestId: reqId, correlationId: corrId, serviceName },
      () => next(),
    );
  }
}
