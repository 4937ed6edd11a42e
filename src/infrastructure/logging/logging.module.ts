import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RequestContextService } from './request-context.service';
import { WinstonLoggerAdapter } from './winston-logger.adapter';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    RequestContextService,
    WinstonLoggerAdapter,
    {
      provide: 'ILoggerPort',
      useExisting: WinstonLoggerAdapter,
    },
  ],
  exports: ['ILoggerPort', WinstonLoggerAdapter, RequestContextService],
})
export class LoggingModule {}
