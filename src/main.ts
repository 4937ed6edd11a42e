import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { AppConfig } from './infrastructure/config/app.config';
import { setupOpenApi } from './infrastructure/docs/openapi';
import {
  WinstonLoggerAdapter,
} from './infrastructure/logging/winston-logger.adapter';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ trustProxy: true }),
    { bufferLogs: true },
  );
  const logger = app.get(WinstonLoggerAdapter);
  app.useLogger(logger);

  app.enableShutdownHooks();

  setupOpenApi(app);

  const { port, host } = app.get(ConfigService).getOrThrow<AppConfig>('app');
  await app.listen({ port, host });
  logger.info(`Bucket health API listening on ${host}:${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start bucket health API', error);
  process.exit(1);
});
