import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StorageConfig } from '../config/storage.config';
import { ILoggerPort } from '../logging/logger.port';
import { S3ObjectStorageAdapter } from './s3-object-storage.adapter';
import { SystemClock } from './system-clock';

@Global()
@Module({
  providers: [
    {
      provide: 'IObjectStorage',
      useFactory: (configService: ConfigService, logger: ILoggerPort) => {
        const config = configService.getOrThrow<StorageConfig>('storage');
        return new S3ObjectStorageAdapter(config, logger);
      },
      inject: [ConfigService, 'ILoggerPort'],
    },
    {
      provide: 'IClock',
      useClass: SystemClock,
    },
  ],
  exports: ['IObjectStorage', 'IClock'],
})
export class StorageModule {}
