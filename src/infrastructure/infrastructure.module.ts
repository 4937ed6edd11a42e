import { Global, Module } from '@nestjs/common';
import { MetricsModule } from './metrics/metrics.module';
import { LoggingModule } from './logging/logging.module';
import { StorageModule } from './storage/storage.module';
import { HealthModule } from './health/health.module';
import { BucketsModule } from './controllers/buckets.module';
import { DocsModule } from './docs/docs.module';

@Global()
@Module({
  imports: [
    MetricsModule,
    LoggingModule,
    StorageModule,
    HealthModule,
    BucketsModule,
    DocsModule,
  ],
  exports: [MetricsModule, LoggingModule, StorageModule],
})
export class InfrastructureModule {}
