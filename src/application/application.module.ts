import { Module } from '@nestjs/common';
import { BucketInspectorService } from './services/bucket-inspector.service';
import {
  CheckBucketFreshnessUseCase,
} from './use-cases/check-bucket-freshness.use-case';
import {
  ReportBucketUsageUseCase,
} from './use-cases/report-bucket-usage.use-case';

// 'IObjectStorage' and 'IClock' come from the global StorageModule.
@Module({
  providers: [
    BucketInspectorService,
    CheckBucketFreshnessUseCase,
    ReportBucketUsageUseCase,
  ],
  exports: [
    BucketInspectorService,
    CheckBucketFreshnessUseCase,
    ReportBucketUsageUseCase,
  ],
})
export class ApplicationModule {}
