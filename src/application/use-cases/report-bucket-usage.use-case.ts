import { Injectable, Logger } from '@nestjs/common';
import {
  InspectionResult,
  UsageResult,
} from '../../domain/types/inspection.types';
import { BucketInspectorService } from '../services/bucket-inspector.service';
import { unexpectedFailure } from './unexpected-failure';

export interface ReportBucketUsageInput {
  bucketName: string;
}

@Injectable()
export class ReportBucketUsageUseCase {
  private readonly logger = new Logger(ReportBucketUsageUseCase.name);

  constructor(private readonly inspector: BucketInspectorService) {}

  async execute(
    input: ReportBucketUsageInput,
  ): Promise<InspectionResult<UsageResult>> {
    const { bucketName } = input;
    try {
      const result = await this.inspector.usage(bucketName);
      if (result.ok) {
        const { objectCount, totalSizeBytes } = result.value;
        this.logger.debug(
          `Usage for '${bucketName}': ${objectCount} objects, ${totalSizeBytes} bytes`,
        );
      } else {
        this.logger.log(
          `Usage report failed for '${bucketName}': ` +
            `${result.failure.kind}: ${result.failure.reason}`,
        );
      }
      return result;
    } catch (error) {
      return unexpectedFailure(
        this.logger,
        `Usage report for '${bucketName}'`,
        error,
      );
    }
  }
}
