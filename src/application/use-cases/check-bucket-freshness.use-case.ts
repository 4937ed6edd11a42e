import { Injectable, Logger } from '@nestjs/common';
import {
  InvalidDurationFormatError,
} from '../../domain/errors/invalid-duration-format.error';
import {
  fail,
  FreshnessResult,
  InspectionResult,
} from '../../domain/types/inspection.types';
import { Duration } from '../../domain/value-objects/duration';
import { BucketInspectorService } from '../services/bucket-inspector.service';
import { unexpectedFailure } from './unexpected-failure';

export interface CheckBucketFreshnessInput {
  bucketName: string;
  /** Duration token; undefined selects report-only mode. */
  maxAge?: string;
}

@Injectable()
export class CheckBucketFreshnessUseCase {
  private readonly logger = new Logger(CheckBucketFreshnessUseCase.name);

  constructor(private readonly inspector: BucketInspectorService) {}

  async execute(
    input: CheckBucketFreshnessInput,
  ): Promise<InspectionResult<FreshnessResult>> {
    let threshold: Duration | undefined;
    if (input.maxAge !== undefined) {
      try {
        threshold = Duration.parse(input.maxAge);
      } catch (error) {
        if (error instanceof InvalidDurationFormatError) {
          return fail({ kind: 'InvalidFormat', reason: error.message });
        }
        throw error;
      }
    }

    try {
      const result = await this.inspector.freshness(
        input.bucketName,
        threshold,
      );
      if (!result.ok) {
        this.logger.log(
          `Freshness check failed for '${input.bucketName}': ` +
            `${result.failure.kind}: ${result.failure.reason}`,
        );
      }
      return result;
    } catch (error) {
      return unexpectedFailure(
        this.logger,
        `Freshness check for '${input.bucketName}'`,
        error,
      );
    }
  }
}
