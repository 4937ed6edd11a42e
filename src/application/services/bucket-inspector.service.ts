import { Inject, Injectable, Logger } from '@nestjs/common';
import { BucketSnapshot } from '../../domain/entities/bucket-snapshot';
import { ObjectRecord } from '../../domain/entities/object-record';
import {
  fail,
  FreshnessResult,
  InspectionFailure,
  InspectionResult,
  NewestObjectDescriptor,
  succeed,
  UsageResult,
} from '../../domain/types/inspection.types';
import { Duration } from '../../domain/value-objects/duration';
import { roundHalfEven } from '../../domain/value-objects/round-half-even';
import { formatStorageSize } from '../../domain/value-objects/storage-size';
import { StorageBackendError } from '../errors/storage-backend.error';
import { IClock, IObjectStorage } from '../ports';

const LIST_PERMISSION_REQUIRED = "The 's3:ListBucket' permission is required.";

/**
 * Reads one bucket's listing per call and derives freshness and usage
 * from it. Backend failures are returned as failure values; anything
 * that is not a StorageBackendError is rethrown.
 */
@Injectable()
export class BucketInspectorService {
  private readonly logger = new Logger(BucketInspectorService.name);

  constructor(
    @Inject('IObjectStorage') private readonly storage: IObjectStorage,
    @Inject('IClock') private readonly clock: IClock,
  ) {}

  async listAll(
    bucketName: string,
  ): Promise<InspectionResult<BucketSnapshot>> {
    const records: ObjectRecord[] = [];
    const seenTokens = new Set<string>();
    let continuationToken: string | undefined;
    let pages = 0;

    try {
      do {
        const page = await this.storage.listObjectsPage(
          bucketName,
          continuationToken,
        );
        records.push(...page.records);
        pages++;

        continuationToken = page.nextContinuationToken;
        if (continuationToken !== undefined) {
          if (seenTokens.has(continuationToken)) {
            return fail({
              kind: 'BucketAccessError',
              reason:
                'Error accessing bucket: pagination did not advance ' +
                `(continuation token repeated after ${pages} pages)`,
            });
          }
          seenTokens.add(continuationToken);
        }
      } while (continuationToken !== undefined);
    } catch (error) {
      if (error instanceof StorageBackendError) {
        return this.translateListError(bucketName, error);
      }
      throw error;
    }

    this.logger.debug(
      `Listed ${records.length} objects in ${pages} pages from '${bucketName}'`,
    );
    return succeed(BucketSnapshot.of(bucketName, records));
  }

  async freshness(
    bucketName: string,
    threshold?: Duration,
  ): Promise<InspectionResult<FreshnessResult>> {
    const listing = await this.listAll(bucketName);
    if (!listing.ok) {
      return fail(
        this.withOperationContext(
          listing.failure,
          'Cannot check newest object age.',
        ),
      );
    }

    const newest = listing.value.newest();
    if (!newest) {
      return fail({
        kind: 'EmptyBucket',
        reason: `Bucket '${bucketName}' is empty`,
      });
    }

    const now = this.clock.now();
    const ageMs = now.getTime() - newest.lastModified.getTime();
    const newestObject: NewestObjectDescriptor = {
      key: newest.key,
      lastModified: newest.lastModified,
      ageSeconds: ageMs / 1000,
    };

    if (threshold && ageMs > threshold.toMilliseconds()) {
      return fail({
        kind: 'StaleObject',
        reason:
          'Newest object is too old ' +
          `(${roundHalfEven(newestObject.ageSeconds)} seconds, ` +
          `max age: ${threshold.toSeconds()} seconds)`,
        ageSeconds: newestObject.ageSeconds,
        maxAgeSeconds: threshold.toSeconds(),
        newestObject,
      });
    }

    return succeed({ bucket: bucketName, newestObject, maxAge: threshold });
  }

  async usage(bucketName: string): Promise<InspectionResult<UsageResult>> {
    const listing = await this.listAll(bucketName);
    if (!listing.ok) {
      return fail(
        this.withOperationContext(
          listing.failure,
          'Cannot check bucket usage.',
        ),
      );
    }

    const snapshot = listing.value;
    const totalSizeBytes = snapshot.totalSizeBytes();
    return succeed({
      bucket: bucketName,
      objectCount: snapshot.size,
      totalSizeBytes,
      totalSizeFormatted: formatStorageSize(totalSizeBytes),
    });
  }

  /**
   * A denied list call cannot tell "no permission" from "no bucket" under
   * least-privilege policies; a location probe tells them apart.
   */
  private async translateListError(
    bucketName: string,
    error: StorageBackendError,
  ): Promise<InspectionResult<BucketSnapshot>> {
    if (!error.isAccessDenied) {
      this.logger.warn(
        `Listing '${bucketName}' failed: ${error.code}: ${error.message}`,
      );
      return fail({
        kind: 'BucketAccessError',
        reason: `Error accessing bucket: ${error.message}`,
      });
    }

    try {
      await this.storage.probeBucket(bucketName);
    } catch (probeError) {
      if (probeError instanceof StorageBackendError) {
        this.logger.warn(
          `Listing '${bucketName}' denied and probe failed: ` +
            `${probeError.code}: ${probeError.message}`,
        );
        return fail({
          kind: 'BucketAccessError',
          reason: `Error accessing bucket: ${probeError.message}`,
        });
      }
      throw probeError;
    }

    this.logger.warn(
      `Listing '${bucketName}' denied although the bucket exists`,
    );
    return fail({
      kind: 'ListPermissionDenied',
      reason: LIST_PERMISSION_REQUIRED,
    });
  }

  private withOperationContext(
    failure: InspectionFailure,
    prefix: string,
  ): InspectionFailure {
    if (failure.kind !== 'ListPermissionDenied') return failure;
    return { ...failure, reason: `${prefix} ${failure.reason}` };
  }
}
