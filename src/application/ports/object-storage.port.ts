import { ObjectRecord } from '../../domain/entities/object-record';

export interface ObjectListingPage {
  records: ObjectRecord[];
  /** Present while more pages remain. */
  nextContinuationToken?: string;
}

/**
 * Read-only view of an S3-compatible backend. Implementations throw
 * StorageBackendError for every failure reported by the backend.
 */
export interface IObjectStorage {
  listObjectsPage(
    bucketName: string,
    continuationToken?: string,
  ): Promise<ObjectListingPage>;
  /** Resolves when the bucket exists and the credentials can reach it. */
  probeBucket(bucketName: string): Promise<void>;
}
