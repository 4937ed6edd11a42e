import {
  GetBucketLocationCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  S3Client,
  S3ServiceException,
  _Object,
} from '@aws-sdk/client-s3';
import { ObjectRecord } from '../../domain/entities/object-record';
import {
  StorageBackendError,
  StorageOperation,
  StorageTimeoutError,
} from '../../application/errors/storage-backend.error';
import {
  IObjectStorage,
  ObjectListingPage,
} from '../../application/ports/object-storage.port';
import { ILoggerPort } from '../logging/logger.port';
import { StorageConfig } from '../config/storage.config';

export class S3ObjectStorageAdapter implements IObjectStorage {
  private readonly s3Client: S3Client;

  constructor(
    private readonly config: StorageConfig,
    private readonly logger: ILoggerPort,
  ) {
    this.s3Client = new S3Client({
      endpoint: config.endpoint,
      region: config.region,
      forcePathStyle: config.forcePathStyle,
      followRegionRedirects: true,
      maxAttempts: 1,
      requestHandler: {
        connectionTimeout: config.requestTimeoutMs,
        requestTimeout: config.requestTimeoutMs,
      },
      credentials:
        config.accessKeyId && config.secretAccessKey
          ? {
              accessKeyId: config.accessKeyId,
              secretAccessKey: config.secretAccessKey,
            }
          : undefined,
    });

    this.logger.info(
      `S3 object storage initialized with endpoint: ${config.endpoint}`,
      S3ObjectStorageAdapter.name,
    );
  }

  async listObjectsPage(
    bucketName: string,
    continuationToken?: string,
  ): Promise<ObjectListingPage> {
    const command = new ListObjectsV2Command({
      Bucket: bucketName,
      MaxKeys: this.config.pageSize,
      ContinuationToken: continuationToken,
    });
    const response: ListObjectsV2CommandOutput = await this.send(
      'ListObjects',
      () => this.s3Client.send(command),
    );

    const records: ObjectRecord[] = [];
    for (const object of response.Contents ?? []) {
      const record = this.toRecord(object);
      if (record) {
        records.push(record);
      } else {
        this.logger.debug(
          `Skipping listing entry without key or timestamp in bucket ${bucketName}`,
          S3ObjectStorageAdapter.name,
        );
      }
    }

    return {
      records,
      nextContinuationToken: response.IsTruncated
        ? response.NextContinuationToken
        : undefined,
    };
  }

  async probeBucket(bucketName: string): Promise<void> {
    await this.send('ProbeBucket', () =>
      this.s3Client.send(new GetBucketLocationCommand({ Bucket: bucketName })),
    );
  }

  private toRecord(object: _Object): ObjectRecord | undefined {
    if (!object.Key || !object.LastModified) return undefined;
    return {
      key: object.Key,
      size: object.Size ?? 0,
      lastModified: object.LastModified,
    };
  }

  private async send<T>(
    operation: StorageOperation,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw this.translateError(operation, error);
    }
  }

  private translateError(
    operation: StorageOperation,
    error: unknown,
  ): StorageBackendError {
    if (error instanceof S3ServiceException) {
      return new StorageBackendError(
        error.message || error.name,
        error.name,
        operation,
        error.$metadata?.httpStatusCode,
        { cause: error },
      );
    }
    if (error instanceof Error && error.name === 'TimeoutError') {
      return new StorageTimeoutError(operation, this.config.requestTimeoutMs, {
        cause: error,
      });
    }
    if (error instanceof Error) {
      // Network and transport failures carry no service error code.
      return new StorageBackendError(
        error.message,
        error.name || 'NetworkingError',
        operation,
        undefined,
        { cause: error },
      );
    }
    return new StorageBackendError(
      String(error),
      'Unknown',
      operation,
      undefined,
      { cause: error },
    );
  }
}
