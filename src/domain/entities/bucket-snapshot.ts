import { ObjectRecord } from './object-record';

/**
 * Result of fully enumerating one bucket. Records keep the order in which
 * the listing pages arrived.
 */
export class BucketSnapshot {
  private constructor(
    readonly bucketName: string,
    private readonly records: readonly ObjectRecord[],
  ) {}

  static of(
    bucketName: string,
    records: readonly ObjectRecord[],
  ): BucketSnapshot {
    return new BucketSnapshot(bucketName, [...records]);
  }

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  /**
   * Record with the latest modification time. When several records share
   * that time, the first one in listing order wins.
   */
  newest(): ObjectRecord | undefined {
    let newest: ObjectRecord | undefined;
    for (const record of this.records) {
      const time = record.lastModified.getTime();
      if (!newest || time > newest.lastModified.getTime()) newest = record;
    }
    return newest;
  }

  totalSizeBytes(): number {
    return this.records.reduce((total, record) => total + record.size, 0);
  }

  toArray(): ObjectRecord[] {
    return [...this.records];
  }
}
