/**
 * One object as reported by a bucket listing. Snapshot of backend state,
 * held only for the duration of a single request.
 */
export interface ObjectRecord {
  readonly key: string;
  readonly size: number;
  readonly lastModified: Date;
}
