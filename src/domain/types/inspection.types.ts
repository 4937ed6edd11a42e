import { Duration } from '../value-objects/duration';

export type InspectionFailureKind =
  | 'InvalidFormat'
  | 'EmptyBucket'
  | 'StaleObject'
  | 'ListPermissionDenied'
  | 'BucketAccessError'
  | 'Unexpected';

export interface NewestObjectDescriptor {
  key: string;
  lastModified: Date;
  /** Negative when the backend clock runs ahead of ours. */
  ageSeconds: number;
}

export interface StaleObjectFailure {
  kind: 'StaleObject';
  reason: string;
  ageSeconds: number;
  maxAgeSeconds: number;
  newestObject: NewestObjectDescriptor;
}

export interface GeneralInspectionFailure {
  kind: Exclude<InspectionFailureKind, 'StaleObject'>;
  reason: string;
}

export type InspectionFailure = StaleObjectFailure | GeneralInspectionFailure;

export type InspectionResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: InspectionFailure };

export interface FreshnessResult {
  bucket: string;
  newestObject: NewestObjectDescriptor;
  /** Absent in report-only mode. */
  maxAge?: Duration;
}

export interface UsageResult {
  bucket: string;
  objectCount: number;
  totalSizeBytes: number;
  totalSizeFormatted: string;
}

export function succeed<T>(value: T): InspectionResult<T> {
  return { ok: true, value };
}

export function fail<T>(failure: InspectionFailure): InspectionResult<T> {
  return { ok: false, failure };
}
