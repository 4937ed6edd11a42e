import { ObjectRecord } from '../../src/domain/entities/object-record';

export const T0 = new Date('2024-05-01T00:00:00.000Z');

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;

export function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

export function objectRecord(
  key: string,
  size: number,
  lastModified: Date,
): ObjectRecord {
  return { key, size, lastModified };
}
