export const BYTES_PER_MEGABYTE = 1024 * 1024;
export const MEGABYTES_PER_GIGABYTE = 1024;

// Binary units: 1 GB here is 1024 MB of 1024 * 1024 bytes.
export function formatStorageSize(totalBytes: number): string {
  const megabytes = totalBytes / BYTES_PER_MEGABYTE;
  const gigabytes = megabytes / MEGABYTES_PER_GIGABYTE;

  if (gigabytes >= 1) {
    return `${gigabytes.toFixed(2)} GB`;
  }
  return `${megabytes.toFixed(2)} MB`;
}
