import { registerAs } from '@nestjs/config';
import { readBool, readInt } from './env.util';

export interface StorageConfig {
  endpoint: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  region: string;
  forcePathStyle: boolean;
  requestTimeoutMs: number;
  pageSize: number;
}

export const DEFAULT_S3_ENDPOINT = 'https://s3.amazonaws.com';

export default registerAs(
  'storage',
  (): StorageConfig => ({
    endpoint: process.env.S3_ENDPOINT || DEFAULT_S3_ENDPOINT,
    // Unset credentials fall through to the SDK's default provider chain.
    accessKeyId: process.env.S3_KEY || undefined,
    secretAccessKey: process.env.S3_SECRET || undefined,
    region: process.env.S3_REGION || 'us-east-1',
    forcePathStyle: readBool(process.env.S3_FORCE_PATH_STYLE, true),
    requestTimeoutMs: readInt(process.env.S3_REQUEST_TIMEOUT_MS, 10_000),
    pageSize: Math.min(readInt(process.env.S3_PAGE_SIZE, 1000), 1000),
  }),
);
