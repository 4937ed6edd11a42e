import { registerAs } from '@nestjs/config';
import { readBool, readInt } from './env.util';

export interface AppConfig {
  port: number;
  host: string;
  serviceName: string;
  defaultMetrics: boolean;
}

export default registerAs(
  'app',
  (): AppConfig => ({
    port: readInt(process.env.PORT, 8000),
    host: process.env.HOST || '0.0.0.0',
    serviceName: process.env.SERVICE_NAME || 'bucket-health',
    defaultMetrics: readBool(process.env.METRICS_DEFAULT_COLLECTORS, true),
  }),
);
