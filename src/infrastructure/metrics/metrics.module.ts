import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { collectDefaultMetrics, Registry } from 'prom-client';
import { InspectionMetricsService } from './inspection-metrics.service';
import { MetricsController } from './metrics.controller';

/**
 * Global metrics module that provides a shared Prometheus registry,
 * exposed via the /metrics endpoint.
 */
@Global()
@Module({
  controllers: [MetricsController],
  providers: [
    {
      provide: 'PrometheusRegistry',
      useFactory: (config: ConfigService) => {
        const registry = new Registry();
        if (config.get<boolean>('app.defaultMetrics', true)) {
          collectDefaultMetrics({ register: registry });
        }
        return registry;
      },
      inject: [ConfigService],
    },
    InspectionMetricsService,
  ],
  exports: ['PrometheusRegistry', InspectionMetricsService],
})
export class MetricsModule {}
