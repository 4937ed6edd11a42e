import { Inject, Injectable } from '@nestjs/common';
import { Counter, Histogram, Registry } from 'prom-client';
import { InspectionResult } from '../../domain/types/inspection.types';

export type InspectionOperation = 'freshness' | 'usage';

@Injectable()
export class InspectionMetricsService {
  private readonly inspections: Counter<'operation' | 'outcome'>;
  private readonly duration: Histogram<'operation'>;

  constructor(@Inject('PrometheusRegistry') registry: Registry) {
    this.inspections = new Counter({
      name: 'bucket_inspections_total',
      help: 'Bucket inspections by operation and outcome (ok or failure kind)',
      labelNames: ['operation', 'outcome'],
      registers: [registry],
    });
    this.duration = new Histogram({
      name: 'bucket_inspection_duration_seconds',
      help: 'Time spent inspecting a bucket, including every listing page',
      labelNames: ['operation'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
      registers: [registry],
    });
  }

  async track<T>(
    operation: InspectionOperation,
    run: () => Promise<InspectionResult<T>>,
  ): Promise<InspectionResult<T>> {
    const stopTimer = this.duration.startTimer({ operation });
    try {
      const result = await run();
      this.inspections.inc({
        operation,
        outcome: result.ok ? 'ok' : result.failure.kind,
      });
      return result;
    } catch (error) {
      this.inspections.inc({ operation, outcome: 'Unexpected' });
      throw error;
    } finally {
      stopTimer();
    }
  }
}
