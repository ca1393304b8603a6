import { Injectable } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import { METRICS } from './metrics.constants';

export type OrderOutcome = 'created' | 'rejected' | 'failed';

@Injectable()
export class MetricsService {
  constructor(
    @InjectMetric(METRICS.HTTP_REQUESTS_TOTAL)
    private readonly httpRequestsCounter: Counter<string>,

    @InjectMetric(METRICS.ORDERS_TOTAL)
    private readonly ordersCounter: Counter<string>,

    @InjectMetric(METRICS.HTTP_REQUEST_DURATION)
    private readonly httpDurationHistogram: Histogram<string>,

    @InjectMetric(METRICS.ORDER_VALUE)
    private readonly orderValueHistogram: Histogram<string>,

    @InjectMetric(METRICS.PRINTS_CREATED_TOTAL)
    private readonly printsCreatedCounter: Counter<string>,
  ) {}

  recordHttpRequest(method: string, path: string, status: number, durationSec: number): void {
    this.httpRequestsCounter.inc({ method, path, status: status.toString() });
    this.httpDurationHistogram.observe({ method, path, status: status.toString() }, durationSec);
  }

  /**
   * `rejected` covers client errors (4xx), `failed` anything else.
   */
  recordOrder(outcome: OrderOutcome): void {
    this.ordersCounter.inc({ outcome });
  }

  recordOrderValue(total: number): void {
    this.orderValueHistogram.observe(total);
  }

  recordPrintCreated(): void {
    this.printsCreatedCounter.inc();
  }
}
