import { Module } from '@nestjs/common';
import {
  makeCounterProvider,
  makeHistogramProvider,
  PrometheusModule,
} from '@willsoto/nestjs-prometheus';
import { METRICS } from './metrics.constants';
import { MetricsService } from './metrics.service';
import { MetricsInterceptor } from './metrics.interceptor';

@Module({
  imports: [
    PrometheusModule.register({
      path: '/metrics',
      defaultMetrics: { enabled: true },
    }),
  ],
  providers: [
    makeCounterProvider({
      name: METRICS.HTTP_REQUESTS_TOTAL,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
    }),
    makeCounterProvider({
      name: METRICS.ORDERS_TOTAL,
      help: 'Total number of order attempts by outcome',
      labelNames: ['outcome'],
    }),
    makeHistogramProvider({
      name: METRICS.HTTP_REQUEST_DURATION,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
    }),
    makeHistogramProvider({
      name: METRICS.ORDER_VALUE,
      help: 'Totals of created orders',
      buckets: [25, 50, 100, 250, 500, 1000],
    }),
    makeCounterProvider({
      name: METRICS.PRINTS_CREATED_TOTAL,
      help: 'Prints added to the catalog through the API',
    }),
    MetricsService,
    MetricsInterceptor,
  ],
  exports: [PrometheusModule, MetricsService, MetricsInterceptor],
})
export class MetricsModule {}
