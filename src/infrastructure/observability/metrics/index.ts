export { MetricsModule } from './metrics.module';
export { MetricsService, OrderOutcome } from './metrics.service';
export { MetricsInterceptor } from './metrics.interceptor';
export { METRICS } from './metrics.constants';
