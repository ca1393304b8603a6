import { CallHandler, NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Counter, Histogram } from 'prom-client';
import { lastValueFrom, of, throwError } from 'rxjs';
import { METRICS, MetricsInterceptor, MetricsService } from '@infrastructure/observability/metrics';

describe('MetricsInterceptor', () => {
  let interceptor: MetricsInterceptor;
  let metricsService: MetricsService;
  let recordHttpRequest: jest.SpyInstance;

  const createContext = (
    request: { method: string; path: string; route?: { path: string } },
    statusCode: number,
  ): ExecutionContextHost => new ExecutionContextHost([request, { statusCode }]);

  beforeEach(() => {
    // Unregistered metrics keep tests off the global registry
    metricsService = new MetricsService(
      new Counter({
        name: METRICS.HTTP_REQUESTS_TOTAL,
        help: 'test',
        labelNames: ['method', 'path', 'status'],
        registers: [],
      }),
      new Counter({
        name: METRICS.ORDERS_TOTAL,
        help: 'test',
        labelNames: ['outcome'],
        registers: [],
      }),
      new Histogram({
        name: METRICS.HTTP_REQUEST_DURATION,
        help: 'test',
        labelNames: ['method', 'path', 'status'],
        registers: [],
      }),
      new Histogram({ name: METRICS.ORDER_VALUE, help: 'test', registers: [] }),
      new Counter({ name: METRICS.PRINTS_CREATED_TOTAL, help: 'test', registers: [] }),
    );
    recordHttpRequest = jest.spyOn(metricsService, 'recordHttpRequest');
    interceptor = new MetricsInterceptor(metricsService);
  });

  it('should record successful requests under the route template', async () => {
    // Arrange
    const context = createContext(
      {
        method: 'GET',
        path: '/api/prints/64b7f0c2a1b2c3d4e5f60701',
        route: { path: '/api/prints/:id' },
      },
      200,
    );
    const next: CallHandler = { handle: () => of({ ok: true }) };

    // Act
    await lastValueFrom(interceptor.intercept(context, next));

    // Assert
    expect(recordHttpRequest).toHaveBeenCalledWith(
      'GET',
      '/api/prints/:id',
      200,
      expect.any(Number),
    );
  });

  it('should collapse ObjectIds when no route template is known', async () => {
    // Arrange
    const context = createContext(
      { method: 'GET', path: '/api/orders/64b7f0c2a1b2c3d4e5f60799' },
      404,
    );
    const next: CallHandler = { handle: () => of(null) };

    // Act
    await lastValueFrom(interceptor.intercept(context, next));

    // Assert
    expect(recordHttpRequest).toHaveBeenCalledWith(
      'GET',
      '/api/orders/:id',
      404,
      expect.any(Number),
    );
  });

  it('should take the status from a thrown HttpException', async () => {
    // Arrange
    const context = createContext(
      { method: 'POST', path: '/api/orders', route: { path: '/api/orders' } },
      200,
    );
    const next: CallHandler = { handle: () => throwError(() => new NotFoundException()) };

    // Act
    await expect(lastValueFrom(interceptor.intercept(context, next))).rejects.toBeInstanceOf(
      NotFoundException,
    );

    // Assert
    expect(recordHttpRequest).toHaveBeenCalledWith('POST', '/api/orders', 404, expect.any(Number));
  });

  it('should count unknown errors as 500', async () => {
    // Arrange
    const context = createContext(
      { method: 'POST', path: '/api/orders', route: { path: '/api/orders' } },
      200,
    );
    const next: CallHandler = { handle: () => throwError(() => new Error('boom')) };

    // Act
    await expect(lastValueFrom(interceptor.intercept(context, next))).rejects.toThrow('boom');

    // Assert
    expect(recordHttpRequest).toHaveBeenCalledWith('POST', '/api/orders', 500, expect.any(Number));
  });
});

describe('MetricsService', () => {
  it('should count orders by outcome', async () => {
    // Arrange
    const ordersCounter = new Counter({
      name: METRICS.ORDERS_TOTAL,
      help: 'test',
      labelNames: ['outcome'],
      registers: [],
    });
    const service = new MetricsService(
      new Counter({ name: METRICS.HTTP_REQUESTS_TOTAL, help: 'test', registers: [] }),
      ordersCounter,
      new Histogram({ name: METRICS.HTTP_REQUEST_DURATION, help: 'test', registers: [] }),
      new Histogram({ name: METRICS.ORDER_VALUE, help: 'test', registers: [] }),
      new Counter({ name: METRICS.PRINTS_CREATED_TOTAL, help: 'test', registers: [] }),
    );

    // Act
    service.recordOrder('created');
    service.recordOrder('created');
    service.recordOrder('rejected');

    // Assert
    const { values } = await ordersCounter.get();
    expect(values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ labels: { outcome: 'created' }, value: 2 }),
        expect.objectContaining({ labels: { outcome: 'rejected' }, value: 1 }),
      ]),
    );
  });

  it('should observe the value of created orders', async () => {
    // Arrange
    const orderValue = new Histogram({ name: METRICS.ORDER_VALUE, help: 'test', registers: [] });
    const service = new MetricsService(
      new Counter({ name: METRICS.HTTP_REQUESTS_TOTAL, help: 'test', registers: [] }),
      new Counter({ name: METRICS.ORDERS_TOTAL, help: 'test', registers: [] }),
      new Histogram({ name: METRICS.HTTP_REQUEST_DURATION, help: 'test', registers: [] }),
      orderValue,
      new Counter({ name: METRICS.PRINTS_CREATED_TOTAL, help: 'test', registers: [] }),
    );

    // Act
    service.recordOrderValue(98);
    service.recordOrderValue(32.25);

    // Assert
    const { values } = await orderValue.get();
    expect(values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ metricName: 'storefront_order_value_sum', value: 130.25 }),
        expect.objectContaining({ metricName: 'storefront_order_value_count', value: 2 }),
      ]),
    );
  });
});
