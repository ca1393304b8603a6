import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import { PinoLogger } from 'nestjs-pino';
import { AppLoggerService, buildHttpLoggerOptions } from '@infrastructure/observability/logging';

describe('buildHttpLoggerOptions', () => {
  const incoming = (headers: IncomingMessage['headers']): IncomingMessage => {
    const req = new IncomingMessage(new Socket());
    req.headers = headers;
    return req;
  };

  it('should silence logs under test', () => {
    const options = buildHttpLoggerOptions({ isProduction: false, isTest: true });

    expect(options.level).toBe('silent');
  });

  it('should log JSON at info level in production', () => {
    const options = buildHttpLoggerOptions({ isProduction: true, isTest: false });

    expect(options.level).toBe('info');
    expect(options.transport).toBeUndefined();
  });

  it('should pretty print at debug level in development', () => {
    const options = buildHttpLoggerOptions({ isProduction: false, isTest: false });

    expect(options.level).toBe('debug');
    expect(options.transport).toMatchObject({ target: 'pino-pretty' });
  });

  it('should reuse the incoming request id header', () => {
    // Arrange
    const options = buildHttpLoggerOptions({ isProduction: true, isTest: false });
    const req = incoming({ 'x-request-id': 'req-42' });

    // Act
    const id = options.genReqId?.(req, new ServerResponse(req));

    // Assert
    expect(id).toBe('req-42');
  });

  it('should generate a request id when none is sent', () => {
    const options = buildHttpLoggerOptions({ isProduction: true, isTest: false });
    const req = incoming({});

    const id = options.genReqId?.(req, new ServerResponse(req));

    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should pick the level from the response status', () => {
    const options = buildHttpLoggerOptions({ isProduction: true, isTest: false });
    const req = incoming({});
    const res = new ServerResponse(req);

    res.statusCode = 201;
    expect(options.customLogLevel?.(req, res, undefined)).toBe('info');
    res.statusCode = 404;
    expect(options.customLogLevel?.(req, res, undefined)).toBe('warn');
    res.statusCode = 503;
    expect(options.customLogLevel?.(req, res, undefined)).toBe('error');
  });
});

describe('AppLoggerService', () => {
  let service: AppLoggerService;
  let info: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    const pino = new PinoLogger({});
    info = jest.spyOn(pino, 'info').mockImplementation(() => undefined);
    warn = jest.spyOn(pino, 'warn').mockImplementation(() => undefined);
    service = new AppLoggerService(pino);
  });

  it('should log created orders at info level', () => {
    service.logOrderEvent({ event: 'created', orderId: 'abc', itemCount: 2, total: 98 });

    expect(info).toHaveBeenCalledWith(
      { component: 'order', event: 'created', orderId: 'abc', itemCount: 2, total: 98 },
      'Order created: abc',
    );
  });

  it('should log rejected orders as warnings', () => {
    service.logOrderEvent({ event: 'rejected', itemCount: 0, reason: 'empty' });

    expect(warn).toHaveBeenCalledWith(
      { component: 'order', event: 'rejected', itemCount: 0, reason: 'empty' },
      'Order rejected: empty',
    );
  });

  it('should log created prints', () => {
    service.logCatalogEvent({ event: 'print_created', printId: 'p1', title: 'Coastal Mist' });

    expect(info).toHaveBeenCalledWith(
      { component: 'catalog', event: 'print_created', printId: 'p1', title: 'Coastal Mist' },
      'Print created: Coastal Mist',
    );
  });
});
