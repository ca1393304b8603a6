import { Injectable } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';

export type OrderEvent = 'created' | 'rejected';

@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Order lifecycle events. Rejections are warnings, not errors:
   * they are client mistakes (unknown print, out of stock).
   */
  logOrderEvent(context: {
    event: OrderEvent;
    orderId?: string;
    itemCount: number;
    total?: number;
    reason?: string;
  }): void {
    const logData = { component: 'order', ...context };

    if (context.event === 'created') {
      this.logger.info(logData, `Order created: ${context.orderId ?? 'unknown'}`);
    } else {
      this.logger.warn(logData, `Order rejected: ${context.reason ?? 'unknown reason'}`);
    }
  }

  logCatalogEvent(context: { event: 'print_created'; printId: string; title: string }): void {
    this.logger.info({ component: 'catalog', ...context }, `Print created: ${context.title}`);
  }
}
