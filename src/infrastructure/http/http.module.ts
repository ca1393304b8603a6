import { Module } from '@nestjs/common';
import { MongoDBModule } from '@infrastructure/adapters/persistence/mongodb';
import { LoggerModule } from '@infrastructure/observability/logging';
import { MetricsModule } from '@infrastructure/observability/metrics';
import { CatalogUseCase, CreateOrderUseCase } from '@application/use-cases';
import { HealthController, OrdersController, PrintsController } from './controllers';
import { StoreAvailableGuard } from './guards';

/**
 * HTTP Module that configures all REST API endpoints.
 *
 * Use cases are bound to string tokens so controllers depend on the
 * inbound ports rather than the classes.
 */
@Module({
  imports: [MongoDBModule, LoggerModule, MetricsModule],
  controllers: [HealthController, PrintsController, OrdersController],
  providers: [
    StoreAvailableGuard,
    {
      provide: 'CreateOrderUseCase',
      useClass: CreateOrderUseCase,
    },
    {
      provide: 'CatalogUseCase',
      useClass: CatalogUseCase,
    },
  ],
})
export class HttpModule {}
