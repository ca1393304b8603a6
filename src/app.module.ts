import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import {
  MongoDBConnectionModule,
  MongoDBModule,
} from '@infrastructure/adapters/persistence/mongodb';
import { ConfigModule } from '@infrastructure/config';
import { SeedsModule, StartupSeeder } from '@infrastructure/database/seeds';
import { HttpModule } from '@infrastructure/http';
import { LoggerModule } from '@infrastructure/observability/logging';
import { MetricsInterceptor, MetricsModule } from '@infrastructure/observability/metrics';

@Module({
  imports: [
    // Validated environment, available everywhere
    ConfigModule,

    LoggerModule,

    // Single process-wide connection, closed on shutdown; startup does not wait for the store
    MongoDBConnectionModule,

    MongoDBModule,
    SeedsModule,
    MetricsModule,
    HttpModule,
  ],
  providers: [
    StartupSeeder,
    {
      provide: APP_INTERCEPTOR,
      useClass: MetricsInterceptor,
    },
  ],
})
export class AppModule {}
