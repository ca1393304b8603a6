import { Module } from '@nestjs/common';
import { MongoDBConnectionModule } from '@infrastructure/adapters/persistence/mongodb';
import { ConfigModule } from '@infrastructure/config';
import { SeedsModule } from '@infrastructure/database/seeds';

/**
 * Module for CLI commands.
 *
 * Entry point for nest-commander; provides catalog seeding.
 */
@Module({
  imports: [
    ConfigModule,
    MongoDBConnectionModule,
    SeedsModule,
  ],
})
export class CliModule {}
