import { Module } from '@nestjs/common';
import { MongoDBModule } from '@infrastructure/adapters/persistence/mongodb';
import { ArtPrintSeederService } from './art-print-seeder.service';
import { SeedCommand } from './seed.command';

/**
 * Catalog seeding, shared by the HTTP app (on bootstrap) and the CLI.
 * StartupSeeder is not registered here; AppModule adds it so the CLI
 * seeds only when asked.
 */
@Module({
  imports: [MongoDBModule],
  providers: [ArtPrintSeederService, SeedCommand],
  exports: [ArtPrintSeederService],
})
export class SeedsModule {}
