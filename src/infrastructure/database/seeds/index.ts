export { SeedsModule } from './seeds.module';
export { ArtPrintSeederService, SeedResult, CatalogStats } from './art-print-seeder.service';
export { StartupSeeder } from './startup-seeder';
export { ART_PRINTS_SEED_DATA, ArtPrintSeedData } from './art-prints.data';
