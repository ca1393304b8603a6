import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ArtPrintSeederService } from './art-print-seeder.service';

/**
 * Seeds the catalog once the HTTP application has bootstrapped.
 */
@Injectable()
export class StartupSeeder implements OnApplicationBootstrap {
  constructor(private readonly seederService: ArtPrintSeederService) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.seederService.seedIfEmpty();
  }
}
