import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, ConnectionStates } from 'mongoose';
import { IArtPrintRepositoryPort } from '@application/ports/outbound';
import { ArtPrint, ArtPrintDraft } from '@domain/entities';
import { ART_PRINTS_SEED_DATA, ArtPrintSeedData } from './art-prints.data';

export type SeedResult =
  | { status: 'seeded'; inserted: number }
  | { status: 'skipped'; reason: string }
  | { status: 'unavailable'; reason: string };

export interface CatalogStats {
  totalPrints: number;
  featuredPrints: number;
}

/**
 * Service responsible for seeding the print catalog.
 */
@Injectable()
export class ArtPrintSeederService {
  private readonly logger = new Logger(ArtPrintSeederService.name);

  constructor(
    @Inject('IArtPrintRepository')
    private readonly artPrintRepository: IArtPrintRepositoryPort,
    @InjectConnection()
    private readonly connection: Connection,
  ) {}

  /**
   * Inserts the sample catalog when the collection is empty.
   * Never throws: a store failure is reported as `unavailable`.
   */
  async seedIfEmpty(): Promise<SeedResult> {
    if (this.connection.readyState !== ConnectionStates.connected) {
      const reason = 'Store is not connected';
      this.logger.warn(`Catalog seed skipped: ${reason}`);
      return { status: 'unavailable', reason };
    }

    try {
      const existing = await this.artPrintRepository.count();
      if (existing > 0) {
        this.logger.log(`Catalog already holds ${existing} prints, nothing to seed`);
        return { status: 'skipped', reason: `Catalog already holds ${existing} prints` };
      }

      const inserted = await this.artPrintRepository.createMany(this.createDraftsFromSeedData());
      this.logger.log(`Seeded ${inserted} sample prints`);
      return { status: 'seeded', inserted };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Catalog seed failed: ${reason}`);
      return { status: 'unavailable', reason };
    }
  }

  async getStats(): Promise<CatalogStats> {
    const [totalPrints, featuredPrints] = await Promise.all([
      this.artPrintRepository.count(),
      this.artPrintRepository.count({ featured: true }),
    ]);

    return { totalPrints, featuredPrints };
  }

  private createDraftsFromSeedData(): ArtPrintDraft[] {
    return ART_PRINTS_SEED_DATA.map((data) => this.seedDataToDraft(data));
  }

  private seedDataToDraft(data: ArtPrintSeedData): ArtPrintDraft {
    return ArtPrint.draft({
      title: data.title,
      artist: data.artist,
      description: data.description,
      price: data.price,
      size: data.size,
      imageUrl: data.imageUrl,
      tags: data.tags,
      inStock: data.inStock,
      featured: data.featured,
    });
  }
}
