import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ArtPrintDocument, ArtPrintSchema, OrderDocument, OrderSchema } from './schemas';
import { MongoArtPrintRepository, MongoOrderRepository } from './repositories';

/**
 * Module that configures the MongoDB persistence layer.
 *
 * Registers the `artprint` and `order` schemas and binds the repository
 * implementations to their port tokens.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject('IArtPrintRepository')
 *   private readonly artPrintRepository: IArtPrintRepositoryPort,
 * ) {}
 * ```
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ArtPrintDocument.name, schema: ArtPrintSchema },
      { name: OrderDocument.name, schema: OrderSchema },
    ]),
  ],
  providers: [
    {
      provide: 'IArtPrintRepository',
      useClass: MongoArtPrintRepository,
    },
    {
      provide: 'IOrderRepository',
      useClass: MongoOrderRepository,
    },
  ],
  exports: ['IArtPrintRepository', 'IOrderRepository'],
})
export class MongoDBModule {}
