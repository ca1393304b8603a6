// Module
export { MongoDBModule } from './mongodb.module';
export {
  MongoDBConnectionModule,
  openStoreConnection,
  SERVER_SELECTION_TIMEOUT_MS,
} from './mongodb-connection.module';

// Repositories
export { MongoArtPrintRepository, MongoOrderRepository } from './repositories';

// Schemas
export { ArtPrintDocument, ArtPrintSchema, OrderDocument, OrderSchema } from './schemas';

// Mappers
export { ArtPrintMapper, OrderMapper } from './mappers';

// Serialization
export { serializeDocument, PublicDocument } from './serializers';
