import { Global, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { getConnectionToken, InjectConnection } from '@nestjs/mongoose';
import mongoose, { Connection } from 'mongoose';
import { EnvConfigService } from '@infrastructure/config';

export const SERVER_SELECTION_TIMEOUT_MS = 5000;

type StoreSettings = Pick<EnvConfigService, 'databaseUrl' | 'databaseName'>;

const logger = new Logger('MongoDBConnection');

/**
 * Creates the process-wide connection and makes a single attempt to open it.
 *
 * Without a URL, or when that attempt fails, the connection stays
 * disconnected: health routes report it, seeding is skipped and the
 * store guard answers 503.
 */
export async function openStoreConnection(settings: StoreSettings): Promise<Connection> {
  const connection = mongoose.createConnection();

  if (!settings.databaseUrl) {
    logger.warn('DATABASE_URL is not set, running without a store');
    return connection;
  }

  try {
    await connection.openUri(settings.databaseUrl, {
      dbName: settings.databaseName,
      serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS,
    });
    logger.log(`Connected to database "${connection.name}"`);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    logger.warn(`Store connection failed: ${detail}`);
  }

  return connection;
}

/**
 * Registers the shared connection under the default @nestjs/mongoose token,
 * so `MongooseModule.forFeature` and `@InjectConnection()` resolve it.
 */
@Global()
@Module({
  providers: [
    {
      provide: getConnectionToken(),
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService) => openStoreConnection(config),
    },
  ],
  exports: [getConnectionToken()],
})
export class MongoDBConnectionModule implements OnApplicationShutdown {
  constructor(@InjectConnection() private readonly connection: Connection) {}

  async onApplicationShutdown(): Promise<void> {
    await this.connection.close();
  }
}
