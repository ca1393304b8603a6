import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { EnvConfigService } from './env-config.service';
import { validateEnv } from './env.validation';

/**
 * Global configuration module.
 *
 * Loads `.env.local` then `.env`, validates the result with the Zod
 * schema and exposes EnvConfigService everywhere.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnv,
    }),
  ],
  providers: [EnvConfigService],
  exports: [EnvConfigService],
})
export class ConfigModule {}
