import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvConfig } from './env.validation';

/**
 * Typed configuration service for environment variables.
 *
 * Values are validated by the Zod schema at startup, so required
 * ones are always present here.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): EnvConfig['PORT'] {
    return this.configService.get('PORT', { infer: true });
  }

  get databaseUrl(): EnvConfig['DATABASE_URL'] {
    return this.configService.get('DATABASE_URL', { infer: true });
  }

  get databaseName(): EnvConfig['DATABASE_NAME'] {
    return this.configService.get('DATABASE_NAME', { infer: true });
  }

  get corsOrigins(): EnvConfig['CORS_ORIGINS'] {
    return this.configService.get('CORS_ORIGINS', { infer: true });
  }

  get allowsAnyOrigin(): boolean {
    return this.corsOrigins.length === 0 || this.corsOrigins.includes('*');
  }

  get isDevelopment(): boolean {
    return this.nodeEnv === 'development';
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.nodeEnv === 'test';
  }
}
