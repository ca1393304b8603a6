export { ConfigModule } from './config.module';
export { EnvConfigService } from './env-config.service';
export { envSchema, validateEnv, EnvConfig } from './env.validation';
