import { z } from 'zod';

const MONGO_URL_PATTERN = /^mongodb(\+srv)?:\/\/.+/;

/**
 * Environment variables schema using Zod.
 *
 * Validated once at startup; a bad value stops the process with a list of
 * every offending variable.
 */
export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z
    .string()
    .default('8000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive().max(65535)),

  // MongoDB; unset or blank runs the service without a store
  DATABASE_URL: z.preprocess(
    (val) => (typeof val === 'string' && val.trim() === '' ? undefined : val),
    z
      .string()
      .regex(MONGO_URL_PATTERN, { message: 'DATABASE_URL must be a mongodb:// or mongodb+srv:// URL' })
      .optional(),
  ),
  DATABASE_NAME: z.string().trim().min(1).optional(),

  // HTTP
  CORS_ORIGINS: z
    .string()
    .default('*')
    .transform((val) =>
      val
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    ),
});

/**
 * Inferred TypeScript type from the env schema.
 */
export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates environment variables using Zod schema.
 *
 * Passed to ConfigModule.forRoot() as `validate`.
 *
 * @param config - Raw environment variables from process.env
 * @returns Validated and transformed configuration
 * @throws Error listing each failed variable
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(
      `\nEnvironment validation failed:\n${errors}\n\nPlease check your .env file or environment variables.`,
    );
  }

  return result.data;
}
