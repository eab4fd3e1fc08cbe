/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Categories provider
  CATEGORIES_PROVIDER: Type.Union([Type.Literal('memory'), Type.Literal('postgres')], {
    default: 'memory',
  }),
  CATEGORIES_SEED_FILE: Type.Optional(Type.String({ minLength: 1 })),
  DATABASE_URL: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === '' ? undefined : value;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv: Record<string, unknown> = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    CATEGORIES_PROVIDER: env['CATEGORIES_PROVIDER'] ?? 'memory',
    CATEGORIES_SEED_FILE: emptyToUndefined(env['CATEGORIES_SEED_FILE']),
    DATABASE_URL: emptyToUndefined(env['DATABASE_URL']),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  categories: {
    provider: env.CATEGORIES_PROVIDER,
    /** YAML file with initial categories for the in-memory provider */
    seedFile: env.CATEGORIES_SEED_FILE,
  },
  database: {
    url: env.DATABASE_URL,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
