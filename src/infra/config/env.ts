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
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),
  TRUST_PROXY: Type.Boolean({ default: false }),

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

  // Database (optional: without it the record store reports itself unavailable)
  DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),

  // Blob storage
  UPLOAD_DIR: Type.String({ minLength: 1, default: './uploads' }),
  MAX_UPLOAD_BYTES: Type.Integer({ minimum: 1, default: 52_428_800 }),

  // Songs
  PUBLIC_BASE_URL: Type.Optional(Type.String({ minLength: 1 })),
  SLUG_STRATEGY: Type.Union([Type.Literal('readable'), Type.Literal('token')], {
    default: 'readable',
  }),
  SLUG_MAX_ATTEMPTS: Type.Integer({ minimum: 1, maximum: 20, default: 5 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

const parseBoolean = (value: string | undefined): boolean | string => {
  if (value == null || value === '') return false;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  // Left as a string so validation reports it
  return value;
};

const optionalString = (value: string | undefined): string | undefined =>
  value != null && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const databaseUrl = optionalString(env['DATABASE_URL']);
  const publicBaseUrl = optionalString(env['PUBLIC_BASE_URL']);
  const allowedOrigins = optionalString(env['ALLOWED_ORIGINS']);
  const clientBaseUrl = optionalString(env['CLIENT_BASE_URL']);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    TRUST_PROXY: parseBoolean(env['TRUST_PROXY']),
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    UPLOAD_DIR: env['UPLOAD_DIR'] ?? './uploads',
    MAX_UPLOAD_BYTES: parseInteger(env['MAX_UPLOAD_BYTES'], 52_428_800),
    SLUG_STRATEGY: env['SLUG_STRATEGY'] ?? 'readable',
    SLUG_MAX_ATTEMPTS: parseInteger(env['SLUG_MAX_ATTEMPTS'], 5),
    ...(databaseUrl !== undefined && { DATABASE_URL: databaseUrl }),
    ...(publicBaseUrl !== undefined && { PUBLIC_BASE_URL: publicBaseUrl }),
    ...(allowedOrigins !== undefined && { ALLOWED_ORIGINS: allowedOrigins }),
    ...(clientBaseUrl !== undefined && { CLIENT_BASE_URL: clientBaseUrl }),
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
    port: env.PORT,
    host: env.HOST,
    trustProxy: env.TRUST_PROXY,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  storage: {
    uploadDir: env.UPLOAD_DIR,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
  },
  songs: {
    /** Prefix for download/metadata URLs; relative URLs when unset */
    publicBaseUrl: env.PUBLIC_BASE_URL,
    slugStrategy: env.SLUG_STRATEGY,
    slugMaxAttempts: env.SLUG_MAX_ATTEMPTS,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
