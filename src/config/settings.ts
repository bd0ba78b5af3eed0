import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const DEVELOPMENT_SECRET = 'development-session-secret';

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),
    DATABASE_PATH: z.string().min(1).default('freelance-board.db'),
    SESSION_SECRET: z.string().min(1).optional(),
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
    CORS_ORIGIN: z.string().default('*'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .refine((env) => env.NODE_ENV !== 'production' || env.SESSION_SECRET !== undefined, {
    message: 'SESSION_SECRET is required in production',
    path: ['SESSION_SECRET'],
  });

export type Settings = {
  env: 'development' | 'production' | 'test';
  port: number;
  host: string;
  databasePath: string;
  sessionSecret: string;
  sessionTtlSeconds: number;
  bcryptRounds: number;
  corsOrigins: string[] | '*';
  logLevel: 'debug' | 'info' | 'warn' | 'error';
};

export const loadSettings = (source: NodeJS.ProcessEnv = process.env): Settings => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const env = parsed.data;
  const origins = env.CORS_ORIGIN.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  const result: Settings = {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    databasePath: env.DATABASE_PATH,
    sessionSecret: env.SESSION_SECRET ?? DEVELOPMENT_SECRET,
    sessionTtlSeconds: env.SESSION_TTL_SECONDS,
    bcryptRounds: env.BCRYPT_ROUNDS,
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
    logLevel: env.LOG_LEVEL,
  };
  return Object.freeze(result);
};

let cached: Settings | undefined;

/** Loads once and reuses the result; throws while the environment is invalid. */
export const getSettings = (): Settings => {
  cached ??= loadSettings();
  return cached;
};
