/**
 * Runtime configuration, read once from the environment (and .env via dotenv).
 */

import { z } from 'zod';

export const DEV_BOARDING_TOKEN_SECRET = 'dev-boarding-token-secret';

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
    STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().min(1).optional(),
    BOARDING_TOKEN_SECRET: z.string().min(1).optional(),
    CORS_ORIGIN: z.string().min(1).default('*'),
    HTTP_LOG_FORMAT: z.string().min(1).default('combined'),
  })
  .refine((env) => env.NODE_ENV !== 'production' || env.BOARDING_TOKEN_SECRET !== undefined, {
    message: 'BOARDING_TOKEN_SECRET must be set in production',
    path: ['BOARDING_TOKEN_SECRET'],
  })
  .transform((env, ctx) => {
    if (env.STORE_DRIVER === 'memory') {
      const store: StoreConfig = { driver: 'memory' };
      return { ...env, store };
    }
    if (env.DATABASE_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
        path: ['DATABASE_URL'],
      });
      return z.NEVER;
    }
    const store: StoreConfig = { driver: 'postgres', databaseUrl: env.DATABASE_URL };
    return { ...env, store };
  });

export type StoreConfig =
  | { driver: 'postgres'; databaseUrl: string }
  | { driver: 'memory' };

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  store: StoreConfig;
  boardingTokenSecret: string;
  /** True when the built-in development secret is in use. */
  usingDevSecret: boolean;
  corsOrigin: string;
  /** morgan format name or string; 'off' disables request logging. */
  httpLogFormat: string;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);
  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    store: env.store,
    boardingTokenSecret: env.BOARDING_TOKEN_SECRET ?? DEV_BOARDING_TOKEN_SECRET,
    usingDevSecret: env.BOARDING_TOKEN_SECRET === undefined,
    corsOrigin: env.CORS_ORIGIN,
    httpLogFormat: env.HTTP_LOG_FORMAT,
  };
}
