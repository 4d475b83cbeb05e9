import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(30),
  SESSION_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
  LIST_LIMIT: z.coerce.number().int().positive().default(20),
  MATCH_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.6),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
  corsOrigin: string;
  maxUploadBytes: number;
  sessionTtlSeconds: number;
  listLimit: number;
  matchThreshold: number;
  rateLimit: {
    windowMs: number;
    requests: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const c = parsed.data;
  return {
    port: c.PORT,
    host: c.HOST,
    env: c.NODE_ENV,
    corsOrigin: c.CORS_ORIGIN,
    maxUploadBytes: Math.round(c.MAX_UPLOAD_MB * 1024 * 1024),
    sessionTtlSeconds: c.SESSION_TTL_SECONDS,
    listLimit: c.LIST_LIMIT,
    matchThreshold: c.MATCH_THRESHOLD,
    rateLimit: {
      windowMs: c.RATE_LIMIT_WINDOW_MS,
      requests: c.RATE_LIMIT_REQUESTS,
    },
  };
}
