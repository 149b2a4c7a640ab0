/**
 * Environment configuration for the drill API, read and validated once at startup.
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  DRILL_API_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60_000),
  CORS_ORIGINS: z.string().optional(),
  ALLOWED_ORIGINS: z.string().optional(),
  DRILL_CACHE_CAPACITY: z.coerce.number().int().positive().default(1000),
  DRILL_HERO_PLAYER_ID: z.coerce.number().int().nonnegative().default(1),
});

export interface DrillApiConfig {
  production: boolean;
  port: number;
  host: string;
  logLevel: (typeof LOG_LEVELS)[number];
  rateLimitMax: number;
  /** Milliseconds. */
  rateLimitWindow: number;
  corsOrigins: string[];
  cacheCapacity: number;
  heroPlayerId: number;
}

const DEV_ORIGINS = ['http://localhost:3000'];

/**
 * ALLOWED_ORIGINS takes precedence over CORS_ORIGINS. Production must name
 * its origins explicitly and may not use a wildcard.
 */
export function resolveCorsOrigins(raw: string | undefined, production: boolean): string[] {
  if (production) {
    if (!raw) {
      throw new Error(
        'CORS_ORIGINS (or ALLOWED_ORIGINS) must be set in production. Example: CORS_ORIGINS=https://example.com',
      );
    }
    const origins = splitOrigins(raw);
    if (origins.includes('*')) {
      throw new Error('CORS_ORIGINS must not contain wildcard (*) in production.');
    }
    return origins;
  }
  return raw ? splitOrigins(raw) : [...DEV_ORIGINS];
}

function splitOrigins(raw: string): string[] {
  return raw
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DrillApiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid drill API environment: ${detail}`);
  }
  const vars = parsed.data;
  const production = vars.NODE_ENV === 'production';
  return {
    production,
    port: vars.DRILL_API_PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    rateLimitMax: vars.RATE_LIMIT_MAX,
    rateLimitWindow: vars.RATE_LIMIT_WINDOW,
    corsOrigins: resolveCorsOrigins(vars.ALLOWED_ORIGINS ?? vars.CORS_ORIGINS, production),
    cacheCapacity: vars.DRILL_CACHE_CAPACITY,
    heroPlayerId: vars.DRILL_HERO_PLAYER_ID,
  };
}
