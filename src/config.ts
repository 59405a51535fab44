import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const configSchema = z.object({
  port: z.number().int().positive().default(3000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  ballDontLieApiKey: z.string().min(1).optional(),
  ballDontLieApiBaseUrl: z.string().url().default('https://api.balldontlie.io/v1'),
  apiRateLimitDelayMs: z.number().int().nonnegative().default(0),
  cacheDriver: z.enum(['file', 'memory', 'none']).default('file'),
  cacheDir: z.string().default('data'),
  cacheTtlSeconds: z.number().int().nonnegative().default(0),
  rateLimitMaxRequests: z.number().int().positive().default(100),
  rateLimitWindowMs: z.number().int().positive().default(60_000),
  corsOrigins: z.array(z.string()).default(['*']),
  googleTokenPath: z.string().default('token.json'),
  calendarTimeZone: z.string().default('America/New_York'),
});

export type AppConfig = z.infer<typeof configSchema>;

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return configSchema.parse({
    port: parseInteger(env.PORT),
    nodeEnv: env.NODE_ENV,
    ballDontLieApiKey: env.BALLDONTLIE_API_KEY || undefined,
    ballDontLieApiBaseUrl: env.BALLDONTLIE_API_BASE_URL,
    apiRateLimitDelayMs: parseInteger(env.API_RATE_LIMIT_DELAY_MS),
    cacheDriver: env.CACHE_DRIVER,
    cacheDir: env.CACHE_DIR,
    cacheTtlSeconds: parseInteger(env.CACHE_TTL_SECONDS),
    rateLimitMaxRequests: parseInteger(env.RATE_LIMIT_MAX_REQUESTS),
    rateLimitWindowMs: parseInteger(env.RATE_LIMIT_WINDOW_MS),
    corsOrigins: parseList(env.CORS_ORIGINS),
    googleTokenPath: env.GOOGLE_TOKEN_PATH,
    calendarTimeZone: env.CALENDAR_TIME_ZONE,
  });
}

export const config = loadConfig();
