import { z } from 'zod';

/** Treat empty strings as undefined so optional env vars don't fail .min(1) */
const optionalKey = z.string().min(1).optional().or(z.literal('').transform(() => undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(5004),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DATABASE_PATH: z.string().min(1).default('data/radar.db'),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  PLACES_API_KEY: optionalKey,
  PLACES_API_BASE_URL: z.string().url().default('https://api.foursquare.com/v3/places'),
  PLACES_RATE_LIMIT_PER_HOUR: z.coerce.number().int().min(1).default(50),
  PLACES_RATE_LIMIT_POLICY: z.enum(['wait', 'fail_fast']).default('wait'),
  PLACES_RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().min(0).default(30_000),
  PLACES_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).default(15_000),
  PLACES_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  PLACES_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  DEFAULT_LATITUDE: z.coerce.number().min(-90).max(90).default(40.7128),
  DEFAULT_LONGITUDE: z.coerce.number().min(-180).max(180).default(-74.006),
  DEFAULT_RADIUS_METERS: z.coerce.number().int().min(100).max(5000).default(1000),
  DEFAULT_SCAN_INTERVAL_MINUTES: z.coerce.number().int().min(15).default(60),
});

export type Environment = z.infer<typeof envSchema>;

let env: Environment | undefined;

export function loadEnvironment(): Environment {
  if (env) return env;
  env = envSchema.parse(process.env);
  return env;
}

export function getEnv(): Environment {
  return env ?? loadEnvironment();
}
