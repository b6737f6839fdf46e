import { z } from 'zod';
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '@tablesweep/extractor';

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000'),

  // API
  API_PREFIX: z.string().default('api'),
  THROTTLE_TTL: z.string().default('60'),
  THROTTLE_LIMIT: z.string().default('30'),

  // CORS
  CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:5173'),

  // Page fetching
  FETCH_TIMEOUT_MS: z.string().regex(/^\d+$/, 'FETCH_TIMEOUT_MS must be a whole number of milliseconds').default(String(DEFAULT_TIMEOUT)),
  FETCH_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),

  // Static home page served at /
  HOME_PAGE_PATH: z.string().default('public/index.html'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
