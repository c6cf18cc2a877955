/**
 * Environment Configuration
 * Validates process.env once at startup
 */

import { z } from 'zod';

function emptyAsUndefined(value: unknown): unknown {
  return value === '' ? undefined : value;
}

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  SUPABASE_URL: z.string().url('SUPABASE_URL must be a URL'),
  SUPABASE_ANON_KEY: z.string().min(1, 'SUPABASE_ANON_KEY is required'),
  SUPABASE_SERVICE_KEY: z.string().min(1, 'SUPABASE_SERVICE_KEY is required'),

  UPSTASH_REDIS_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  UPSTASH_REDIS_TOKEN: z.preprocess(
    emptyAsUndefined,
    z.string().min(1).optional()
  ),

  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  SUBSCRIPTION_EXPIRY_INTERVAL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(10 * 60 * 1000),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate the environment
 * Throws with every offending variable listed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new Error(`Invalid environment:\n${problems.join('\n')}`);
  }
  return parsed.data;
}
