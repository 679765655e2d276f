import { z } from 'zod';
import { DREAMHOST_API_URL, RATE_LIMIT_COOLDOWN_MS } from './constants.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  DREAMHOST_API_KEY: z
    .string({ required_error: 'API key is required' })
    .trim()
    .min(1, 'API key is required'),
  DREAMHOST_API_URL: z.string().url().default(DREAMHOST_API_URL),
  DREAMHOST_COOLDOWN_SECONDS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(RATE_LIMIT_COOLDOWN_MS / 1000),
  DREAMHOST_TIMEOUT_SECONDS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface SyncConfig {
  apiKey: string;
  baseUrl: string;
  cooldownMs: number;
  timeoutMs?: number;
  logLevel: (typeof LOG_LEVELS)[number];
}

/** Read and validate configuration from environment variables */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    apiKey: vars.DREAMHOST_API_KEY,
    baseUrl: vars.DREAMHOST_API_URL,
    cooldownMs: vars.DREAMHOST_COOLDOWN_SECONDS * 1000,
    timeoutMs:
      vars.DREAMHOST_TIMEOUT_SECONDS === undefined
        ? undefined
        : vars.DREAMHOST_TIMEOUT_SECONDS * 1000,
    logLevel: vars.LOG_LEVEL,
  };
}
