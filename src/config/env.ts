import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_BASE_URL } from '../constants/weather';

// -------------------------------------------------
// Env
// -------------------------------------------------
dotenv.config({ quiet: true });

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// Never throws; bad values fall back to their defaults
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).optional().catch(undefined),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn').catch('warn'),
  OPENWEATHER_BASE_URL: z.string().url().default(DEFAULT_BASE_URL).catch(DEFAULT_BASE_URL),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
