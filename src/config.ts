import 'dotenv/config';
import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  SAPI_ENDPOINT: z.string().url().default('https://cloud.dwavesys.com/sapi/v2/'),
  SAPI_TOKEN: z
    .string()
    .optional()
    .transform((token) => token || undefined),
  SAPI_REQUEST_TIMEOUT_SEC: z.string().regex(/^\d+$/, 'Expected a whole number of seconds').default('60'),
  SAPI_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface Config {
  endpoint: string;
  token?: string;
  requestTimeoutSec: number;
  logLevel: LogLevel;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const env = envSchema.parse(source);
  return {
    endpoint: env.SAPI_ENDPOINT,
    token: env.SAPI_TOKEN,
    requestTimeoutSec: parseInt(env.SAPI_REQUEST_TIMEOUT_SEC, 10),
    logLevel: env.SAPI_LOG_LEVEL,
  };
}

export const config = loadConfig();
