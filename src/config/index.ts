import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export const SERVER_NAME = 'metavault-mapping-mcp';
export const SERVER_VERSION = '0.1.0';

const SettingsSchema = z.object({
  METAVAULT_BASE_URL: z
    .string({ required_error: 'METAVAULT_BASE_URL is required' })
    .trim()
    .min(1, 'METAVAULT_BASE_URL is required')
    .url('METAVAULT_BASE_URL must be an absolute URL')
    .transform((value) => value.replace(/\/+$/, '')),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  HTTP_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  METAVAULT_API_TOKEN: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

/**
 * Runtime settings for the remote service connection
 */
export interface Settings {
  baseUrl: string;
  requestTimeoutMs: number;
  maxAttempts: number;
  apiToken?: string;
}

let dotenvLoaded = false;

/**
 * Loads the `.env` file of the working directory into `process.env` once,
 * without overriding variables already set.
 */
export function loadEnvironment(): void {
  if (!dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }
}

/**
 * Reads settings from the environment, after `.env` has been loaded.
 * LOG_LEVEL is only validated here; the root logger reads it when it is created.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  if (env === process.env) {
    loadEnvironment();
  }

  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue.path.join('.') || 'environment';
    throw new ConfigurationError(`Invalid configuration for ${variable}: ${issue.message}`);
  }

  const values = parsed.data;
  return {
    baseUrl: values.METAVAULT_BASE_URL,
    requestTimeoutMs: values.REQUEST_TIMEOUT_SECONDS * 1000,
    maxAttempts: values.HTTP_MAX_ATTEMPTS,
    apiToken: values.METAVAULT_API_TOKEN,
  };
}
