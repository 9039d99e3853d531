/**
 * @file config.ts
 * @description Run configuration read from the process environment.
 */

import { z } from 'zod';
import { ConfigError } from './error.js';

/** Names longer than this are cut by the toolchain that built the original. */
export const DEFAULT_NAME_LIMIT = 255;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  BINCORR_NAME_LIMIT: z.coerce.number().int().positive().optional(),
});

export interface Config {
  logLevel: LogLevel;
  /** Maximum symbol name length that can appear in the original's debug data. */
  nameLimit: number;
}

/**
 * Build a Config from environment variables.
 *
 *   LOG_LEVEL           pino level (default `silent` under test, else `info`)
 *   BINCORR_NAME_LIMIT  name truncation limit (default 255)
 *
 * @throws ConfigError when a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`invalid ${issue.path.join('.')}: ${issue.message}`);
  }
  const vars = parsed.data;
  return {
    logLevel: vars.LOG_LEVEL ?? (vars.NODE_ENV === 'test' ? 'silent' : 'info'),
    nameLimit: vars.BINCORR_NAME_LIMIT ?? DEFAULT_NAME_LIMIT,
  };
}
