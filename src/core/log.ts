/**
 * @file log.ts
 * @description pino logger factory.  Components take a `Logger` in their
 * constructor and fall back to one of these.
 */

import { pino, type Logger } from 'pino';
import { loadConfig, type Config } from './config.js';

export type { Logger };

export function createLogger(name: string, config: Config = loadConfig()): Logger {
  return pino({ name, level: config.logLevel });
}
