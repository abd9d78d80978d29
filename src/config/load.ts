import dotenv from 'dotenv';
import type { LogLevel } from '../core/logger.js';
import { configSchema, logLevelSchema } from './schema.js';
import type { AppConfig } from './types.js';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || '.env' });

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Config validation failed: ${details}`);
  }
  return parsed.data;
};

/** LOG_LEVEL for loggers built before any config is loaded; unset or unknown means info. */
export const defaultLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const parsed = logLevelSchema.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
};
