import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const rawSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  MESSAGE_SCHEMA: z.enum(['market_data', 'permissive']).default('market_data')
});

export const configSchema = rawSchema.transform((raw) => ({
  logLevel: raw.LOG_LEVEL,
  messageSchema: raw.MESSAGE_SCHEMA
}));
