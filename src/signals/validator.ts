import { defaultLogLevel } from '../config/load.js';
import { InvalidFormatError } from '../core/errors.js';
import { JsonLogger, safeLogger, stderrSink, type Logger } from '../core/logger.js';
import type { RawMessage, ValidatedMessage } from '../core/types.js';
import { marketDataSchema, type MessageSchema } from './messageSchema.js';

export interface ValidatorDeps {
  schema?: MessageSchema;
  logger?: Logger;
}

const defaultLogger = new JsonLogger(defaultLogLevel(), stderrSink).child('signals.validator');

const isRecord = (value: unknown): value is RawMessage =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Gate a raw message through the schema. The returned value is the input
 * itself; only its type changes.
 *
 * @throws InvalidFormatError when the input is not a mapping or the schema rejects it
 */
export const validateInputMessage = (message: unknown, deps: ValidatorDeps = {}): ValidatedMessage => {
  const schema = deps.schema ?? marketDataSchema;
  const logger = safeLogger(deps.logger ?? defaultLogger);

  logger.debug('validating message schema', { schema: schema.name });

  const passes = (value: unknown): value is ValidatedMessage => isRecord(value) && schema.validate(value);
  if (!passes(message)) {
    logger.error('invalid message schema', { schema: schema.name, payload: message });
    throw new InvalidFormatError(message);
  }
  return message;
};
