import { z } from 'zod';
import type { RawMessage } from '../core/types.js';
/** Boolean classifier deciding whether a raw message is well-formed. */
export interface MessageSchema {
  readonly name: string;
  validate(message: RawMessage): boolean;
}

export type MessageSchemaKind = 'market_data' | 'permissive';

export class ZodMessageSchema implements MessageSchema {
  constructor(
    readonly name: string,
    private readonly schema: z.ZodTypeAny
  ) {}

  validate(message: RawMessage): boolean {
    return this.schema.safeParse(message).success;
  }
}

const subSignal = z.string().nullable().optional();

const marketDataShape = z
  .object({
    symbol: z.string().min(1).optional(),
    signal_alpha: subSignal,
    beta_signal: subSignal,
    momentum_signal: subSignal,
    anomaly_detected: z.boolean().optional()
  })
  .passthrough()
  .refine(
    (m) =>
      m.symbol !== undefined ||
      m.signal_alpha !== undefined ||
      m.beta_signal !== undefined ||
      m.momentum_signal !== undefined ||
      m.anomaly_detected !== undefined,
    { message: 'message carries neither a symbol nor any sub-signal' }
  );

export const marketDataSchema: MessageSchema = new ZodMessageSchema('market_data', marketDataShape);

export const permissiveSchema: MessageSchema = new ZodMessageSchema(
  'permissive',
  z.record(z.string(), z.unknown())
);

export const createMessageSchema = (kind: MessageSchemaKind): MessageSchema => {
  switch (kind) {
    case 'market_data':
      return marketDataSchema;
    case 'permissive':
      return permissiveSchema;
  }
};
