export { AppError, InvalidFormatError } from './core/errors.js';
export { JsonLogger, safeLogger, type Logger } from './core/logger.js';
export { InMemoryMetrics, type Metrics, type MetricTags } from './core/metrics.js';
export type {
  CompositeSignal,
  EnrichedMessage,
  RawMessage,
  SignalVoteSet,
  ValidatedMessage
} from './core/types.js';
export { computeCompositeSignal } from './signals/aggregator.js';
export {
  ZodMessageSchema,
  createMessageSchema,
  marketDataSchema,
  permissiveSchema,
  type MessageSchema
} from './signals/messageSchema.js';
export { CompositeSignalProcessor } from './signals/processor.js';
export { validateInputMessage } from './signals/validator.js';
export { parseMessages, runBatch, type BatchSummary } from './io/batch.js';
export { run, type RunIo } from './io/runner.js';
