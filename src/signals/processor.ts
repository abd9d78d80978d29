import { InvalidFormatError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { EnrichedMessage, ValidatedMessage } from '../core/types.js';
import { computeCompositeSignal } from './aggregator.js';
import type { MessageSchema } from './messageSchema.js';
import { validateInputMessage } from './validator.js';

export interface ProcessorDeps {
  schema: MessageSchema;
  logger: Logger;
  metrics: Metrics;
}

/** Validate-then-aggregate for one message at a time, with outcome counters. */
export class CompositeSignalProcessor {
  private readonly validatorLogger: Logger;
  private readonly aggregatorLogger: Logger;

  constructor(private readonly deps: ProcessorDeps) {
    this.validatorLogger = deps.logger.child?.('signals.validator') ?? deps.logger;
    this.aggregatorLogger = deps.logger.child?.('signals.aggregator') ?? deps.logger;
  }

  validate(message: unknown): ValidatedMessage {
    return validateInputMessage(message, { schema: this.deps.schema, logger: this.validatorLogger });
  }

  aggregate(message: ValidatedMessage): EnrichedMessage {
    return computeCompositeSignal(message, { logger: this.aggregatorLogger });
  }

  process(message: unknown): EnrichedMessage {
    let validated: ValidatedMessage;
    try {
      validated = this.validate(message);
    } catch (err) {
      if (err instanceof InvalidFormatError) {
        this.deps.metrics.increment('messages_rejected');
      }
      throw err;
    }
    this.deps.metrics.increment('messages_validated');

    const enriched = this.aggregate(validated);
    this.deps.metrics.increment('composite_signals', 1, { signal: enriched.composite_signal });
    return enriched;
  }
}

