/**
 * Batch helpers for the command-line runner: split an input document into
 * messages and push each one through the processor.
 */

import { InvalidFormatError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { EnrichedMessage } from '../core/types.js';
import type { CompositeSignalProcessor } from '../signals/processor.js';

export interface BatchSummary {
  processed: number;
  rejected: number;
}

const tryParse = (text: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
};

/**
 * Accepts a JSON array, a single JSON document, or JSON lines. A line that
 * is not valid JSON is kept as its raw text so the validator can reject it.
 */
export const parseMessages = (text: string): unknown[] => {
  if (text.trim() === '') return [];

  const whole = tryParse(text);
  if (whole.ok) {
    return Array.isArray(whole.value) ? whole.value : [whole.value];
  }

  return text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .map((line) => {
      const parsed = tryParse(line);
      return parsed.ok ? parsed.value : line;
    });
};

export const runBatch = (
  messages: unknown[],
  processor: CompositeSignalProcessor,
  write: (enriched: EnrichedMessage) => void,
  logger: Logger
): BatchSummary => {
  const summary: BatchSummary = { processed: 0, rejected: 0 };

  messages.forEach((message, index) => {
    try {
      write(processor.process(message));
      summary.processed++;
    } catch (err) {
      if (!(err instanceof InvalidFormatError)) throw err;
      summary.rejected++;
      logger.warn('message rejected', { index, code: err.code });
    }
  });

  return summary;
};
