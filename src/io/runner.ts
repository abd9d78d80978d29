import fs from 'node:fs';
import { loadConfig } from '../config/load.js';
import { JsonLogger, type LogSink } from '../core/logger.js';
import { InMemoryMetrics } from '../core/metrics.js';
import { createMessageSchema } from '../signals/messageSchema.js';
import { CompositeSignalProcessor } from '../signals/processor.js';
import { parseMessages, runBatch } from './batch.js';

export interface RunIo {
  env: NodeJS.ProcessEnv;
  readStdin: () => Promise<string>;
  /** Receives one enriched message per line. */
  writeOut: (line: string) => void;
  logSink: LogSink;
}

/**
 * Process a file (first argument) or stdin and return the exit code:
 * 1 when the input could not be read or any message was rejected.
 */
export const run = async (args: string[], io: RunIo): Promise<number> => {
  const config = loadConfig(io.env);
  const logger = new JsonLogger(config.logLevel, io.logSink);
  const metrics = new InMemoryMetrics();
  const processor = new CompositeSignalProcessor({
    schema: createMessageSchema(config.messageSchema),
    logger,
    metrics
  });

  const path = args[0];
  let input: string;
  try {
    input = path ? await fs.promises.readFile(path, 'utf8') : await io.readStdin();
  } catch (err) {
    logger.error('failed to read input', { path, error: String(err) });
    return 1;
  }

  const summary = runBatch(
    parseMessages(input),
    processor,
    (enriched) => io.writeOut(`${JSON.stringify(enriched)}\n`),
    logger
  );

  logger.info('batch complete', { ...summary, schema: config.messageSchema, counters: metrics.snapshot() });
  return summary.rejected > 0 ? 1 : 0;
};
