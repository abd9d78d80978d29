/**
 * Shared test helpers — mock factories for the signal pipeline.
 */

import type { Logger } from '../src/core/logger.js';
import { seriesKey, type Metrics } from '../src/core/metrics.js';
import type { RawMessage } from '../src/core/types.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogCall {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

export const createMockLogger = (): Logger & { calls: LogCall[] } => {
  const calls: LogCall[] = [];
  return {
    calls,
    debug(message, context) { calls.push({ level: 'debug', message, context }); },
    info(message, context) { calls.push({ level: 'info', message, context }); },
    warn(message, context) { calls.push({ level: 'warn', message, context }); },
    error(message, context) { calls.push({ level: 'error', message, context }); },
  };
};

export const createThrowingLogger = (): Logger => {
  const boom = (): void => {
    throw new Error('log sink unavailable');
  };
  return { debug: boom, info: boom, warn: boom, error: boom };
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number> } => {
  const counters = new Map<string, number>();
  return {
    counters,
    increment(name, value = 1, tags) {
      const key = seriesKey(name, tags);
      counters.set(key, (counters.get(key) ?? 0) + value);
    },
  };
};

// ── Message Factory ─────────────────────────────────────────────────

export function makeMessage(overrides: RawMessage = {}): RawMessage {
  return {
    symbol: 'AAPL',
    price: 187.25,
    signal_alpha: 'BUY',
    beta_signal: 'SELL',
    momentum_signal: 'SELL',
    anomaly_detected: false,
    ...overrides,
  };
}
