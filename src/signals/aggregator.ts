import { defaultLogLevel } from '../config/load.js';
import { JsonLogger, safeLogger, stderrSink, type Logger } from '../core/logger.js';
import type {
  AffirmativeVote,
  CompositeResult,
  CompositeSignal,
  EnrichedMessage,
  SignalVote,
  SignalVoteSet,
  ValidatedMessage
} from '../core/types.js';

export interface AggregatorDeps {
  logger?: Logger;
}

export const AFFIRMATIVE_VOTES: readonly AffirmativeVote[] = ['BUY', 'INCLUDE', 'OVEREXPOSED'];

/** Affirmative votes needed, out of four, for a BUY. */
export const BUY_THRESHOLD = 2;

export interface SignalFields {
  symbol: unknown;
  signal_alpha: SignalVote;
  beta_signal: SignalVote;
  momentum_signal: SignalVote;
  anomaly_detected: unknown;
}

const FIELD_DEFAULTS: SignalFields = {
  symbol: 'UNKNOWN',
  signal_alpha: null,
  beta_signal: null,
  momentum_signal: null,
  anomaly_detected: false
};

const defaultLogger = new JsonLogger(defaultLogLevel(), stderrSink).child('signals.aggregator');

const readFields = (message: ValidatedMessage): SignalFields => ({
  symbol: message.symbol ?? FIELD_DEFAULTS.symbol,
  signal_alpha: message.signal_alpha ?? FIELD_DEFAULTS.signal_alpha,
  beta_signal: message.beta_signal ?? FIELD_DEFAULTS.beta_signal,
  momentum_signal: message.momentum_signal ?? FIELD_DEFAULTS.momentum_signal,
  anomaly_detected: message.anomaly_detected ?? FIELD_DEFAULTS.anomaly_detected
});

/**
 * Flag truthiness where empty collections count as unset, so an upstream
 * `[]` or `{}` does not read as a detected anomaly.
 */
export const isTruthy = (value: unknown): boolean => {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
};

/** Exact, case-sensitive match against the affirmative set. */
export const isAffirmative = (vote: SignalVote): vote is AffirmativeVote =>
  AFFIRMATIVE_VOTES.some((v) => v === vote);

export const collectVotes = (fields: SignalFields): SignalVoteSet => ({
  alpha: fields.signal_alpha,
  beta: fields.beta_signal,
  momentum: fields.momentum_signal,
  // a detected anomaly withdraws the vote; no anomaly counts in favour
  anomaly: isTruthy(fields.anomaly_detected) ? 'IGNORE' : 'INCLUDE'
});

export const countAffirmative = (votes: SignalVoteSet): number =>
  [votes.alpha, votes.beta, votes.momentum, votes.anomaly].filter(isAffirmative).length;

export const decideSignal = (affirmative: number): CompositeSignal =>
  affirmative >= BUY_THRESHOLD ? 'BUY' : 'HOLD';

/**
 * Majority vote over alpha, beta, momentum and anomaly sub-signals.
 * Returns a new object: every input field, overlaid with
 * `composite_signal` and `signal_votes`. The input is left untouched.
 */
export const computeCompositeSignal = (message: ValidatedMessage, deps: AggregatorDeps = {}): EnrichedMessage => {
  const logger = safeLogger(deps.logger ?? defaultLogger);
  const fields = readFields(message);
  logger.info('computing composite signal', { symbol: fields.symbol });

  const signalVotes = collectVotes(fields);
  const result: CompositeResult = {
    composite_signal: decideSignal(countAffirmative(signalVotes)),
    signal_votes: signalVotes
  };

  logger.debug('composite signal result', { symbol: fields.symbol, ...result });
  return { ...message, ...result };
};
