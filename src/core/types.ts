/** Any mapping handed to us by an upstream producer. */
export type RawMessage = Record<string, unknown>;

declare const validated: unique symbol;

/**
 * A RawMessage that has passed schema validation. Same keys and values;
 * the brand can only be applied by `validateInputMessage`.
 */
export type ValidatedMessage = RawMessage & { readonly [validated]: true };

export type CompositeSignal = 'BUY' | 'HOLD';

/** Raw sub-signal value; `null` when the field was missing. */
export type SignalVote = unknown;

export type AffirmativeVote = 'BUY' | 'INCLUDE' | 'OVEREXPOSED';

export type AnomalyVote = 'INCLUDE' | 'IGNORE';

export interface SignalVoteSet {
  alpha: SignalVote;
  beta: SignalVote;
  momentum: SignalVote;
  anomaly: AnomalyVote;
}

export interface CompositeResult {
  composite_signal: CompositeSignal;
  signal_votes: SignalVoteSet;
}

export type EnrichedMessage = RawMessage & CompositeResult;
