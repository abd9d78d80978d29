import { describe, it, expect } from 'vitest';
import { InMemoryMetrics, seriesKey } from '../../src/core/metrics.js';

describe('seriesKey', () => {
  it('leaves untagged names alone', () => {
    expect(seriesKey('messages_validated')).toBe('messages_validated');
  });

  it('sorts tags by key', () => {
    expect(seriesKey('votes', { stage: 'b', schema: 'a' })).toBe('votes{schema="a",stage="b"}');
  });
});

describe('InMemoryMetrics', () => {
  it('accumulates counters per tag set', () => {
    const metrics = new InMemoryMetrics();
    metrics.increment('composite_signals', 1, { signal: 'BUY' });
    metrics.increment('composite_signals', 1, { signal: 'BUY' });
    metrics.increment('composite_signals', 1, { signal: 'HOLD' });
    metrics.increment('messages_rejected', 3);
    expect(metrics.snapshot()).toEqual({
      'composite_signals{signal="BUY"}': 2,
      'composite_signals{signal="HOLD"}': 1,
      messages_rejected: 3,
    });
  });
});
