import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { run, type RunIo } from '../../src/io/runner.js';

const TEST_INPUT = path.join(os.tmpdir(), `composite-signal-runner-${process.pid}.jsonl`);

function makeIo(stdin: string): RunIo & { out: string[]; logs: string[] } {
  const out: string[] = [];
  const logs: string[] = [];
  return {
    out,
    logs,
    env: { LOG_LEVEL: 'info' },
    readStdin: async () => stdin,
    writeOut: (line) => { out.push(line); },
    logSink: (line) => { logs.push(line); },
  };
}

describe('run', () => {
  afterEach(() => {
    try { fs.unlinkSync(TEST_INPUT); } catch { /* not created */ }
  });

  it('returns 0 when every message is accepted', async () => {
    const io = makeIo('{"symbol":"AAPL","signal_alpha":"BUY"}\n{"symbol":"MSFT","anomaly_detected":true}\n');
    expect(await run([], io)).toBe(0);
    expect(io.out.map((line) => JSON.parse(line).composite_signal)).toEqual(['BUY', 'HOLD']);
    expect(io.out.every((line) => line.endsWith('\n'))).toBe(true);
  });

  it('returns 1 when any message is rejected, still writing the rest', async () => {
    const io = makeIo('{"symbol":"AAPL","signal_alpha":"BUY"}\nnot json\n');
    expect(await run([], io)).toBe(1);
    expect(io.out).toHaveLength(1);
    expect(JSON.parse(io.out[0]).symbol).toBe('AAPL');
  });

  it('returns 1 when the input file is missing', async () => {
    const io = makeIo('');
    expect(await run([TEST_INPUT], io)).toBe(1);
    expect(io.out).toEqual([]);
    const entry = JSON.parse(io.logs[0]);
    expect(entry.level).toBe('error');
    expect(entry.message).toBe('failed to read input');
    expect(entry.path).toBe(TEST_INPUT);
  });

  it('reads messages from the file named by the first argument', async () => {
    fs.writeFileSync(TEST_INPUT, '[{"symbol":"AAPL","beta_signal":"OVEREXPOSED"}]');
    const io = makeIo('{"symbol":"IGNORED"}');
    expect(await run([TEST_INPUT], io)).toBe(0);
    expect(io.out).toHaveLength(1);
    expect(JSON.parse(io.out[0])).toEqual({
      symbol: 'AAPL',
      beta_signal: 'OVEREXPOSED',
      composite_signal: 'BUY',
      signal_votes: { alpha: null, beta: 'OVEREXPOSED', momentum: null, anomaly: 'INCLUDE' },
    });
  });

  it('logs a completion summary', async () => {
    const io = makeIo('{"symbol":"AAPL"}');
    await run([], io);
    const summary = JSON.parse(io.logs[io.logs.length - 1]);
    expect(summary).toMatchObject({
      level: 'info',
      message: 'batch complete',
      processed: 1,
      rejected: 0,
      schema: 'market_data',
      counters: { messages_validated: 1, 'composite_signals{signal="HOLD"}': 1 },
    });
  });
});
