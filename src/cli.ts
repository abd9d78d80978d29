#!/usr/bin/env node
import { text } from 'node:stream/consumers';
import { stderrSink } from './core/logger.js';
import { run } from './io/runner.js';

const main = async (): Promise<void> => {
  // stdout carries the enriched messages, so logs go to stderr
  process.exitCode = await run(process.argv.slice(2), {
    env: process.env,
    readStdin: () => text(process.stdin),
    writeOut: (line) => {
      process.stdout.write(line);
    },
    logSink: stderrSink
  });
};

void main().catch((err) => {
  process.stderr.write(`Fatal error: ${String(err)}\n`);
  process.exit(1);
});
