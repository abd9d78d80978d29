export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger scoped to a module; optional for sinks that have no bindings. */
  child?(module: string): Logger;
}

export type LogSink = (line: string) => void;

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line);
};

export const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

export class JsonLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly sink: LogSink = stdoutSink,
    private readonly bindings: Record<string, unknown> = {}
  ) {}

  /** Logger that stamps every entry with the given module name. */
  child(module: string): JsonLogger {
    return new JsonLogger(this.minLevel, this.sink, { ...this.bindings, module });
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) return;
    const entry = {
      ts: new Date().toISOString(),
      level,
      ...this.bindings,
      message,
      ...context
    };
    this.sink(`${JSON.stringify(entry)}\n`);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }
}

/**
 * Wraps a logger so that a failing sink (closed pipe, bad serializer) never
 * reaches the caller.
 */
export const safeLogger = (inner: Logger): Logger => {
  const guard =
    (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>): void => {
      try {
        inner[level](message, context);
      } catch {
        // logging is best-effort
      }
    };
  return {
    debug: guard('debug'),
    info: guard('info'),
    warn: guard('warn'),
    error: guard('error')
  };
};
