/**
 * Scoped console logger
 *
 * Every line is prefixed with `[scope]`. Debug lines are behind an env flag:
 *   PRODUCT_FACTS_DEBUG_LOG=true  - Master switch for debug output
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Minimal console shape the logger writes to (console by default) */
export type LogSink = {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
};

export type Logger = {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
};

export type CreateLoggerOptions = {
  sink?: LogSink;
  /** Overrides the PRODUCT_FACTS_DEBUG_LOG flag */
  debug?: boolean;
};

export function isDebugLogEnabled(
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  const flag = env.PRODUCT_FACTS_DEBUG_LOG;
  return flag === 'true' || flag === '1';
}

export function createLogger(
  scope: string,
  options: CreateLoggerOptions = {},
): Logger {
  const sink = options.sink ?? console;
  const debugEnabled = options.debug ?? isDebugLogEnabled();
  const prefix = `[${scope}]`;

  return {
    scope,
    debug(message, ...details) {
      if (debugEnabled) sink.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      sink.info(prefix, message, ...details);
    },
    warn(message, ...details) {
      sink.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      sink.error(prefix, message, ...details);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, {
        sink,
        debug: debugEnabled,
      });
    },
  };
}

export type CapturedLogLine = {
  level: LogLevel;
  text: string;
};

/**
 * Sink that keeps lines in memory; used by tests to assert on diagnostics.
 */
export function createMemorySink(): LogSink & { lines: CapturedLogLine[] } {
  const lines: CapturedLogLine[] = [];
  const push =
    (level: LogLevel) =>
    (...args: unknown[]): void => {
      lines.push({ level, text: args.map(String).join(' ') });
    };
  return {
    lines,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
