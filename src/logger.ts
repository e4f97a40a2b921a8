export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

const consoleSink: LogSink = (level, line) => {
  const out = level === 'error' ? console.error : console.log;
  out(line);
};

// ── Structured logger: one JSON object per line ──
export function createLogger(
  level: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
  bindings: Record<string, unknown> = {},
  sink: LogSink = consoleSink,
): Logger {
  const log = (entryLevel: LogLevel, msg: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) return;
    const entry = {
      ts: new Date().toISOString(),
      level: entryLevel,
      msg,
      ...bindings,
      ...data,
    };
    sink(entryLevel, JSON.stringify(entry));
  };

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: (extra) => createLogger(level, { ...bindings, ...extra }, sink),
  };
}

export const logger = createLogger();
