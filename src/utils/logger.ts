/**
 * Scoped logger over console.error.
 * stdout belongs to MCP/CLI output, so every log line goes to stderr.
 * Context is passed explicitly per logger and per call; nothing is ambient.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string, context?: LogContext): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

let threshold: LogLevel = isLogLevel(process.env.SWITCHBOARD_LOG_LEVEL)
  ? process.env.SWITCHBOARD_LOG_LEVEL
  : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) return value.message;
  if (value instanceof Date) return value.toISOString();
  return value;
}

function formatContext(context: LogContext): string {
  const entries = Object.entries(context).filter(([, value]) => value !== undefined);
  if (entries.length === 0) return '';
  return ' ' + JSON.stringify(Object.fromEntries(entries.map(([k, v]) => [k, serializeValue(v)])));
}

export function createLogger(scope: string, baseContext: LogContext = {}): Logger {
  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const merged = context ? { ...baseContext, ...context } : baseContext;
    const prefix = level === 'info' ? `[${scope}]` : `[${scope}] ${level.toUpperCase()}:`;
    console.error(`${prefix} ${message}${formatContext(merged)}`);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (childScope, context) =>
      createLogger(`${scope}:${childScope}`, { ...baseContext, ...context })
  };
}
