type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let threshold: LogLevel = parseLevel(process.env.LINEAGE_LOG_LEVEL) ?? 'info';

function parseLevel(raw: string | undefined): LogLevel | undefined {
  const value = raw?.trim().toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return undefined;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  // stdout is reserved for answers and `--json` output; every log line goes to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

export interface ScopedLogger {
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  debug: LoggerFn;
}

/**
 * Logger whose messages carry a `[lineage:<scope>]` prefix.
 */
export function createLogger(scope: string): ScopedLogger {
  const prefix = `[lineage:${scope}]`;
  return {
    info: (message, context) => logInfo(`${prefix} ${message}`, context),
    warn: (message, context) => logWarning(`${prefix} ${message}`, context),
    error: (message, context) => logError(`${prefix} ${message}`, context),
    debug: (message, context) => logDebug(`${prefix} ${message}`, context),
  };
}
