/**
 * Structured Logging with Correlation IDs
 *
 * One JSON object per line. Every entry carries the correlation ID and the
 * document name from the AsyncLocalStorage context of the request.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * LOG_LEVEL wins; otherwise debug outside production and info in it.
 */
function threshold(): number {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(configured)) return LEVEL_ORDER[configured];
  return process.env.NODE_ENV === 'production' ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const reqContext = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    correlationId: getCorrelationId(),
    documentName: reqContext?.documentName,
    message,
    ...context,
  });
}

function write(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < threshold()) return;

  const line = formatLog(level, message, context);
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

function serializeError(error: unknown): unknown {
  if (!(error instanceof Error)) return String(error);
  return {
    message: error.message,
    name: error.name,
    stack: error.stack,
    cause: error.cause instanceof Error ? error.cause.message : undefined,
  };
}

export const logger = {
  info: (message: string, context?: LogContext) => write('info', message, context),

  warn: (message: string, context?: LogContext) => write('warn', message, context),

  error: (message: string, error?: Error | unknown, context?: LogContext) =>
    write('error', message, { ...context, error: serializeError(error) }),

  debug: (message: string, context?: LogContext) => write('debug', message, context),
};
