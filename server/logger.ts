/**
 * Structured Logger
 *
 * Production-safe structured logging with tenant context and sensitive data redaction.
 *
 * Key behaviors:
 * - All logs include: level, msg, timestamp, plus any context (organizationId, orderId, ...)
 * - Automatic redaction of credentials, tokens, secrets, passwords
 * - JSON output for production log aggregation
 * - Human-readable output for development
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info('Order confirmed', { organizationId, orderId });
 *   const log = logger.withContext({ organizationId });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  organizationId?: string;
  userId?: string;
  [key: string]: unknown;
}

export interface EngineLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Sensitive field patterns that should be redacted from logs
 */
const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /api[_-]?key/i,
  /private[_-]?key/i,
  /credential/i,
  /database[_-]?url/i,
];

const isProduction = () => process.env.NODE_ENV === 'production';

function configuredLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') return raw;
  return isProduction() ? 'info' : 'debug';
}

/**
 * Redact sensitive fields from objects before logging
 */
export function redactSensitiveData(value: unknown, depth: number = 0): unknown {
  if (depth > 5) return '[max depth]';

  if (value === null || value === undefined) return value;

  if (typeof value !== 'object') return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: isProduction() ? undefined : value.stack,
    };
  }

  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveData(item, depth + 1));
  }

  const redacted: Record<string, unknown> = {};

  for (const [key, entry] of Object.entries(value)) {
    if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
      redacted[key] = '[REDACTED]';
    } else {
      redacted[key] = redactSensitiveData(entry, depth + 1);
    }
  }

  return redacted;
}

export function formatLog(level: LogLevel, message: string, context: LogContext, now: Date = new Date()): string {
  const timestamp = now.toISOString();
  const safeContext = redactSensitiveData(context);

  if (isProduction()) {
    return JSON.stringify({
      level,
      msg: message,
      timestamp,
      ...(safeContext && typeof safeContext === 'object' ? safeContext : {}),
    });
  }

  const contextStr = Object.keys(context).length > 0 ? ' ' + JSON.stringify(safeContext) : '';
  return `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`;
}

export function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[configuredLevel()];
}

function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (!shouldLog(level)) return;

  const output = formatLog(level, message, context);

  if (level === 'error') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

export function createLogger(baseContext: LogContext): EngineLogger & { withContext(context: LogContext): EngineLogger } {
  return {
    debug: (message, context = {}) => log('debug', message, { ...baseContext, ...context }),
    info: (message, context = {}) => log('info', message, { ...baseContext, ...context }),
    warn: (message, context = {}) => log('warn', message, { ...baseContext, ...context }),
    error: (message, context = {}) => log('error', message, { ...baseContext, ...context }),
    withContext: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

/**
 * Structured logger instance
 */
export const logger = createLogger({});

/**
 * Helper to log errors with full context
 */
export function logError(target: EngineLogger, error: unknown, context: LogContext = {}): void {
  if (error instanceof Error) {
    target.error(error.message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: isProduction() ? undefined : error.stack,
      },
    });
  } else {
    target.error('Unknown error', {
      ...context,
      error: String(error),
    });
  }
}
