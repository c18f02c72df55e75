/**
 * Structured Logger
 *
 * Structured logging with correlation context and sensitive data redaction.
 *
 * Key behaviors:
 * - All logs include: level, msg, timestamp, plus any context fields (billId, productId, ...)
 * - Automatic redaction of credentials, tokens, secrets, passwords
 * - JSON output for production log aggregation
 * - Human-readable output for development
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info('Line priced', { productId: 'p1', lineAmount: 594 });
 *   logger.error('Catalog read failed', { error, operation: 'listUnits' });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  billId?: string;
  productId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(baseContext: LogContext): Logger;
}

const IS_PRODUCTION = process.env.NODE_ENV === 'production';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Sensitive field patterns that should be redacted from logs
 */
const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token$/i,
  /authorization/i,
  /bearer/i,
  /api[_-]?key/i,
  /access[_-]?token/i,
  /refresh[_-]?token/i,
  /private[_-]?key/i,
  /credential/i,
  /connection[_-]?string/i,
  /database[_-]?url/i,
];

/**
 * Redact sensitive fields from objects before logging
 */
export function redactSensitiveData(value: unknown, depth: number = 0): unknown {
  if (depth > 5) return '[max depth]'; // Prevent infinite recursion

  if (value === null || value === undefined) return value;

  if (typeof value !== 'object') return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: IS_PRODUCTION ? undefined : value.stack,
    };
  }

  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map(item => redactSensitiveData(item, depth + 1));
  }

  const redacted: Record<string, unknown> = {};

  for (const [key, field] of Object.entries(value)) {
    const isSensitive = SENSITIVE_PATTERNS.some(pattern => pattern.test(key));

    if (isSensitive) {
      redacted[key] = '[REDACTED]';
    } else if (field && typeof field === 'object') {
      redacted[key] = redactSensitiveData(field, depth + 1);
    } else {
      redacted[key] = field;
    }
  }

  return redacted;
}

/**
 * Format log entry for output
 */
function formatLog(level: LogLevel, message: string, context: LogContext): string {
  const timestamp = new Date().toISOString();
  const safeContext = redactSensitiveData(context);

  if (IS_PRODUCTION) {
    // JSON output for log aggregation
    return JSON.stringify({
      level,
      msg: message,
      timestamp,
      ...(safeContext && typeof safeContext === 'object' ? safeContext : {}),
    });
  }

  const contextStr = Object.keys(context).length > 0
    ? ' ' + JSON.stringify(safeContext, null, 0)
    : '';
  return `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`;
}

/**
 * Check if log level should be emitted. Read per call so LOG_LEVEL changes
 * (tests, REPL sessions) take effect without reloading the module.
 */
function shouldLog(level: LogLevel): boolean {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  const threshold = isLogLevel(configured) ? configured : (IS_PRODUCTION ? 'info' : 'debug');
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
}

/**
 * Core logging function
 */
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

function createLogger(baseContext: LogContext): Logger {
  return {
    debug: (message, context = {}) => log('debug', message, { ...baseContext, ...context }),
    info: (message, context = {}) => log('info', message, { ...baseContext, ...context }),
    warn: (message, context = {}) => log('warn', message, { ...baseContext, ...context }),
    error: (message, context = {}) => log('error', message, { ...baseContext, ...context }),
    /**
     * Create a child logger with context pre-attached.
     * Use this at bill/session entry points to avoid repeating context.
     */
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/**
 * Structured logger instance
 */
export const logger: Logger = createLogger({});

/**
 * Helper to log errors with full context
 */
export function logError(error: unknown, context: LogContext = {}): void {
  if (error instanceof Error) {
    logger.error(error.message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: IS_PRODUCTION ? undefined : error.stack,
      },
    });
  } else {
    logger.error('Unknown error', {
      ...context,
      error: String(error),
    });
  }
}
