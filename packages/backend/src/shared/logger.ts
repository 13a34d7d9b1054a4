export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const SERVICE_NAME = 'catalog-reindexer';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function minLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel()];
}

function formatEntry(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    service: SERVICE_NAME,
    ...meta,
  });
}

export interface RequestLogEntry {
  method: string;
  path: string;
  statusCode: number;
  responseTime: number;
  requestId?: string;
}

/**
 * Writes a structured JSON log line for an HTTP request to stdout.
 */
export function log(entry: RequestLogEntry): void {
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level: 'info',
    service: SERVICE_NAME,
    method: entry.method,
    path: entry.path,
    statusCode: entry.statusCode,
    responseTime: entry.responseTime,
    ...(entry.requestId ? { requestId: entry.requestId } : {}),
  });
  process.stdout.write(line + '\n');
}

/**
 * General-purpose structured logger. debug/info go to stdout, warn/error to stderr.
 */
export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog('debug')) process.stdout.write(formatEntry('debug', message, meta) + '\n');
  },

  info(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog('info')) process.stdout.write(formatEntry('info', message, meta) + '\n');
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog('warn')) process.stderr.write(formatEntry('warn', message, meta) + '\n');
  },

  error(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog('error')) process.stderr.write(formatEntry('error', message, meta) + '\n');
  },
};

// --- Security event logging ---

export function logAuthFailure(details: {
  sourceIp: string;
  userAgent?: string;
  reason: string;
}): void {
  logger.warn('Security event: authentication failure', {
    event_type: 'auth_failure',
    ...details,
  });
}

export function logAuthzFailure(details: {
  userName: string;
  resource: string;
  reason: string;
}): void {
  logger.warn('Security event: authorization failure', {
    event_type: 'authz_failure',
    ...details,
  });
}
