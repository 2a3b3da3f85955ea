export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const envLevel = process.env['LOG_LEVEL'];
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/**
 * Change the minimum level written to the console.
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (!shouldLog('debug')) return;
    console.debug(formatLog(createLogEntry('debug', message, data)));
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (!shouldLog('info')) return;
    console.info(formatLog(createLogEntry('info', message, data)));
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (!shouldLog('warn')) return;
    console.warn(formatLog(createLogEntry('warn', message, data)));
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (!shouldLog('error')) return;
    console.error(formatLog(createLogEntry('error', message, data)));
  },
};
