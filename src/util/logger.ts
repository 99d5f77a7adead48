// All output goes to stderr: stdout belongs to the CLI's JSON result and the MCP stdio transport.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

let currentLogLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function writeLog(
  tag: string,
  threshold: LogLevel,
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  data?: Record<string, unknown>,
) {
  if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) {
    return;
  }
  const parts = [`[${tag}]`, message];
  if (level === 'warn' || level === 'error') {
    parts.unshift(`${level.toUpperCase()}`);
  }
  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }
  console.error(parts.join(' '));
}

/** A logger pinned to `level` ignores the process-wide level set by `setLogLevel`. */
export function createLogger(tag: string, level?: LogLevel): Logger {
  const threshold = () => level ?? currentLogLevel;
  return {
    debug: (message, data) => writeLog(tag, threshold(), 'debug', message, data),
    info: (message, data) => writeLog(tag, threshold(), 'info', message, data),
    warn: (message, data) => writeLog(tag, threshold(), 'warn', message, data),
    error: (message, data) => writeLog(tag, threshold(), 'error', message, data),
  };
}
