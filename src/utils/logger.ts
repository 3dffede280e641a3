// stdout carries the MCP protocol, so everything goes to stderr.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

const envLevel = process.env.OUTLINE_AUDIT_LOG_LEVEL;
let threshold = LEVELS[isLogLevel(envLevel) ? envLevel : 'info'];

export function setLogLevel(level: LogLevel): void {
  threshold = LEVELS[level];
}

function emit(level: Exclude<LogLevel, 'silent'>, prefix: string, args: unknown[]): void {
  if (LEVELS[level] < threshold) {
    return;
  }
  console.error(`[${prefix}] ${level.toUpperCase()}`, ...args);
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(prefix: string): Logger {
  return {
    debug: (...args) => emit('debug', prefix, args),
    info: (...args) => emit('info', prefix, args),
    warn: (...args) => emit('warn', prefix, args),
    error: (...args) => emit('error', prefix, args),
  };
}
