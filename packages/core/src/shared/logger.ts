export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const DEFAULT_LEVEL: LogLevel = process.env.NODE_ENV === 'production' ? 'info' : 'warn';

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : DEFAULT_LEVEL;

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function parseLogLevel(value: string): LogLevel | undefined {
  const lowered = value.toLowerCase();
  return isLogLevel(lowered) ? lowered : undefined;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function formatMessage(level: LogLevel, prefix: string): string {
  const timestamp = formatTimestamp();
  const levelTag = level.toUpperCase().padEnd(5);
  return `${timestamp} [${levelTag}] [${prefix}]`;
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

// Everything goes to stderr so that `--json` output on stdout stays parseable.
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args: unknown[]) => {
      if (shouldLog('debug')) {
        console.error(formatMessage('debug', prefix), ...args);
      }
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info')) {
        console.error(formatMessage('info', prefix), ...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn')) {
        console.warn(formatMessage('warn', prefix), ...args);
      }
    },
    error: (...args: unknown[]) => {
      if (shouldLog('error')) {
        console.error(formatMessage('error', prefix), ...args);
      }
    },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
