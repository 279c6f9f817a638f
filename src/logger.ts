// Level-filtered console logging with the `[tag] message` prefix used across the server.

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && (LOG_LEVELS as readonly string[]).includes(v);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  if (raw === undefined || raw === '') return 'info';
  if (isLogLevel(raw)) return raw;
  console.warn(`[logger] invalid LOG_LEVEL "${process.env.LOG_LEVEL}", defaulting to info`);
  return 'info';
}

let currentLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (enabled('debug')) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled('info')) console.log(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args);
    },
  };
}
