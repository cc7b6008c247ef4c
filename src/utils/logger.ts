export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const prefix = (level: LogLevel) => `[${level.toUpperCase()}] ${scope}:`;

  return {
    debug(message, meta) {
      if (!enabled('debug')) return;
      if (meta !== undefined) console.debug(`${prefix('debug')} ${message}`, meta);
      else console.debug(`${prefix('debug')} ${message}`);
    },
    info(message, meta) {
      if (!enabled('info')) return;
      if (meta !== undefined) console.log(`${prefix('info')} ${message}`, meta);
      else console.log(`${prefix('info')} ${message}`);
    },
    warn(message, meta) {
      if (!enabled('warn')) return;
      if (meta !== undefined) console.warn(`${prefix('warn')} ${message}`, meta);
      else console.warn(`${prefix('warn')} ${message}`);
    },
    error(message, meta) {
      if (!enabled('error')) return;
      if (meta instanceof Error) {
        console.error(`${prefix('error')} ${message}:`, meta.message, meta.stack);
      } else if (meta !== undefined) {
        console.error(`${prefix('error')} ${message}`, meta);
      } else {
        console.error(`${prefix('error')} ${message}`);
      }
    },
  };
}
