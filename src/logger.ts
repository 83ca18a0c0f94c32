export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Leveled logger over `console`. Messages below `level` are dropped.
 */
export function createLogger(level: LogLevel = 'warn'): Logger {
  const enabled = (target: LogLevel) => RANK[target] >= RANK[logger.level];

  const logger: Logger = {
    level,
    debug: (message) => {
      if (enabled('debug')) console.debug(message);
    },
    info: (message) => {
      if (enabled('info')) console.log(message);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(message);
    },
    error: (message) => {
      if (enabled('error')) console.error(message);
    },
  };

  return logger;
}
