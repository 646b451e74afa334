import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Extra structured fields attached to a log line.
 */
export type LogMeta = Record<string, unknown>;

let logger: winston.Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolves the level from `OBJECT_WALKER_LOG_LEVEL`; unknown values fall back
 * to `warn`, which keeps recovered member failures visible.
 */
export function resolveLogLevel(
  raw: string | undefined = process.env.OBJECT_WALKER_LOG_LEVEL
): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'warn';
}

function createLogger(): winston.Logger {
  return winston.createLogger({
    level: resolveLogLevel(),
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss'
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack }) => {
        const prefix = `[${String(timestamp)}] [object-graph-walker] [${level.toUpperCase()}]`;
        if (stack) {
          return `${prefix} ${String(message)}\n${String(stack)}`;
        }
        return `${prefix} ${String(message)}`;
      })
    ),
    transports: [new winston.transports.Console()]
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

export const log = {
  error: (message: string, meta?: LogMeta): void => {
    getLogger().error(message, meta);
  },
  warn: (message: string, meta?: LogMeta): void => {
    getLogger().warn(message, meta);
  },
  info: (message: string, meta?: LogMeta): void => {
    getLogger().info(message, meta);
  },
  debug: (message: string, meta?: LogMeta): void => {
    getLogger().debug(message, meta);
  }
};

/**
 * Drops the cached logger so the next call re-reads the environment.
 */
export function resetLogger(): void {
  logger = null;
}
