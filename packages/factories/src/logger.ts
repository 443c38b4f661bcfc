import { pino } from 'pino';
import { type LogLevel, parseFactoryConfig } from './config';

/**
 * Logger accepted by factories. Every level takes a context object and an
 * optional message. A pino logger satisfies it, so does a set of `vi.fn()`
 * mocks in tests.
 *
 * @example
 * ```typescript
 * logger.debug({ table: 'users', id: 1 }, 'Inserted factory row');
 * ```
 */
export interface Logger {
  trace(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  fatal(obj: object, msg?: string): void;
}

export type CreateLoggerOptions = {
  pretty?: boolean;
  level?: LogLevel;
};

/**
 * Creates a pino logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: LogLevel.Debug, pretty: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}) {
  const pretty = options.pretty && process.env.NODE_ENV !== 'production';
  const baseOptions = pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }
    : {};

  return pino({
    ...baseOptions,
    ...(options.level && { level: options.level }),
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  });
}

let defaultLogger: Logger | undefined;

/**
 * Logger used by factories that were not given one, configured from
 * `FACTORY_LOG_LEVEL` and `FACTORY_LOG_PRETTY` on first use.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    const config = parseFactoryConfig();
    defaultLogger = createLogger({
      level: config.logLevel,
      pretty: config.prettyLogs,
    });
  }

  return defaultLogger;
}
