import { z } from 'zod/v4';
import { FactoryConfigError } from './errors';

export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Fatal = 'fatal',
  Silent = 'silent',
}

const envSchema = z.object({
  FACTORY_LOG_LEVEL: z.enum(LogLevel).default(LogLevel.Warn),
  FACTORY_LOG_PRETTY: z.stringbool().default(false),
});

export interface FactoryConfig {
  /** Minimum level written by the default logger */
  logLevel: LogLevel;
  /** Pretty print log lines through pino-pretty */
  prettyLogs: boolean;
}

/**
 * Reads the factory settings from environment variables.
 *
 * @throws FactoryConfigError naming every variable that failed validation
 *
 * @example
 * ```typescript
 * const config = parseFactoryConfig({ FACTORY_LOG_LEVEL: 'debug' });
 * config.logLevel; // LogLevel.Debug
 * ```
 */
export function parseFactoryConfig(
  env: Record<string, string | undefined> = process.env,
): FactoryConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new FactoryConfigError(
      result.error.issues.map(
        (issue) =>
          `Environment variable "${issue.path.join('.')}": ${issue.message}`,
      ),
    );
  }

  return {
    logLevel: result.data.FACTORY_LOG_LEVEL,
    prettyLogs: result.data.FACTORY_LOG_PRETTY,
  };
}
