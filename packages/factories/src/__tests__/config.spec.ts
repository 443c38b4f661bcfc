import { describe, expect, it } from 'vitest';
import { LogLevel, parseFactoryConfig } from '../config';
import { FactoryConfigError } from '../errors';

describe('parseFactoryConfig', () => {
  it('should fall back to defaults', () => {
    expect(parseFactoryConfig({})).toEqual({
      logLevel: LogLevel.Warn,
      prettyLogs: false,
    });
  });

  it('should read the log level and pretty flag', () => {
    expect(
      parseFactoryConfig({
        FACTORY_LOG_LEVEL: 'debug',
        FACTORY_LOG_PRETTY: 'true',
      }),
    ).toEqual({
      logLevel: LogLevel.Debug,
      prettyLogs: true,
    });
  });

  it('should accept the silent level', () => {
    expect(parseFactoryConfig({ FACTORY_LOG_LEVEL: 'silent' }).logLevel).toBe(
      LogLevel.Silent,
    );
  });

  it('should ignore unrelated variables', () => {
    expect(
      parseFactoryConfig({ NODE_ENV: 'test', FACTORY_LOG_PRETTY: '0' }),
    ).toEqual({
      logLevel: LogLevel.Warn,
      prettyLogs: false,
    });
  });

  it('should report every invalid variable', () => {
    let caught: unknown;

    try {
      parseFactoryConfig({
        FACTORY_LOG_LEVEL: 'verbose',
        FACTORY_LOG_PRETTY: 'maybe',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FactoryConfigError);
    if (!(caught instanceof FactoryConfigError)) {
      return;
    }

    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(
      /^Environment variable "FACTORY_LOG_LEVEL": /,
    );
    expect(caught.issues[1]).toMatch(
      /^Environment variable "FACTORY_LOG_PRETTY": /,
    );
  });
});
