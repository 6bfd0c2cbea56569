import {
  DEFAULT_OUTPUT_FILE,
  DEFAULT_SIGNUP_URL,
  DEFAULT_TEMP_MAIL_URL,
  loadAppConfig,
} from '../../src/config/app-config';
import { ConfigError } from '../../src/domain/errors';
import { LogLevel } from '../../src/logger';

function captureConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadAppConfig', () => {
  test('uses defaults for an empty environment', () => {
    const config = loadAppConfig({});

    expect(config.outputFile).toBe(DEFAULT_OUTPUT_FILE);
    expect(config.tempMailUrl).toBe(DEFAULT_TEMP_MAIL_URL);
    expect(config.signupUrl).toBe(DEFAULT_SIGNUP_URL);
    expect(config.seed).toBeUndefined();
    expect(config.logLevel).toBe(LogLevel.Warn);
    expect(config.generator.minBirthYear).toBe(1970);
    expect(config.generator.maxBirthYear).toBe(2004);
  });

  test('reads overrides from the environment', () => {
    const config = loadAppConfig({
      ACCOUNT_OUTPUT_FILE: 'out/accounts.txt',
      TEMP_MAIL_URL: 'https://mail.test/',
      SIGNUP_URL: 'https://signup.test/',
      DOB_YEAR_MIN: '1980',
      DOB_YEAR_MAX: '1985',
      PASSWORD_LENGTH: '16',
      GENERATOR_SEED: '42',
      LOG_LEVEL: 'debug',
    });

    expect(config.outputFile).toBe('out/accounts.txt');
    expect(config.tempMailUrl).toBe('https://mail.test/');
    expect(config.signupUrl).toBe('https://signup.test/');
    expect(config.generator.minBirthYear).toBe(1980);
    expect(config.generator.maxBirthYear).toBe(1985);
    expect(config.generator.passwordLength).toBe(16);
    expect(config.seed).toBe(42);
    expect(config.logLevel).toBe(LogLevel.Debug);
  });

  test('treats blank values as unset', () => {
    const config = loadAppConfig({ ACCOUNT_OUTPUT_FILE: '  ', DOB_YEAR_MIN: '' });
    expect(config.outputFile).toBe(DEFAULT_OUTPUT_FILE);
    expect(config.generator.minBirthYear).toBe(1970);
  });

  test('rejects non-integer numbers', () => {
    const err = captureConfigError(() => loadAppConfig({ PASSWORD_LENGTH: '12.5' }));
    expect(err.typedError.code).toBe('CONFIG.INVALID_VALUE');
    expect(err.typedError.details).toEqual({ key: 'PASSWORD_LENGTH', value: '12.5', expected: 'an integer' });
  });

  test('rejects an inverted year range', () => {
    const err = captureConfigError(() => loadAppConfig({ DOB_YEAR_MIN: '2000', DOB_YEAR_MAX: '1990' }));
    expect(err.message).toContain('minBirthYear (2000) is after maxBirthYear (1990)');
  });

  test('rejects unknown log levels', () => {
    const err = captureConfigError(() => loadAppConfig({ LOG_LEVEL: 'loud' }));
    expect(err.typedError.details?.key).toBe('LOG_LEVEL');
  });
});
