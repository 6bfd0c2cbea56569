/**
 * Application configuration, read from environment variables.
 */

import { ConfigError, configValueError } from '../domain/errors';
import { LogLevel, parseLogLevel } from '../logger';
import {
  GeneratorConfig,
  createGeneratorConfig,
  validateGeneratorConfig,
} from './generator-config';

export const DEFAULT_OUTPUT_FILE = 'account_details.txt';
export const DEFAULT_TEMP_MAIL_URL = 'https://temp-mail.org/';
export const DEFAULT_SIGNUP_URL = 'https://www.epicgames.com/id/register';

export interface AppConfig {
  outputFile: string;
  tempMailUrl: string;
  signupUrl: string;
  generator: GeneratorConfig;
  /** Fixed seed for reproducible runs; undefined means crypto randomness. */
  seed?: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readInt(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(configValueError(key, raw, 'an integer'));
  }
  return Number(raw);
}

/**
 * Load configuration from the environment.
 *
 * Recognised keys: ACCOUNT_OUTPUT_FILE, TEMP_MAIL_URL, SIGNUP_URL,
 * DOB_YEAR_MIN, DOB_YEAR_MAX, PASSWORD_LENGTH, GENERATOR_SEED, LOG_LEVEL.
 * Throws ConfigError for unparseable values or an inconsistent generator
 * config.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const overrides: Partial<GeneratorConfig> = {};
  const minBirthYear = readInt(env, 'DOB_YEAR_MIN');
  const maxBirthYear = readInt(env, 'DOB_YEAR_MAX');
  const passwordLength = readInt(env, 'PASSWORD_LENGTH');
  if (minBirthYear !== undefined) overrides.minBirthYear = minBirthYear;
  if (maxBirthYear !== undefined) overrides.maxBirthYear = maxBirthYear;
  if (passwordLength !== undefined) overrides.passwordLength = passwordLength;

  const generator = createGeneratorConfig(overrides);
  const validation = validateGeneratorConfig(generator);
  if (!validation.valid) {
    throw new ConfigError(
      configValueError('generator', validation.errors.join('; '), 'a consistent generator config'),
    );
  }

  const rawLevel = env.LOG_LEVEL?.trim();
  let logLevel = LogLevel.Warn;
  if (rawLevel) {
    const parsed = parseLogLevel(rawLevel);
    if (!parsed) {
      throw new ConfigError(configValueError('LOG_LEVEL', rawLevel, 'debug, info, warn or error'));
    }
    logLevel = parsed;
  }

  return {
    outputFile: readString(env, 'ACCOUNT_OUTPUT_FILE', DEFAULT_OUTPUT_FILE),
    tempMailUrl: readString(env, 'TEMP_MAIL_URL', DEFAULT_TEMP_MAIL_URL),
    signupUrl: readString(env, 'SIGNUP_URL', DEFAULT_SIGNUP_URL),
    generator,
    seed: readInt(env, 'GENERATOR_SEED'),
    logLevel,
  };
}
