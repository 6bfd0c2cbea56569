/**
 * Account generator.
 *
 * Produces a GeneratedAccount that satisfies every formatting rule of the
 * signup form. The generator has no side effects: its output is a pure
 * function of the random source and the config it was built with.
 */

import {
  GeneratorConfig,
  createGeneratorConfig,
  effectivePasswordLength,
  validateGeneratorConfig,
} from '../config/generator-config';
import { GeneratedAccount } from '../domain/account';
import { ConfigError, GenerationError, configValueError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { isValidBirthDate, generateBirthDate } from './birth-date';
import { generateDisplayName, isValidDisplayName } from './display-name';
import { checkPasswordRequirements, generatePassword } from './password';
import { RandomSource, createSecureRandomSource, createSeededRandomSource } from './random-source';

export interface AccountGeneratorOptions {
  /** Explicit random source; wins over `seed`. */
  random?: RandomSource;
  /** Seed for a deterministic source. Ignored when `random` is given. */
  seed?: number;
  config?: Partial<GeneratorConfig>;
  logger?: Logger;
}

export interface AccountGenerator {
  readonly config: GeneratorConfig;
  /** Generate the next account. Throws GenerationError when the display name budget runs out. */
  generate(): GeneratedAccount;
}

export interface AccountValidationResult {
  valid: boolean;
  errors: string[];
}

function resolveRandomSource(options: AccountGeneratorOptions): RandomSource {
  if (options.random) return options.random;
  if (options.seed !== undefined) return createSeededRandomSource(options.seed);
  return createSecureRandomSource();
}

/**
 * Create a generator bound to one random source, so successive calls
 * continue the same sequence. Throws ConfigError for an invalid config.
 */
export function createAccountGenerator(options: AccountGeneratorOptions = {}): AccountGenerator {
  const config = createGeneratorConfig(options.config);
  const validation = validateGeneratorConfig(config);
  if (!validation.valid) {
    throw new ConfigError(
      configValueError('generator', validation.errors.join('; '), 'a consistent generator config'),
    );
  }

  const random = resolveRandomSource(options);
  const log = (options.logger ?? rootLogger).child({ module: 'generator' });

  return {
    config,
    generate(): GeneratedAccount {
      const firstName = random.pick(config.firstNames);
      const lastName = random.pick(config.lastNames);

      const displayName = generateDisplayName(random, firstName, lastName, config.maxDisplayNameAttempts, log);
      if (!displayName.ok) {
        throw new GenerationError(displayName.error);
      }

      const account: GeneratedAccount = {
        firstName,
        lastName,
        displayName: displayName.displayName,
        password: generatePassword(random, config.passwordLength),
        birthDate: generateBirthDate(random, config.minBirthYear, config.maxBirthYear),
        country: random.pick(config.countries),
      };
      log.debug('Generated account', { displayName: account.displayName, attempts: displayName.attempts });
      return account;
    },
  };
}

/** Generate a single account. */
export function generateAccount(options: AccountGeneratorOptions = {}): GeneratedAccount {
  return createAccountGenerator(options).generate();
}

/** Check a generated account against every rule the config implies. */
export function validateAccount(account: GeneratedAccount, config: GeneratorConfig): AccountValidationResult {
  const errors: string[] = [];

  if (!config.firstNames.includes(account.firstName)) {
    errors.push(`firstName "${account.firstName}" is not in the configured list`);
  }
  if (!config.lastNames.includes(account.lastName)) {
    errors.push(`lastName "${account.lastName}" is not in the configured list`);
  }
  if (!isValidDisplayName(account.displayName)) {
    errors.push(`displayName "${account.displayName}" breaks the display name rules`);
  }

  const requirements = checkPasswordRequirements(account.password, effectivePasswordLength(config));
  const unmet = Object.entries(requirements)
    .filter(([, met]) => !met)
    .map(([name]) => name);
  if (unmet.length > 0) {
    errors.push(`password fails: ${unmet.join(', ')}`);
  }

  if (!isValidBirthDate(account.birthDate, config.minBirthYear, config.maxBirthYear)) {
    const { year, month, day } = account.birthDate;
    errors.push(`birthDate ${year}-${month}-${day} is not a valid date in ${config.minBirthYear}-${config.maxBirthYear}`);
  }
  if (!config.countries.includes(account.country)) {
    errors.push(`country "${account.country}" is not in the configured set`);
  }

  return { valid: errors.length === 0, errors };
}
