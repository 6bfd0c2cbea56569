/**
 * Generator configuration.
 *
 * Name pools, country set, birth-year range and password policy are plain
 * values passed into the generator, so tests can pin them without touching
 * module state.
 *
 * Usage:
 *   const config = createGeneratorConfig({ minBirthYear: 1980, maxBirthYear: 1990 });
 *   const result = validateGeneratorConfig(config);
 *   if (!result.valid) console.error(result.errors);
 */

/** Characters counted as "special" in generated passwords. */
export const SAFE_PUNCTUATION = '!@#$%^&*()-_=+[]{}:;,./?';

/** Lengths below this are raised to it. */
export const MIN_PASSWORD_LENGTH = 10;

export const DEFAULT_COUNTRY = 'United States';

/** English-speaking countries offered in the country menu. */
export const COUNTRY_CHOICES: readonly string[] = [
  'United States',
  'United Kingdom',
  'Canada',
  'Australia',
  'Ireland',
  'New Zealand',
];

export const DEFAULT_FIRST_NAMES: readonly string[] = [
  'Oliver', 'George', 'Harry', 'Jack', 'Noah',
  'Olivia', 'Amelia', 'Isla', 'Ava', 'Mia',
  'Liam', 'Emma', 'Sophia', 'Charlotte', 'James',
  'Benjamin', 'Lucas', 'Henry', 'Ethan', 'Grace',
];

export const DEFAULT_LAST_NAMES: readonly string[] = [
  'Smith', 'Johnson', 'Williams', 'Brown', 'Jones',
  'Miller', 'Davis', 'Garcia', 'Rodriguez', 'Wilson',
  'Taylor', 'Thomas', 'Moore', 'Martin', 'Jackson',
];

export interface GeneratorConfig {
  firstNames: readonly string[];
  lastNames: readonly string[];
  /** Allowed countries; one is drawn uniformly per account. */
  countries: readonly string[];
  /** Inclusive lower bound of the birth year. */
  minBirthYear: number;
  /** Inclusive upper bound of the birth year. */
  maxBirthYear: number;
  passwordLength: number;
  /** Reject-and-retry budget for display names. */
  maxDisplayNameAttempts: number;
}

export const DEFAULT_GENERATOR_CONFIG: Readonly<GeneratorConfig> = {
  firstNames: DEFAULT_FIRST_NAMES,
  lastNames: DEFAULT_LAST_NAMES,
  countries: [DEFAULT_COUNTRY],
  minBirthYear: 1970,
  maxBirthYear: 2004,
  passwordLength: 12,
  maxDisplayNameAttempts: 32,
};

export interface GeneratorConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Create a generator config, filling unspecified (or undefined) fields from the defaults. */
export function createGeneratorConfig(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
  const defaults = DEFAULT_GENERATOR_CONFIG;
  return {
    firstNames: overrides.firstNames ?? defaults.firstNames,
    lastNames: overrides.lastNames ?? defaults.lastNames,
    countries: overrides.countries ?? defaults.countries,
    minBirthYear: overrides.minBirthYear ?? defaults.minBirthYear,
    maxBirthYear: overrides.maxBirthYear ?? defaults.maxBirthYear,
    passwordLength: overrides.passwordLength ?? defaults.passwordLength,
    maxDisplayNameAttempts: overrides.maxDisplayNameAttempts ?? defaults.maxDisplayNameAttempts,
  };
}

/** The password length actually produced for a configured length. */
export function effectivePasswordLength(config: Pick<GeneratorConfig, 'passwordLength'>): number {
  return Math.max(config.passwordLength, MIN_PASSWORD_LENGTH);
}

/** Validate a generator config for consistency. */
export function validateGeneratorConfig(config: GeneratorConfig): GeneratorConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.firstNames.length === 0) {
    errors.push('firstNames must not be empty');
  }
  if (config.lastNames.length === 0) {
    errors.push('lastNames must not be empty');
  }
  if (config.countries.length === 0) {
    errors.push('countries must not be empty');
  }

  if (!Number.isInteger(config.minBirthYear) || !Number.isInteger(config.maxBirthYear)) {
    errors.push('Birth years must be integers');
  } else if (config.minBirthYear > config.maxBirthYear) {
    errors.push(`minBirthYear (${config.minBirthYear}) is after maxBirthYear (${config.maxBirthYear})`);
  } else if (config.minBirthYear < 1) {
    errors.push('minBirthYear must be at least 1');
  }

  if (!Number.isInteger(config.passwordLength)) {
    errors.push('passwordLength must be an integer');
  } else if (config.passwordLength < MIN_PASSWORD_LENGTH) {
    warnings.push(`passwordLength ${config.passwordLength} is raised to ${MIN_PASSWORD_LENGTH}`);
  }

  if (!Number.isInteger(config.maxDisplayNameAttempts) || config.maxDisplayNameAttempts < 1) {
    errors.push('maxDisplayNameAttempts must be a positive integer');
  }

  return { valid: errors.length === 0, errors, warnings };
}
