/**
 * Display name generation.
 *
 * Rules enforced by the signup form: 3-16 characters, starts with a
 * letter, then only lowercase letters, digits and underscores. Candidates
 * are built from name fragments plus a four-digit suffix and rejected
 * until one passes or the attempt budget runs out.
 */

import { TypedError, displayNameExhaustedError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { RandomSource } from './random-source';

export const DISPLAY_NAME_MIN_LENGTH = 3;
export const DISPLAY_NAME_MAX_LENGTH = 16;

const DISPLAY_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

const SUFFIX_MIN = 1000;
const SUFFIX_MAX = 9999;

/** Longest name part that still leaves room for the numeric suffix. */
export const DISPLAY_NAME_BASE_MAX_LENGTH = DISPLAY_NAME_MAX_LENGTH - String(SUFFIX_MAX).length;

/**
 * Ways of combining sanitized first and last name fragments.
 * 'first-last-clipped' cuts first+last to DISPLAY_NAME_BASE_MAX_LENGTH so
 * long names still yield a candidate that fits.
 */
export type DisplayNamePattern =
  | 'first-last'
  | 'first_last'
  | 'initial-last'
  | 'first-initial'
  | 'first-last-clipped';

export const DISPLAY_NAME_PATTERNS: readonly DisplayNamePattern[] = [
  'first-last',
  'first_last',
  'initial-last',
  'first-initial',
  'first-last-clipped',
];

export type DisplayNameResult =
  | { ok: true; displayName: string; attempts: number }
  | { ok: false; error: TypedError };

export function isValidDisplayName(name: string): boolean {
  return (
    name.length >= DISPLAY_NAME_MIN_LENGTH &&
    name.length <= DISPLAY_NAME_MAX_LENGTH &&
    DISPLAY_NAME_PATTERN.test(name)
  );
}

/** Lowercase, with every character outside [a-z0-9_] replaced by an underscore. */
export function sanitizeNameFragment(fragment: string): string {
  return fragment.toLowerCase().replace(/[^a-z0-9_]/g, '_');
}

export function combineFragments(pattern: DisplayNamePattern, first: string, last: string): string {
  switch (pattern) {
    case 'first-last':
      return first + last;
    case 'first_last':
      return `${first}_${last}`;
    case 'initial-last':
      return first.slice(0, 1) + last;
    case 'first-initial':
      return first + last.slice(0, 1);
    case 'first-last-clipped':
      return (first + last).slice(0, DISPLAY_NAME_BASE_MAX_LENGTH);
  }
}

/** Build one unchecked candidate: a pattern of the names plus a four-digit suffix. */
export function buildDisplayNameCandidate(random: RandomSource, firstName: string, lastName: string): string {
  const pattern = random.pick(DISPLAY_NAME_PATTERNS);
  const base = combineFragments(pattern, sanitizeNameFragment(firstName), sanitizeNameFragment(lastName));
  return `${base}${random.int(SUFFIX_MIN, SUFFIX_MAX)}`;
}

/** Reject-and-retry display name generation, bounded by maxAttempts. */
export function generateDisplayName(
  random: RandomSource,
  firstName: string,
  lastName: string,
  maxAttempts: number,
  log: Logger = rootLogger,
): DisplayNameResult {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const candidate = buildDisplayNameCandidate(random, firstName, lastName);
    if (isValidDisplayName(candidate)) {
      return { ok: true, displayName: candidate, attempts: attempt };
    }
    log.debug('Rejected display name candidate', { attempt, length: candidate.length });
  }

  log.info('Display name attempts exhausted', { maxAttempts, firstName, lastName });
  return { ok: false, error: displayNameExhaustedError(maxAttempts, { firstName, lastName }) };
}
