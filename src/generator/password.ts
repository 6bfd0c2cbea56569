import { MIN_PASSWORD_LENGTH, SAFE_PUNCTUATION } from '../config/generator-config';
import { RandomSource } from './random-source';

const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';

export const PASSWORD_ALPHABET = LOWERCASE + UPPERCASE + DIGITS + SAFE_PUNCTUATION;

export interface PasswordRequirements {
  minLength: boolean;
  hasUppercase: boolean;
  hasLowercase: boolean;
  hasNumber: boolean;
  hasSpecialChar: boolean;
  /** Every character comes from PASSWORD_ALPHABET. */
  allowedCharsOnly: boolean;
}

function containsAny(text: string, characters: string): boolean {
  return Array.from(text).some((ch) => characters.includes(ch));
}

/** Check which password requirements are met. */
export function checkPasswordRequirements(password: string, minLength: number): PasswordRequirements {
  return {
    minLength: password.length >= minLength,
    hasUppercase: containsAny(password, UPPERCASE),
    hasLowercase: containsAny(password, LOWERCASE),
    hasNumber: containsAny(password, DIGITS),
    hasSpecialChar: containsAny(password, SAFE_PUNCTUATION),
    allowedCharsOnly: Array.from(password).every((ch) => PASSWORD_ALPHABET.includes(ch)),
  };
}

export function meetsPasswordRequirements(password: string, minLength: number): boolean {
  return Object.values(checkPasswordRequirements(password, minLength)).every(Boolean);
}

/**
 * One character from each class, the rest from the full alphabet, then
 * shuffled so the guaranteed characters do not sit at fixed positions.
 * Lengths below MIN_PASSWORD_LENGTH are raised to it.
 */
export function generatePassword(random: RandomSource, length: number): string {
  const target = Math.max(length, MIN_PASSWORD_LENGTH);
  const alphabet = Array.from(PASSWORD_ALPHABET);

  const chars = [
    random.pick(Array.from(LOWERCASE)),
    random.pick(Array.from(UPPERCASE)),
    random.pick(Array.from(DIGITS)),
    random.pick(Array.from(SAFE_PUNCTUATION)),
  ];
  while (chars.length < target) {
    chars.push(random.pick(alphabet));
  }

  return random.shuffle(chars).join('');
}
