/**
 * Random sources for the generator.
 *
 * Interactive runs draw from the OS CSPRNG; tests and reproducible runs use
 * a seeded faker instance so the same seed yields the same accounts.
 */

import { randomInt } from 'crypto';
import { Faker, en } from '@faker-js/faker';

export interface RandomSource {
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  /** Uniform element of a non-empty list. */
  pick<T>(items: readonly T[]): T;
  /** New array with the items in uniformly random order. */
  shuffle<T>(items: readonly T[]): T[];
}

function assertRange(min: number, max: number): void {
  if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
    throw new RangeError(`Invalid integer range [${min}, ${max}]`);
  }
}

function assertNotEmpty(items: readonly unknown[]): void {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
}

/** Random source backed by crypto.randomInt. */
export function createSecureRandomSource(): RandomSource {
  const int = (min: number, max: number): number => {
    assertRange(min, max);
    return randomInt(min, max + 1);
  };

  return {
    int,
    pick<T>(items: readonly T[]): T {
      assertNotEmpty(items);
      return items[int(0, items.length - 1)];
    },
    shuffle<T>(items: readonly T[]): T[] {
      const result = [...items];
      for (let i = result.length - 1; i > 0; i--) {
        const j = int(0, i);
        [result[i], result[j]] = [result[j], result[i]];
      }
      return result;
    },
  };
}

/** Deterministic random source: the same seed yields the same sequence. */
export function createSeededRandomSource(seed: number): RandomSource {
  const faker = new Faker({ locale: [en] });
  faker.seed(seed);

  return {
    int(min: number, max: number): number {
      assertRange(min, max);
      return faker.number.int({ min, max });
    },
    pick<T>(items: readonly T[]): T {
      assertNotEmpty(items);
      return faker.helpers.arrayElement(items);
    },
    shuffle<T>(items: readonly T[]): T[] {
      return faker.helpers.shuffle([...items], { inplace: true });
    },
  };
}
