import { BirthDate } from '../domain/account';
import { RandomSource } from './random-source';

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/** Gregorian leap-year rule. */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Number of days in a 1-based month. */
export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return MONTH_LENGTHS[month - 1];
}

export function isValidBirthDate(date: BirthDate, minYear: number, maxYear: number): boolean {
  const { year, month, day } = date;
  if (![year, month, day].every(Number.isInteger)) return false;
  if (year < minYear || year > maxYear) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

/** Year, then month, then a day valid for that month, each uniform. */
export function generateBirthDate(random: RandomSource, minYear: number, maxYear: number): BirthDate {
  const year = random.int(minYear, maxYear);
  const month = random.int(1, 12);
  const day = random.int(1, daysInMonth(year, month));
  return { year, month, day };
}
