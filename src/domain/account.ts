/**
 * Account domain model.
 *
 * A GeneratedAccount is the pure output of the generator. An AccountRecord
 * adds the details of one signup run (the pasted email, a creation time and
 * an id) and is what gets appended to the output file as a text block.
 */

import { v4 as uuid } from 'uuid';

/** Calendar date with a 1-based month. */
export interface BirthDate {
  year: number;
  month: number;
  day: number;
}

export interface GeneratedAccount {
  firstName: string;
  lastName: string;
  displayName: string;
  password: string;
  birthDate: BirthDate;
  country: string;
}

export interface AccountRecord extends GeneratedAccount {
  id: string;
  email: string;
  /** Local ISO-8601 timestamp with seconds precision, no zone suffix. */
  createdAt: string;
}

export const MONTH_ABBREVIATIONS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

/** Separator line closing each text block. */
export const RECORD_SEPARATOR = '-'.repeat(31);

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email.trim());
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** Format as DD/Mon/YYYY, e.g. 07/Mar/1988. */
export function formatBirthDate(date: BirthDate): string {
  return `${pad2(date.day)}/${MONTH_ABBREVIATIONS[date.month - 1]}/${date.year}`;
}

/** Inverse of formatBirthDate; returns null for anything it did not produce. */
export function parseBirthDate(text: string): BirthDate | null {
  const match = /^(\d{2})\/([A-Z][a-z]{2})\/(\d{4})$/.exec(text.trim());
  if (!match) return null;
  const monthIndex = MONTH_ABBREVIATIONS.findIndex((abbr) => abbr === match[2]);
  if (monthIndex < 0) return null;
  return { year: Number(match[3]), month: monthIndex + 1, day: Number(match[1]) };
}

/** Local wall-clock time as YYYY-MM-DDTHH:mm:ss. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}` +
    `T${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/** Attach the run details to a generated account. */
export function createAccountRecord(
  account: GeneratedAccount,
  email: string,
  now: Date = new Date(),
): AccountRecord {
  return {
    id: `acct_${uuid()}`,
    email: email.trim(),
    ...account,
    birthDate: { ...account.birthDate },
    createdAt: formatLocalTimestamp(now),
  };
}

const FIELD_LABELS = {
  email: 'Email',
  firstName: 'First name',
  lastName: 'Last name',
  password: 'Create password',
  displayName: 'Add a display name',
  birthDate: 'Date',
  country: 'Country',
  createdAt: 'Created',
} as const;

/** Render the human-readable block appended to the output file. */
export function toTextBlock(record: AccountRecord): string {
  return [
    `${FIELD_LABELS.email}: ${record.email}`,
    `${FIELD_LABELS.firstName}: ${record.firstName}`,
    `${FIELD_LABELS.lastName}: ${record.lastName}`,
    `${FIELD_LABELS.password}: ${record.password}`,
    `${FIELD_LABELS.displayName}: ${record.displayName}`,
    `${FIELD_LABELS.birthDate}: ${formatBirthDate(record.birthDate)}`,
    `${FIELD_LABELS.country}: ${record.country}`,
    `${FIELD_LABELS.createdAt}: ${record.createdAt}`,
    RECORD_SEPARATOR,
  ].join('\n');
}

/**
 * Parse every complete block out of an output file's contents.
 *
 * The file does not store ids, so parsed records get a positional id
 * (`line_<n>`, the 1-based line of the block's first field). Blocks with
 * missing or malformed fields are skipped.
 */
export function parseTextBlocks(contents: string): AccountRecord[] {
  const records: AccountRecord[] = [];
  let fields = new Map<string, string>();
  let startLine = 1;

  contents.split(/\r?\n/).forEach((line, index) => {
    if (line === RECORD_SEPARATOR) {
      const record = recordFromFields(fields, `line_${startLine}`);
      if (record) records.push(record);
      fields = new Map();
      startLine = index + 2;
      return;
    }
    const separator = line.indexOf(': ');
    if (separator > 0) {
      fields.set(line.slice(0, separator), line.slice(separator + 2));
    }
  });

  return records;
}

function recordFromFields(fields: Map<string, string>, id: string): AccountRecord | null {
  const email = fields.get(FIELD_LABELS.email);
  const firstName = fields.get(FIELD_LABELS.firstName);
  const lastName = fields.get(FIELD_LABELS.lastName);
  const password = fields.get(FIELD_LABELS.password);
  const displayName = fields.get(FIELD_LABELS.displayName);
  const dateText = fields.get(FIELD_LABELS.birthDate);
  const country = fields.get(FIELD_LABELS.country);
  const createdAt = fields.get(FIELD_LABELS.createdAt);

  if (
    email === undefined ||
    firstName === undefined ||
    lastName === undefined ||
    password === undefined ||
    displayName === undefined ||
    dateText === undefined ||
    country === undefined ||
    createdAt === undefined
  ) {
    return null;
  }

  const birthDate = parseBirthDate(dateText);
  if (!birthDate) return null;

  return { id, email, firstName, lastName, password, displayName, birthDate, country, createdAt };
}
