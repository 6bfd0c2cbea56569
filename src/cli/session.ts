/**
 * Interactive signup session.
 *
 * Menu loop: open the temp-mail page, take the pasted address, pick a
 * country, generate and save an account, open the signup page, then copy
 * each field to the clipboard one Enter press at a time.
 */

import { COUNTRY_CHOICES, DEFAULT_COUNTRY, GeneratorConfig } from '../config/generator-config';
import {
  AccountRecord,
  GeneratedAccount,
  createAccountRecord,
  formatBirthDate,
  isValidEmail,
} from '../domain/account';
import { formatPresentation, presentError } from '../domain/error-presentation';
import {
  GenerationError,
  StorageError,
  TypedError,
  accountValidationError,
  clipboardError,
  invalidEmailError,
} from '../domain/errors';
import { createAccountGenerator, validateAccount } from '../generator/account-generator';
import { RandomSource } from '../generator/random-source';
import { Logger, logger as rootLogger } from '../logger';
import { BrowserLauncher } from '../platform/browser';
import { Clipboard } from '../platform/clipboard';
import { AccountRecordStore } from '../storage/store';
import { Prompter } from './prompt';

export interface SessionUrls {
  tempMail: string;
  signup: string;
}

export interface SessionDeps {
  prompter: Prompter;
  clipboard: Clipboard;
  browser: BrowserLauncher;
  store: AccountRecordStore;
  random: RandomSource;
  generatorConfig: GeneratorConfig;
  urls: SessionUrls;
  countryChoices?: readonly string[];
  defaultCountry?: string;
  write?: (line: string) => void;
  now?: () => Date;
  logger?: Logger;
}

export interface SessionSummary {
  generated: number;
  saved: number;
}

type RoundOutcome = 'continue' | 'stop';

/** Labels shown during the guided fill, in form order. */
export const GUIDED_FIELDS: ReadonlyArray<{ label: string; value: (record: AccountRecord) => string }> = [
  { label: 'Email address', value: (r) => r.email },
  { label: 'First name', value: (r) => r.firstName },
  { label: 'Last name', value: (r) => r.lastName },
  { label: 'Create password', value: (r) => r.password },
  { label: 'Add a display name', value: (r) => r.displayName },
];

function isNo(answer: string): boolean {
  return answer.trim().toUpperCase() === 'N';
}

export async function runSession(deps: SessionDeps): Promise<SessionSummary> {
  const write = deps.write ?? ((line: string) => console.log(line));
  const now = deps.now ?? (() => new Date());
  const log = (deps.logger ?? rootLogger).child({ module: 'session' });
  const countryChoices = deps.countryChoices ?? COUNTRY_CHOICES;
  const defaultCountry = deps.defaultCountry ?? DEFAULT_COUNTRY;

  const summary: SessionSummary = { generated: 0, saved: 0 };
  let clipboardEnabled = true;

  const openUrl = async (url: string): Promise<void> => {
    if (!(await deps.browser.open(url))) {
      write(`Could not open a browser. Visit ${url} manually.`);
    }
  };

  const chooseCountry = async (): Promise<string | null> => {
    write('');
    write('Select country (press Enter for default):');
    countryChoices.forEach((country, i) => {
      write(`${i + 1}. ${country}${country === defaultCountry ? ' (default)' : ''}`);
    });
    const raw = await deps.prompter.ask(`Choice [1-${countryChoices.length}, Enter=default]: `);
    if (raw === null) return null;
    const trimmed = raw.trim();
    if (/^\d+$/.test(trimmed)) {
      const index = Number(trimmed);
      if (index >= 1 && index <= countryChoices.length) {
        return countryChoices[index - 1];
      }
    }
    return defaultCountry;
  };

  /** Generate until success; null means abort (user said N or input ended). */
  const generateWithRetry = async (country: string): Promise<GeneratedAccount | null> => {
    const generator = createAccountGenerator({
      random: deps.random,
      config: { ...deps.generatorConfig, countries: [country] },
      logger: log,
    });

    for (;;) {
      try {
        const account = generator.generate();
        const validation = validateAccount(account, generator.config);
        if (!validation.valid) {
          log.error('Generated account failed validation', { errors: validation.errors });
          throw new GenerationError(accountValidationError(validation.errors));
        }
        return account;
      } catch (err) {
        if (!(err instanceof GenerationError)) throw err;
        write(formatPresentation(presentError(err.typedError)));
        const answer = await deps.prompter.ask('Retry generation? (Y/N): ');
        if (answer === null) return null;
        if (isNo(answer)) {
          write('Generation aborted.');
          return null;
        }
      }
    }
  };

  const saveRecord = async (record: AccountRecord): Promise<void> => {
    try {
      await deps.store.append(record);
      summary.saved++;
      write('Account details saved.');
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      write(formatPresentation(presentError(err.typedError)));
    }
  };

  /** Resolves null on success, or the reason the clipboard is unusable. */
  const copyValue = async (value: string): Promise<TypedError | null> => {
    try {
      return (await deps.clipboard.copy(value)) ? null : clipboardError('no copy command succeeded');
    } catch (err) {
      return clipboardError(err);
    }
  };

  const guideField = async (label: string, value: string): Promise<RoundOutcome> => {
    write('');
    write(`${label}: ${value}`);
    if (!clipboardEnabled) {
      return (await deps.prompter.ask('Press Enter to continue... ')) === null ? 'stop' : 'continue';
    }
    if ((await deps.prompter.ask('Press Enter to copy to clipboard... ')) === null) return 'stop';
    const failure = await copyValue(value);
    if (failure === null) {
      write('Copied! Paste it in the form (Ctrl+V).');
    } else {
      log.info('Clipboard disabled for the rest of the session', { code: failure.code, error: failure.message });
      write('Could not copy automatically. Please copy manually from above.');
      write(formatPresentation(presentError(failure)));
      clipboardEnabled = false;
    }
    return 'continue';
  };

  const runRound = async (): Promise<RoundOutcome> => {
    write('Opening temporary email service...');
    await openUrl(deps.urls.tempMail);

    const email = await deps.prompter.ask('Paste your temporary email address here: ');
    if (email === null) return 'stop';
    if (!isValidEmail(email)) {
      const rejection = invalidEmailError(email.trim());
      log.info('Rejected email input', { code: rejection.code });
      write('Invalid email format. Try again.');
      write(formatPresentation(presentError(rejection)));
      return 'continue';
    }

    const country = await chooseCountry();
    if (country === null) return 'stop';

    const account = await generateWithRetry(country);
    if (account === null) return 'continue';
    summary.generated++;

    const record = createAccountRecord(account, email, now());
    await saveRecord(record);

    write('Opening signup page...');
    await openUrl(deps.urls.signup);

    write('');
    write('--- Guided fill (press Enter to copy each field) ---');
    for (const field of GUIDED_FIELDS) {
      if ((await guideField(field.label, field.value(record))) === 'stop') return 'stop';
    }

    write('');
    write(`Country: ${record.country} (pick it in the dropdown if not preselected).`);
    write(`Date of birth: ${formatBirthDate(record.birthDate)}`);
    write('');
    write('Remember to agree to the Terms of Service before clicking Continue.');

    const more = await deps.prompter.ask('Generate another? (Y/N): ');
    if (more === null || isNo(more)) return 'stop';
    return 'continue';
  };

  for (;;) {
    write('');
    write('Please select an option:');
    write('1. Create new account data');
    write('2. Quit');

    const choice = await deps.prompter.ask('Enter your choice: ');
    if (choice === null) break;

    const trimmed = choice.trim();
    if (trimmed === '1') {
      if ((await runRound()) === 'stop') break;
    } else if (trimmed === '2') {
      break;
    } else {
      write('Invalid choice. Please try again.');
    }
  }

  log.info('Session finished', { ...summary });
  return summary;
}
