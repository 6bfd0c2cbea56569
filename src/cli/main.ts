#!/usr/bin/env node
/**
 * CLI entry point: wires the real collaborators and runs the session.
 */

import { AppConfig, loadAppConfig } from '../config/app-config';
import { formatPresentation, presentError } from '../domain/error-presentation';
import { ConfigError } from '../domain/errors';
import { createSecureRandomSource, createSeededRandomSource } from '../generator/random-source';
import { logger, setLogLevel } from '../logger';
import { createSystemBrowser } from '../platform/browser';
import { createSystemClipboard } from '../platform/clipboard';
import { createFileAccountStore } from '../storage/file-store';
import { createConsolePrompter } from './prompt';
import { runSession } from './session';

/** Run the CLI; resolves with the process exit code. */
export async function main(env: Record<string, string | undefined> = process.env): Promise<number> {
  let config: AppConfig;
  try {
    config = loadAppConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(formatPresentation(presentError(err.typedError)));
      return 2;
    }
    throw err;
  }
  setLogLevel(config.logLevel);

  const prompter = createConsolePrompter();
  try {
    await runSession({
      prompter,
      clipboard: createSystemClipboard(),
      browser: createSystemBrowser(),
      store: createFileAccountStore(config.outputFile),
      random: config.seed === undefined ? createSecureRandomSource() : createSeededRandomSource(config.seed),
      generatorConfig: config.generator,
      urls: { tempMail: config.tempMailUrl, signup: config.signupUrl },
    });
    return 0;
  } finally {
    prompter.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error('Unexpected failure', { error: err instanceof Error ? err.stack : String(err) });
      process.exitCode = 1;
    },
  );
}
