/**
 * OS clipboard access through the platform's copy utility.
 *
 * Copy failures are reported as `false`, never thrown: the session falls
 * back to printing values when the clipboard is unavailable.
 */

import { Logger, logger as rootLogger } from '../logger';
import { CommandRunner, CommandSpec, formatCommand, runCommand } from './process';

export interface Clipboard {
  copy(text: string): Promise<boolean>;
}

/** Candidate copy commands for a platform, in the order they are tried. */
export function clipboardCommands(platform: NodeJS.Platform): CommandSpec[] {
  switch (platform) {
    case 'win32':
      return [{ command: 'clip', args: [] }];
    case 'darwin':
      return [{ command: 'pbcopy', args: [] }];
    default:
      return [
        { command: 'wl-copy', args: [] },
        { command: 'xclip', args: ['-selection', 'clipboard'] },
        { command: 'xsel', args: ['--clipboard', '--input'] },
      ];
  }
}

export interface SystemClipboardOptions {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  logger?: Logger;
}

export function createSystemClipboard(options: SystemClipboardOptions = {}): Clipboard {
  const run = options.run ?? runCommand;
  const log = (options.logger ?? rootLogger).child({ module: 'clipboard' });
  let candidates = clipboardCommands(options.platform ?? process.platform);

  return {
    async copy(text: string): Promise<boolean> {
      for (const spec of candidates) {
        try {
          const exitCode = await run(spec, text);
          if (exitCode === 0) {
            // Stick with the first command that works.
            candidates = [spec];
            return true;
          }
          log.debug('Clipboard command exited with an error', { command: formatCommand(spec), exitCode });
        } catch (err) {
          log.debug('Clipboard command failed to start', { command: formatCommand(spec), error: String(err) });
        }
      }
      log.info('No clipboard command succeeded', { tried: candidates.map(formatCommand) });
      return false;
    },
  };
}
