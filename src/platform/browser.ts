/**
 * Opens URLs in the user's default browser.
 */

import { Logger, logger as rootLogger } from '../logger';
import { CommandLauncher, CommandSpec, launchDetached } from './process';

export interface BrowserLauncher {
  /** Resolves false when the browser could not be started. */
  open(url: string): Promise<boolean>;
}

/** Caret-escape the characters cmd.exe would treat as operators (`&` in query strings, mostly). */
export function escapeForCmd(value: string): string {
  return value.replace(/[\^&|<>()%!"]/g, '^$&');
}

export function browserCommand(platform: NodeJS.Platform, url: string): CommandSpec {
  switch (platform) {
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '', escapeForCmd(url)] };
    case 'darwin':
      return { command: 'open', args: [url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

export interface SystemBrowserOptions {
  platform?: NodeJS.Platform;
  launch?: CommandLauncher;
  logger?: Logger;
}

export function createSystemBrowser(options: SystemBrowserOptions = {}): BrowserLauncher {
  const platform = options.platform ?? process.platform;
  const launch = options.launch ?? launchDetached;
  const log = (options.logger ?? rootLogger).child({ module: 'browser' });

  return {
    async open(url: string): Promise<boolean> {
      try {
        await launch(browserCommand(platform, url));
        log.info('Opened URL', { url });
        return true;
      } catch (err) {
        log.info('Could not open browser', { url, error: String(err) });
        return false;
      }
    },
  };
}
