import { browserCommand, createSystemBrowser, escapeForCmd } from '../../src/platform/browser';
import type { CommandSpec } from '../../src/platform/process';
import { LogEntry, LogLevel, resetLogHandler, setLogHandler } from '../../src/logger';

beforeEach(() => {
  setLogHandler(() => undefined);
});

afterEach(() => {
  resetLogHandler();
});

describe('browserCommand', () => {
  test.each([
    ['win32', { command: 'cmd', args: ['/c', 'start', '', 'https://mail.test/'] }],
    ['darwin', { command: 'open', args: ['https://mail.test/'] }],
    ['linux', { command: 'xdg-open', args: ['https://mail.test/'] }],
  ] as const)('%s', (platform, expected) => {
    expect(browserCommand(platform, 'https://mail.test/')).toEqual(expected);
  });
});

describe('escapeForCmd', () => {
  test('escapes query separators so cmd passes the whole URL to start', () => {
    expect(browserCommand('win32', 'https://signup.test/?a=1&b=2').args).toEqual([
      '/c',
      'start',
      '',
      'https://signup.test/?a=1^&b=2',
    ]);
  });

  test('escapes every cmd operator and leaves plain URLs alone', () => {
    expect(escapeForCmd('a|b<c>d^e(f)g%h!i"j')).toBe('a^|b^<c^>d^^e^(f^)g^%h^!i^"j');
    expect(escapeForCmd('https://mail.test/')).toBe('https://mail.test/');
  });

  test('only the Windows command is escaped', () => {
    expect(browserCommand('linux', 'https://signup.test/?a=1&b=2').args).toEqual(['https://signup.test/?a=1&b=2']);
  });
});

describe('createSystemBrowser', () => {
  test('launches the platform command', async () => {
    const launch = jest.fn(async (_spec: CommandSpec) => undefined);
    const browser = createSystemBrowser({ platform: 'linux', launch });

    await expect(browser.open('https://signup.test/')).resolves.toBe(true);
    expect(launch).toHaveBeenCalledWith({ command: 'xdg-open', args: ['https://signup.test/'] });
  });

  test('resolves false when the launcher fails', async () => {
    const launch = jest.fn(async (_spec: CommandSpec) => {
      throw new Error('spawn xdg-open ENOENT');
    });
    const browser = createSystemBrowser({ platform: 'linux', launch });

    await expect(browser.open('https://signup.test/')).resolves.toBe(false);
  });

  test('logs a launch failure at info', async () => {
    const entries: LogEntry[] = [];
    setLogHandler((entry) => entries.push(entry));
    const launch = jest.fn(async (_spec: CommandSpec) => {
      throw new Error('spawn xdg-open ENOENT');
    });

    await createSystemBrowser({ platform: 'linux', launch }).open('https://signup.test/');

    expect(entries.map((e) => [e.level, e.message])).toEqual([[LogLevel.Info, 'Could not open browser']]);
  });
});
