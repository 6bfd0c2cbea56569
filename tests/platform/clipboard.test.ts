import { clipboardCommands, createSystemClipboard } from '../../src/platform/clipboard';
import type { CommandRunner, CommandSpec } from '../../src/platform/process';
import { LogEntry, LogLevel, getLogLevel, resetLogHandler, setLogHandler, setLogLevel } from '../../src/logger';

beforeEach(() => {
  setLogHandler(() => undefined);
});

afterEach(() => {
  resetLogHandler();
});

describe('clipboardCommands', () => {
  test('uses clip on Windows and pbcopy on macOS', () => {
    expect(clipboardCommands('win32')).toEqual([{ command: 'clip', args: [] }]);
    expect(clipboardCommands('darwin')).toEqual([{ command: 'pbcopy', args: [] }]);
  });

  test('tries Wayland then X11 tools elsewhere', () => {
    expect(clipboardCommands('linux').map((c) => c.command)).toEqual(['wl-copy', 'xclip', 'xsel']);
  });
});

describe('createSystemClipboard', () => {
  test('pipes the text to the platform command', async () => {
    const run = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>().mockResolvedValue(0);
    const clipboard = createSystemClipboard({ platform: 'win32', run });

    await expect(clipboard.copy('hello')).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith({ command: 'clip', args: [] }, 'hello');
  });

  test('falls through to the next command and then sticks with it', async () => {
    const run = jest.fn(async (spec: CommandSpec) => {
      if (spec.command === 'wl-copy') throw new Error('spawn wl-copy ENOENT');
      return 0;
    });
    const clipboard = createSystemClipboard({ platform: 'linux', run });

    await expect(clipboard.copy('first')).resolves.toBe(true);
    await expect(clipboard.copy('second')).resolves.toBe(true);

    expect(run.mock.calls.map(([spec]) => spec.command)).toEqual(['wl-copy', 'xclip', 'xclip']);
  });

  test('treats a non-zero exit as failure', async () => {
    const run = jest.fn(async () => 1);
    const clipboard = createSystemClipboard({ platform: 'darwin', run });

    await expect(clipboard.copy('x')).resolves.toBe(false);
  });

  test('resolves false when every command fails', async () => {
    const run = jest.fn(async () => {
      throw new Error('ENOENT');
    });
    const clipboard = createSystemClipboard({ platform: 'linux', run });

    await expect(clipboard.copy('x')).resolves.toBe(false);
    expect(run).toHaveBeenCalledTimes(3);
  });

  test('keeps an unavailable clipboard out of the log at the default CLI level', async () => {
    const entries: LogEntry[] = [];
    const initialLevel = getLogLevel();
    setLogHandler((entry) => entries.push(entry));
    setLogLevel(LogLevel.Warn);
    try {
      const clipboard = createSystemClipboard({ platform: 'darwin', run: async () => 1 });
      await expect(clipboard.copy('x')).resolves.toBe(false);
    } finally {
      setLogLevel(initialLevel);
    }

    expect(entries).toEqual([]);
  });
});
