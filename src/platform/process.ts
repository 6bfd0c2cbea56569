/**
 * Child-process helpers shared by the clipboard and browser collaborators.
 */

import { spawn } from 'child_process';

export interface CommandSpec {
  command: string;
  args: string[];
}

/** Runs a command to completion, optionally writing `input` to stdin; resolves with the exit code. */
export type CommandRunner = (spec: CommandSpec, input?: string) => Promise<number>;

/** Starts a command without waiting for it; resolves once the process has spawned. */
export type CommandLauncher = (spec: CommandSpec) => Promise<void>;

export const runCommand: CommandRunner = (spec, input) =>
  new Promise<number>((resolve, reject) => {
    const child = spawn(spec.command, spec.args, {
      stdio: [input === undefined ? 'ignore' : 'pipe', 'ignore', 'ignore'],
      windowsHide: true,
    });
    child.once('error', reject);
    child.once('close', (code) => resolve(code ?? 1));
    if (input !== undefined && child.stdin) {
      child.stdin.on('error', reject);
      child.stdin.end(input, 'utf8');
    }
  });

export const launchDetached: CommandLauncher = (spec) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(spec.command, spec.args, {
      stdio: 'ignore',
      detached: true,
      windowsHide: true,
    });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ');
}
