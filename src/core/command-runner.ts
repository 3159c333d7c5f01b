import { spawnSync } from 'node:child_process';
import { constants } from 'node:os';
import { hasErrorCode } from '../utils/fs.js';
import { icons } from '../utils/output.js';
import type { Profile } from '../types/config.js';

export interface CommandInvocation {
  command: string;
  args: string[];
  cwd: string;
}

export interface InvocationOptions {
  cwd: string;
  /** Appended after the built-in arguments. */
  extraArgs?: string[];
}

export interface CompileInvocationOptions extends InvocationOptions {
  /** Ask the compiler to ignore pins already present in the lock file. */
  upgrade?: boolean;
}

// Shell conventions: 127 command not found, 126 found but not executable,
// 128+N killed by signal N.
export const SPAWN_FAILURE_EXIT_CODE = 127;
export const NOT_EXECUTABLE_EXIT_CODE = 126;
export const SIGNAL_EXIT_BASE = 128;

/** Reported when the process stopped without a status or a known signal. */
export const UNKNOWN_TERMINATION_EXIT_CODE = 1;

export function signalExitCode(signal: NodeJS.Signals | null): number {
  const entry: [string, number] | undefined = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? SIGNAL_EXIT_BASE + entry[1] : UNKNOWN_TERMINATION_EXIT_CODE;
}

export function buildCompileInvocation(
  tool: string,
  profile: Profile,
  options: CompileInvocationOptions,
): CommandInvocation {
  const args = ['pip', 'compile', profile.spec, '-o', profile.lock];
  if (options.upgrade) {
    args.push('--upgrade');
  }
  args.push(...(options.extraArgs ?? []));
  return { command: tool, args, cwd: options.cwd };
}

export function buildSyncInvocation(
  tool: string,
  profile: Profile,
  options: InvocationOptions,
): CommandInvocation {
  const args = ['pip', 'sync', profile.lock, ...(options.extraArgs ?? [])];
  return { command: tool, args, cwd: options.cwd };
}

export function formatInvocation(invocation: CommandInvocation): string {
  return [invocation.command, ...invocation.args]
    .map((part) => (/\s/.test(part) ? `"${part}"` : part))
    .join(' ');
}

/**
 * Run an external command to completion with the terminal attached
 * and return its exit code.
 */
export function runCommand(invocation: CommandInvocation): number {
  const result = spawnSync(invocation.command, invocation.args, {
    cwd: invocation.cwd,
    stdio: 'inherit',
  });

  if (result.error) {
    console.error(
      `${icons.error} Could not start ${invocation.command}: ${result.error.message}`,
    );
    return hasErrorCode(result.error, 'EACCES')
      ? NOT_EXECUTABLE_EXIT_CODE
      : SPAWN_FAILURE_EXIT_CODE;
  }

  if (result.status === null) {
    console.error(
      `${icons.error} ${invocation.command} was terminated by ${result.signal ?? 'a signal'}`,
    );
    return signalExitCode(result.signal);
  }

  return result.status;
}
