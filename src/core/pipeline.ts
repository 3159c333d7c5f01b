import { resolve } from 'node:path';
import {
  buildCompileInvocation,
  buildSyncInvocation,
  formatInvocation,
  runCommand,
} from './command-runner.js';
import type { CommandInvocation } from './command-runner.js';
import { isFile } from '../utils/fs.js';
import { icons, commandLine } from '../utils/output.js';
import type { NamedProfile, RunMode, StageName } from '../types/config.js';

export class InvalidProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidProfileError';
  }
}

export interface PipelineOptions {
  tool: string;
  /** Directory the external tool runs in; profile paths are relative to it. */
  cwd: string;
  mode?: RunMode;
  upgrade?: boolean;
  compileArgs?: string[];
  syncArgs?: string[];
  /** Print the commands instead of running them. */
  dryRun?: boolean;
}

export interface StageResult {
  stage: StageName;
  exitCode: number;
}

export type PipelineResult =
  | { status: 'done'; exitCode: 0; stages: StageResult[] }
  | {
      status: 'failed';
      exitCode: number;
      failedStage: StageName;
      stages: StageResult[];
    };

const SUCCESS_MESSAGES: Record<RunMode, string> = {
  'compile-sync': 'Dependencies successfully compiled and synced.',
  compile: 'Dependencies successfully compiled.',
  sync: 'Dependencies successfully synced.',
};

/** Exit code for a missing lock file; the external tool never reported one. */
const MISSING_LOCK_EXIT_CODE = 1;

function assertProfile(profile: NamedProfile): void {
  if (profile.spec === '') {
    throw new InvalidProfileError(
      `Profile "${profile.name}" has an empty specification file path`,
    );
  }
  if (profile.lock === '') {
    throw new InvalidProfileError(
      `Profile "${profile.name}" has an empty lock file path`,
    );
  }
}

function failed(
  stage: StageName,
  exitCode: number,
  stages: StageResult[],
): PipelineResult {
  return { status: 'failed', exitCode, failedStage: stage, stages };
}

/**
 * Compile the profile's specification file into its lock file, then sync
 * the environment to the lock file. Stops at the first stage that exits
 * non-zero and reports that stage's exit code unchanged.
 */
export async function runPipeline(
  profile: NamedProfile,
  options: PipelineOptions,
): Promise<PipelineResult> {
  assertProfile(profile);

  const mode = options.mode ?? 'compile-sync';
  const runsCompile = mode !== 'sync';
  const runsSync = mode !== 'compile';
  const lockPath = resolve(options.cwd, profile.lock);

  const compile = buildCompileInvocation(options.tool, profile, {
    cwd: options.cwd,
    upgrade: options.upgrade,
    extraArgs: options.compileArgs,
  });
  const sync = buildSyncInvocation(options.tool, profile, {
    cwd: options.cwd,
    extraArgs: options.syncArgs,
  });

  if (options.dryRun) {
    const planned: CommandInvocation[] = [];
    if (runsCompile) planned.push(compile);
    if (runsSync) planned.push(sync);
    for (const invocation of planned) {
      console.log(`${icons.step} Would run: ${commandLine(formatInvocation(invocation))}`);
    }
    return { status: 'done', exitCode: 0, stages: [] };
  }

  const stages: StageResult[] = [];

  if (runsCompile) {
    console.log('Running dependency compilation...');
    const exitCode = runCommand(compile);
    stages.push({ stage: 'compile', exitCode });

    if (exitCode !== 0) {
      console.error(`${icons.error} Compilation failed. Fix errors and try again.`);
      return failed('compile', exitCode, stages);
    }

    // Presence only: a lock file left by an earlier run also passes
    if (!(await isFile(lockPath))) {
      console.error(
        `${icons.error} Compilation did not produce lock file: ${profile.lock}`,
      );
      return failed('compile', MISSING_LOCK_EXIT_CODE, stages);
    }
  }

  if (runsSync) {
    if (runsCompile) {
      console.log('Compilation successful. Syncing dependencies...');
    } else {
      if (!(await isFile(lockPath))) {
        console.error(`${icons.error} Lock file not found: ${profile.lock}`);
        return failed('sync', MISSING_LOCK_EXIT_CODE, stages);
      }
      console.log('Syncing dependencies...');
    }

    const exitCode = runCommand(sync);
    stages.push({ stage: 'sync', exitCode });

    if (exitCode !== 0) {
      console.error(`${icons.error} Sync failed.`);
      return failed('sync', exitCode, stages);
    }
  }

  console.log(`${icons.success} ${SUCCESS_MESSAGES[mode]}`);
  return { status: 'done', exitCode: 0, stages };
}
