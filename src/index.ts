#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { run } from './commands/run.js';
import { compile } from './commands/compile.js';
import { sync } from './commands/sync.js';
import { profiles } from './commands/profiles.js';
import { VERSION } from './version.js';
import type { ProfileRunOptions } from './core/project.js';

interface StageCliOptions {
  dir: string;
  config?: string;
  tool?: string;
  env: boolean;
  dryRun?: boolean;
  dev?: boolean;
  upgrade?: boolean;
}

function toRunOptions(options: StageCliOptions): ProfileRunOptions {
  return {
    dir: options.dir,
    config: options.config,
    tool: options.tool,
    noEnv: options.env === false,
    dryRun: options.dryRun,
    dev: options.dev,
    upgrade: options.upgrade,
  };
}

function addStageOptions(command: Command): Command {
  return command
    .option('--dev', 'Use the "dev" profile')
    .option('--dir <path>', 'Project directory', '.')
    .option('--config <path>', 'Config file (default: <dir>/reqlock.json)')
    .option('--tool <cmd>', 'Package manager executable (default: uv)')
    .option('--no-env', 'Skip loading .env file')
    .option('--dry-run', 'Print the commands without running them');
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('reqlock')
    .description('Compile requirements into a pinned lock file and sync the environment to it')
    .version(VERSION);

  addStageOptions(program.command('run [profile]', { isDefault: true }))
    .description('Compile the lock file, then sync the environment (default)')
    .option('--upgrade', 'Allow the compiler to upgrade pinned versions')
    .action(async (profile: string | undefined, options: StageCliOptions) => {
      try {
        process.exitCode = await run(profile, toRunOptions(options));
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exit(1);
      }
    });

  addStageOptions(program.command('compile [profile]'))
    .description('Compile the requirements file into its lock file only')
    .option('--upgrade', 'Allow the compiler to upgrade pinned versions')
    .action(async (profile: string | undefined, options: StageCliOptions) => {
      try {
        process.exitCode = await compile(profile, toRunOptions(options));
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exit(1);
      }
    });

  addStageOptions(program.command('sync [profile]'))
    .description('Sync the environment to an existing lock file only')
    .action(async (profile: string | undefined, options: StageCliOptions) => {
      try {
        process.exitCode = await sync(profile, toRunOptions(options));
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exit(1);
      }
    });

  program
    .command('profiles')
    .description('List the configured profiles')
    .option('--dir <path>', 'Project directory', '.')
    .option('--config <path>', 'Config file (default: <dir>/reqlock.json)')
    .option('--json', 'Output as JSON')
    .action(async (options: { dir: string; config?: string; json?: boolean }) => {
      try {
        await profiles(options);
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exit(1);
      }
    });

  return program;
}

// Only parse when run as CLI entry point (ESM check with symlink resolution)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  // Missing or virtual argv path: not the entry point
}
if (isDirectRun) {
  await buildProgram().parseAsync();
}
