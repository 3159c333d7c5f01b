import { resolve } from 'node:path';
import { loadConfig, resolveProfile, resolveTool } from './config-loader.js';
import { runPipeline } from './pipeline.js';
import { label, value } from '../utils/output.js';
import type { RunMode } from '../types/config.js';

export interface ProjectOptions {
  /** Project directory; defaults to the current directory. */
  dir?: string;
  config?: string;
  tool?: string;
  noEnv?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface ProfileRunOptions extends ProjectOptions {
  /** Shorthand for the "dev" profile when no profile name is given. */
  dev?: boolean;
  dryRun?: boolean;
  upgrade?: boolean;
}

export function pickProfileName(
  name: string | undefined,
  dev: boolean | undefined,
): string | undefined {
  if (name) return name;
  return dev ? 'dev' : undefined;
}

/**
 * Load the project config, resolve the profile and tool, and run the
 * requested stages. Returns the process exit code.
 */
export async function runProfile(
  mode: RunMode,
  profileName: string | undefined,
  options: ProfileRunOptions = {},
): Promise<number> {
  const projectDir = resolve(options.dir ?? '.');
  const config = await loadConfig(projectDir, { configPath: options.config });
  const profile = resolveProfile(config, pickProfileName(profileName, options.dev));
  const tool = await resolveTool(config, projectDir, {
    tool: options.tool,
    noEnv: options.noEnv,
    env: options.env,
  });

  console.log(
    `${label('Profile:')} ${value(profile.name)} ${label(`(${profile.spec} -> ${profile.lock})`)}`,
  );

  const result = await runPipeline(profile, {
    tool,
    cwd: projectDir,
    mode,
    upgrade: options.upgrade,
    compileArgs: config.compileArgs,
    syncArgs: config.syncArgs,
    dryRun: options.dryRun,
  });

  return result.exitCode;
}
