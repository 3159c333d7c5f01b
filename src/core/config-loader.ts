import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import JSON5 from 'json5';
import { parse as parseDotenv } from 'dotenv';
import { isRecord, isStringArray, validateConfig } from './config-validator.js';
import { isMissingFileError } from '../utils/fs.js';
import { icons } from '../utils/output.js';
import type { NamedProfile, Profile, ReqlockConfig } from '../types/config.js';

export const CONFIG_FILENAME = 'reqlock.json';
export const DEFAULT_TOOL = 'uv';
export const TOOL_ENV_VAR = 'REQLOCK_TOOL';
export const DEFAULT_PROFILE = 'default';

export const BUILTIN_PROFILES: Readonly<Record<string, Profile>> = {
  default: { spec: 'requirements.in', lock: 'requirements.txt' },
  dev: { spec: 'requirements.dev.in', lock: 'requirements.dev.txt' },
};

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export class UnknownProfileError extends Error {
  constructor(
    public readonly profile: string,
    public readonly available: string[],
  ) {
    super(
      `Unknown profile "${profile}". Available profiles: ${available.join(', ')}`,
    );
    this.name = 'UnknownProfileError';
  }
}

export interface LoadConfigOptions {
  /** Explicit config path, resolved against the project directory. Must exist. */
  configPath?: string;
}

export function defaultConfig(): ReqlockConfig {
  return {
    tool: DEFAULT_TOOL,
    profiles: { ...BUILTIN_PROFILES },
    compileArgs: [],
    syncArgs: [],
  };
}

/** Merge a validated config document over the built-in defaults. */
function mergeConfig(raw: Record<string, unknown>): ReqlockConfig {
  const config = defaultConfig();

  if (typeof raw.tool === 'string') {
    config.tool = raw.tool;
  }

  if (isRecord(raw.profiles)) {
    for (const [name, entry] of Object.entries(raw.profiles)) {
      if (isRecord(entry) && typeof entry.spec === 'string' && typeof entry.lock === 'string') {
        config.profiles[name] = { spec: entry.spec, lock: entry.lock };
      }
    }
  }

  if (isStringArray(raw.compileArgs)) {
    config.compileArgs = raw.compileArgs;
  }
  if (isStringArray(raw.syncArgs)) {
    config.syncArgs = raw.syncArgs;
  }

  return config;
}

export async function loadConfig(
  projectDir: string,
  options: LoadConfigOptions = {},
): Promise<ReqlockConfig> {
  const configPath = options.configPath
    ? resolve(projectDir, options.configPath)
    : join(projectDir, CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (!options.configPath && isMissingFileError(err)) {
      return defaultConfig();
    }
    throw new ConfigLoadError(`Cannot read config file: ${configPath}`, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigLoadError(`Invalid JSON5 in config file: ${configPath}`, err);
  }

  const result = validateConfig(parsed);
  const errors = result.issues.filter((issue) => issue.severity === 'error');
  if (!result.valid || !isRecord(parsed)) {
    const details = errors.map((issue) => `  - ${issue.message}`).join('\n');
    throw new ConfigLoadError(`Invalid config file: ${configPath}\n${details}`);
  }

  for (const issue of result.issues) {
    if (issue.severity === 'warning') {
      console.warn(`${icons.warning} ${issue.message}`);
    }
  }

  return mergeConfig(parsed);
}

export interface ResolveToolOptions {
  /** Value of --tool; wins over everything else. */
  tool?: string;
  noEnv?: boolean;
  envFilePath?: string;
  /** Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Pick the package manager executable.
 * Precedence: CLI > .env > environment > config file > default.
 */
export async function resolveTool(
  config: ReqlockConfig,
  projectDir: string,
  options: ResolveToolOptions = {},
): Promise<string> {
  if (options.tool) {
    return options.tool;
  }

  if (!options.noEnv) {
    const envPath = options.envFilePath ?? join(projectDir, '.env');
    try {
      const envFileVars = parseDotenv(await readFile(envPath));
      const fromFile = envFileVars[TOOL_ENV_VAR];
      if (fromFile) {
        return fromFile;
      }
    } catch (err) {
      if (!isMissingFileError(err)) {
        throw new ConfigLoadError(`Cannot read env file: ${envPath}`, err);
      }
    }
  }

  const env = options.env ?? process.env;
  const fromEnv = env[TOOL_ENV_VAR];
  if (fromEnv) {
    return fromEnv;
  }

  return config.tool;
}

export function resolveProfile(
  config: ReqlockConfig,
  name: string = DEFAULT_PROFILE,
): NamedProfile {
  const profile = Object.hasOwn(config.profiles, name)
    ? config.profiles[name]
    : undefined;
  if (!profile) {
    throw new UnknownProfileError(name, Object.keys(config.profiles).sort());
  }
  return { name, ...profile };
}
