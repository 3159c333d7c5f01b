import { resolve } from 'node:path';
import { loadConfig, BUILTIN_PROFILES } from '../core/config-loader.js';
import { table } from '../utils/output.js';

export interface ProfilesOptions {
  dir?: string;
  config?: string;
  json?: boolean;
}

export async function profiles(options: ProfilesOptions = {}): Promise<void> {
  const projectDir = resolve(options.dir ?? '.');
  const config = await loadConfig(projectDir, { configPath: options.config });
  const names = Object.keys(config.profiles).sort();

  if (options.json) {
    const entries = names.map((name) => ({ name, ...config.profiles[name] }));
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  const rows = [['PROFILE', 'SPEC', 'LOCK', 'SOURCE']];
  for (const name of names) {
    const profile = config.profiles[name];
    const builtin = BUILTIN_PROFILES[name];
    const source =
      builtin && builtin.spec === profile.spec && builtin.lock === profile.lock
        ? 'built-in'
        : 'config';
    rows.push([name, profile.spec, profile.lock, source]);
  }
  console.log(table(rows));
}
