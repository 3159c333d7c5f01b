import { runProfile } from '../core/project.js';
import type { ProfileRunOptions } from '../core/project.js';

export type RunOptions = ProfileRunOptions;

/** Compile the profile's requirements, then sync the environment to the lock file. */
export async function run(
  profileName: string | undefined,
  options: RunOptions = {},
): Promise<number> {
  return runProfile('compile-sync', profileName, options);
}
