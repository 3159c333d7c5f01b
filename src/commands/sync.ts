import { runProfile } from '../core/project.js';
import type { ProfileRunOptions } from '../core/project.js';

// --upgrade only applies to the compiler
export type SyncOptions = Omit<ProfileRunOptions, 'upgrade'>;

export async function sync(
  profileName: string | undefined,
  options: SyncOptions = {},
): Promise<number> {
  return runProfile('sync', profileName, options);
}
