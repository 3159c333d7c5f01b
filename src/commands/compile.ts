import { runProfile } from '../core/project.js';
import type { ProfileRunOptions } from '../core/project.js';

export type CompileOptions = ProfileRunOptions;

export async function compile(
  profileName: string | undefined,
  options: CompileOptions = {},
): Promise<number> {
  return runProfile('compile', profileName, options);
}
