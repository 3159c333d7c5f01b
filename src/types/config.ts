export type StageName = 'compile' | 'sync';

/** Which stages a run executes. Compile always precedes sync. */
export type RunMode = 'compile-sync' | 'compile' | 'sync';

export interface Profile {
  /** Requirements specification file, relative to the project directory. */
  spec: string;
  /** Lock file written by the compile step and read by the sync step. */
  lock: string;
}

export interface NamedProfile extends Profile {
  name: string;
}

export interface ReqlockConfig {
  /** Package manager executable, e.g. "uv". */
  tool: string;
  profiles: Record<string, Profile>;
  compileArgs: string[];
  syncArgs: string[];
}
