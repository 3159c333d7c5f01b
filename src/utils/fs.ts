import { stat } from 'node:fs/promises';

export async function isFile(path: string): Promise<boolean> {
  try {
    const s = await stat(path);
    return s.isFile();
  } catch {
    return false;
  }
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export function isMissingFileError(err: unknown): boolean {
  return hasErrorCode(err, 'ENOENT');
}
