import { mkdir } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { IOError } from './errors.js';

/**
 * Expands a leading `~` to the current user's home directory and resolves the result
 * to an absolute path.
 */
export function resolveConfPath(confPath: string, homeDir: string = os.homedir()): string {
  if (confPath === '~') {
    return path.resolve(homeDir);
  }
  if (confPath.startsWith('~/') || confPath.startsWith(`~${path.sep}`)) {
    return path.resolve(homeDir, confPath.slice(2));
  }
  return path.resolve(confPath);
}

/**
 * Creates the parent directory of `filePath`, including missing ancestors.
 */
export async function ensureParentDirectory(filePath: string): Promise<void> {
  const directory = path.dirname(filePath);
  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw new IOError(directory, error);
  }
}
