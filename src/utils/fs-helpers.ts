import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

/**
 * Resolve a path from a config file relative to that file's directory
 */
export function resolveFromConfig(configPath: string | undefined, filePath: string): string {
  const expanded = expandHome(filePath);
  if (path.isAbsolute(expanded) || !configPath) {
    return path.resolve(expanded);
  }
  return path.resolve(path.dirname(configPath), expanded);
}

/**
 * Read a UTF-8 file, returning null when it does not exist
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
