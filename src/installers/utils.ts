import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

/**
 * Expand tilde (~) to home directory in file paths
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

/**
 * Walk up from a path until an existing directory is found
 */
export function nearestExistingDir(dirPath: string): string {
  let current = path.resolve(dirPath);
  while (!fs.existsSync(current)) {
    const parent = path.dirname(current);
    if (parent === current) {
      return current;
    }
    current = parent;
  }
  return current;
}

/**
 * Whether the current user can create files in a directory (or the nearest parent that exists)
 */
export function isDirWritable(dirPath: string): boolean {
  try {
    fs.accessSync(nearestExistingDir(dirPath), fs.constants.W_OK);
    return true;
  } catch (error) {
    return false;
  }
}

export function isExecutable(filePath: string): boolean {
  const stats = fs.statSync(filePath);
  return (stats.mode & 0o111) === 0o111;
}

export function filesMatch(a: string, b: string): boolean {
  if (!fs.existsSync(a) || !fs.existsSync(b)) {
    return false;
  }
  if (fs.statSync(a).size !== fs.statSync(b).size) {
    return false;
  }
  return fs.readFileSync(a).equals(fs.readFileSync(b));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
