import type { PathMatchMode, SetupPlatform } from '../config';
import { PATH_DELIMITERS } from '../shared-constants';

/**
 * Normalize a single PATH segment for comparison:
 * surrounding whitespace and quotes, then trailing separators, are dropped.
 * Windows compares case-insensitively.
 */
export function normalizePathEntry(entry: string, platform: SetupPlatform): string {
  let normalized = entry.trim().replace(/^"(.*)"$/, '$1').trim();
  normalized = normalized.length > 1 ? normalized.replace(/[\\/]+$/, '') : normalized;
  return platform === 'windows' ? normalized.toLowerCase() : normalized;
}

export function splitPathEntries(value: string, delimiter: string): string[] {
  return value.split(delimiter).filter(entry => entry.trim() !== '');
}

export function containsPathEntry(
  value: string,
  folder: string,
  mode: PathMatchMode,
  platform: SetupPlatform
): boolean {
  const delimiter = PATH_DELIMITERS[platform];

  if (mode === 'legacy') {
    // Only matches an entry with a delimiter on both sides
    return value.includes(`${delimiter}${folder}${delimiter}`);
  }

  const target = normalizePathEntry(folder, platform);
  return splitPathEntries(value, delimiter)
    .some(entry => normalizePathEntry(entry, platform) === target);
}

/**
 * Append exactly one segment. A trailing delimiter on the existing value is reused
 * rather than producing an empty segment.
 */
export function appendPathEntry(value: string, folder: string, delimiter: string): string {
  if (value === '') {
    return folder;
  }
  return value.endsWith(delimiter) ? `${value}${folder}` : `${value}${delimiter}${folder}`;
}

export function removePathEntry(value: string, folder: string, platform: SetupPlatform): string {
  const delimiter = PATH_DELIMITERS[platform];
  const target = normalizePathEntry(folder, platform);
  return value
    .split(delimiter)
    .filter(entry => entry.trim() === '' || normalizePathEntry(entry, platform) !== target)
    .join(delimiter);
}
