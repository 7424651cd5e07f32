import { readdir, realpath, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { DirectoryReadError } from '../errors.js';

/**
 * Name suffix of candidate descriptor files. Deliberately not `.desktop`:
 * any name ending in these characters is a candidate.
 */
export const DESCRIPTOR_SUFFIX = 'desktop';

export function isDescriptorName(name: string): boolean {
  return name.endsWith(DESCRIPTOR_SUFFIX);
}

/**
 * Resolve a directory entry to its canonical path if it is a regular file
 * (after following symlinks), otherwise null.
 */
export async function resolveDescriptorPath(path: string): Promise<string | null> {
  try {
    const location = await realpath(path);
    const info = await stat(location);
    return info.isFile() ? location : null;
  } catch {
    // dangling link, vanished entry or no permission: not a candidate
    return null;
  }
}

/**
 * List the candidate descriptor files of one directory.
 *
 * Order follows the filesystem and is not guaranteed.
 * @throws {DirectoryReadError} when the directory cannot be listed
 */
export async function scanDirectory(directory: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(directory);
  } catch (err) {
    throw new DirectoryReadError(directory, err);
  }

  const candidates: string[] = [];
  for (const name of names.filter(isDescriptorName)) {
    const location = await resolveDescriptorPath(join(directory, name));
    if (location !== null) {
      candidates.push(location);
    }
  }
  return candidates;
}
