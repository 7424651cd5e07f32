/**
 * @fileoverview Name-keyed collection of the applications found in an
 * ordered list of search directories.
 *
 * Names are unique. When two descriptors carry the same name, the one merged
 * later wins, so the order of the search directories decides which of them
 * is offered: user directories are listed after system ones to override
 * them.
 */

import { parseDescriptorFile } from '../discovery/DescriptorParser.js';
import { scanDirectory } from '../discovery/DescriptorReader.js';
import { DirectoryReadError } from '../errors.js';
import type { Application, ApplicationBody } from '../types.js';
import { logger } from '../utils/logger.js';

/**
 * Read-only application registry.
 */
export class ApplicationRegistry {
  private readonly applications: ReadonlyMap<string, ApplicationBody>;

  constructor(applications: ReadonlyMap<string, ApplicationBody>) {
    this.applications = applications;
  }

  /** Number of distinct names */
  get size(): number {
    return this.applications.size;
  }

  has(name: string): boolean {
    return this.applications.has(name);
  }

  get(name: string): ApplicationBody | undefined {
    return this.applications.get(name);
  }

  /**
   * All names in codepoint order.
   */
  names(): string[] {
    return [...this.applications.keys()].sort(compareCodepoints);
  }

  /**
   * All entries, ordered by name like `names()`.
   */
  entries(): [string, ApplicationBody][] {
    return [...this.applications].sort(([a], [b]) => compareCodepoints(a, b));
  }
}

/**
 * Compare strings by code point, the way a byte-wise sort of their UTF-8
 * encoding would order them. `localeCompare` and the default sort (UTF-16
 * code units) differ from that for some inputs.
 */
export function compareCodepoints(a: string, b: string): number {
  const left = Array.from(a, (char) => char.codePointAt(0) ?? 0);
  const right = Array.from(b, (char) => char.codePointAt(0) ?? 0);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}

/**
 * Fold applications into a map, later entries overwriting earlier ones.
 */
export function mergeApplications(
  into: Map<string, ApplicationBody>,
  applications: Iterable<Application>
): Map<string, ApplicationBody> {
  for (const application of applications) {
    into.set(application.name, application.body);
  }
  return into;
}

/**
 * Parse every candidate descriptor of one directory, one file at a time.
 * Results are ordered by descriptor path so that duplicates inside one directory resolve the same
 * way regardless of how the filesystem lists them.
 *
 * @throws {DirectoryReadError} when the directory cannot be listed
 */
export async function loadDirectory(directory: string): Promise<Application[]> {
  const candidates = await scanDirectory(directory);
  candidates.sort(compareCodepoints);

  const applications: Application[] = [];
  for (const path of candidates) {
    const application = await parseDescriptorFile(path);
    if (application) {
      applications.push(application);
    }
  }
  return applications;
}

/**
 * Build the registry from the given directories, in order.
 *
 * A directory that cannot be read contributes no applications; if none can
 * be read the registry is empty.
 */
export async function buildRegistry(directories: readonly string[]): Promise<ApplicationRegistry> {
  let merged = new Map<string, ApplicationBody>();

  for (const directory of directories) {
    let applications: Application[];
    try {
      applications = await loadDirectory(directory);
    } catch (err) {
      if (err instanceof DirectoryReadError) {
        logger.debug('Skipping search directory', { directory, error: err.message });
        continue;
      }
      throw err;
    }

    logger.debug('Loaded search directory', { directory, applications: applications.length });
    merged = mergeApplications(merged, applications);
  }

  return new ApplicationRegistry(merged);
}
