import { join } from 'node:path';
import { MissingEnvironmentError } from '../errors.js';

/**
 * Read access to environment variables. Injected so tests can supply fixed
 * values instead of touching `process.env`.
 */
export interface Environment {
  get(name: string): string | undefined;
}

export const processEnvironment: Environment = {
  get(name: string): string | undefined {
    return process.env[name];
  },
};

/**
 * Build an environment from a plain record.
 */
export function fixedEnvironment(values: Record<string, string>): Environment {
  return {
    get(name: string): string | undefined {
      return Object.hasOwn(values, name) ? values[name] : undefined;
    },
  };
}

export const SYSTEM_APPLICATIONS_DIR = '/usr/share/applications';

/**
 * Get the home directory.
 * @throws {MissingEnvironmentError} when HOME is unset or empty
 */
export function requireHome(environment: Environment): string {
  const home = environment.get('HOME');
  if (home === undefined || home.length === 0) {
    throw new MissingEnvironmentError('HOME');
  }
  return home;
}

/**
 * System directory first, user directory second: user descriptors override
 * system ones with the same name.
 */
export function defaultSearchDirectories(environment: Environment): string[] {
  const home = requireHome(environment);
  return [SYSTEM_APPLICATIONS_DIR, join(home, '.local', 'share', 'applications')];
}
