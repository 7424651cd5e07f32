/**
 * @fileoverview Optional YAML configuration for the launcher.
 *
 * ```yaml
 * terminal: alacritty
 * searchDirs:
 *   - /usr/share/applications
 *   - /home/me/.local/share/applications
 * logLevel: info
 * ```
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { Environment } from './environment.js';

export const CONFIG_ENV_VAR = 'MENU_LAUNCHER_CONFIG';
export const CONFIG_DIR_NAME = 'menu-launcher';
export const CONFIG_FILE_NAME = 'config.yaml';

const LauncherConfigSchema = z.object({
  terminal: z.string().min(1).optional(),
  searchDirs: z.array(z.string().min(1)).min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type LauncherConfig = z.infer<typeof LauncherConfigSchema>;

export interface ConfigLocation {
  path: string;
  /** Named by the user (flag or env var) rather than the default location */
  explicit: boolean;
}

/**
 * Where to look for the configuration file:
 * - the `--config` path if given
 * - otherwise MENU_LAUNCHER_CONFIG
 * - otherwise $XDG_CONFIG_HOME/menu-launcher/config.yaml
 * - otherwise $HOME/.config/menu-launcher/config.yaml
 *
 * Returns null if none of these can be derived.
 */
export function locateConfig(
  explicitPath: string | undefined,
  environment: Environment
): ConfigLocation | null {
  if (explicitPath !== undefined) {
    return { path: explicitPath, explicit: true };
  }

  const fromEnvironment = environment.get(CONFIG_ENV_VAR);
  if (fromEnvironment) {
    return { path: fromEnvironment, explicit: true };
  }

  const configHome = environment.get('XDG_CONFIG_HOME');
  if (configHome) {
    return { path: join(configHome, CONFIG_DIR_NAME, CONFIG_FILE_NAME), explicit: false };
  }

  const home = environment.get('HOME');
  if (home) {
    return { path: join(home, '.config', CONFIG_DIR_NAME, CONFIG_FILE_NAME), explicit: false };
  }

  return null;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Validate parsed YAML. An empty document is an empty configuration.
 * @throws {ConfigError} on schema violations
 */
export function validateConfig(raw: unknown): LauncherConfig {
  if (raw === null || raw === undefined) {
    return {};
  }
  const result = LauncherConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(details);
  }
  return result.data;
}

/**
 * Load and validate the configuration.
 *
 * A missing file at the default location yields an empty configuration; a
 * missing file the user named explicitly is an error.
 * @throws {ConfigError} if the file is unreadable, not YAML, or invalid
 */
export function loadLauncherConfig(
  explicitPath: string | undefined,
  environment: Environment
): LauncherConfig {
  const location = locateConfig(explicitPath, environment);
  if (!location) {
    return {};
  }

  let fileContents: string;
  try {
    fileContents = readFileSync(location.path, 'utf8');
  } catch (error) {
    if (isNotFound(error) && !location.explicit) {
      return {};
    }
    throw new ConfigError(
      `cannot read ${location.path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(fileContents);
  } catch (error) {
    throw new ConfigError(
      `${location.path} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return validateConfig(raw);
}
