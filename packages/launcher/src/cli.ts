/**
 * @fileoverview Command line entry: discover applications, ask the menu,
 * launch the pick.
 */

import { parseArgs } from 'node:util';
import {
  defaultSearchDirectories,
  type Environment,
  processEnvironment,
} from './config/environment.js';
import { type LauncherConfig, loadLauncherConfig } from './config/launcherConfig.js';
import { LauncherError, UsageError } from './errors.js';
import { launchFromMenu } from './session.js';
import { logger, setLogLevel } from './utils/logger.js';
import { VERSION } from './version.js';

export const USAGE = `Usage: menu-launcher [options] <menu-program> [search-dirs...]

Searches desktop files and lets the user launch an application using a menu
of their choice, such as dmenu.

Arguments:
  menu-program        the menu program to be used, such as "dmenu -i"
  search-dirs         the directories to be searched, defaults to
                      /usr/share/applications and ~/.local/share/applications

Options:
  -t, --term <cmd>    terminal emulator for terminal applications, defaults to $TERM
  -c, --config <file> configuration file
  -v, --verbose       print debug output
  -h, --help          print this help
  -V, --version       print the version
`;

export interface CliOptions {
  menuProgram: string;
  searchDirs: string[];
  terminal?: string | undefined;
  configPath?: string | undefined;
  verbose: boolean;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'launch'; options: CliOptions };

/**
 * Parse command line arguments (without the node and script entries).
 * @throws {UsageError} on unknown options or a missing menu program
 */
export function parseCommandLine(argv: readonly string[]): CliCommand {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { kind: 'help' };
  }
  if (values.version) {
    return { kind: 'version' };
  }

  const [menuProgram, ...searchDirs] = positionals;
  if (menuProgram === undefined) {
    throw new UsageError('missing required argument <menu-program>');
  }

  return {
    kind: 'launch',
    options: {
      menuProgram,
      searchDirs,
      terminal: values.term,
      configPath: values.config,
      verbose: values.verbose ?? false,
    },
  };
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      term: { type: 'string', short: 't' },
      config: { type: 'string', short: 'c' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'V' },
    },
  });
}

/**
 * Search directories: the command line list replaces everything, then the
 * configuration file, then the system and user defaults.
 */
export function resolveSearchDirectories(
  options: CliOptions,
  config: LauncherConfig,
  environment: Environment
): string[] {
  if (options.searchDirs.length > 0) {
    return options.searchDirs;
  }
  if (config.searchDirs) {
    return config.searchDirs;
  }
  return defaultSearchDirectories(environment);
}

/**
 * Run the launcher and return the process exit status.
 */
export async function run(
  argv: readonly string[],
  environment: Environment = processEnvironment
): Promise<number> {
  try {
    const command = parseCommandLine(argv);
    if (command.kind === 'help') {
      console.log(USAGE);
      return 0;
    }
    if (command.kind === 'version') {
      console.log(VERSION);
      return 0;
    }

    const { options } = command;
    const config = loadLauncherConfig(options.configPath, environment);
    if (options.verbose) {
      setLogLevel('debug');
    } else if (config.logLevel) {
      setLogLevel(config.logLevel);
    }

    await launchFromMenu({
      menuProgram: options.menuProgram,
      searchDirectories: resolveSearchDirectories(options, config, environment),
      terminal: options.terminal ?? config.terminal,
      environment,
    });
    return 0;
  } catch (err) {
    if (err instanceof LauncherError) {
      logger.error(err.message);
      if (err instanceof UsageError) {
        console.error(USAGE);
      }
      return err.exitCode;
    }
    logger.error('Unexpected failure', {
      error: err instanceof Error ? (err.stack ?? err.message) : String(err),
    });
    return 1;
  }
}
