import { choose, parseChooserCommand } from './chooser/ChooserProtocol.js';
import type { Environment } from './config/environment.js';
import { UnknownApplicationError } from './errors.js';
import { launch } from './launch/LaunchDispatcher.js';
import { buildRegistry } from './registry/ApplicationRegistry.js';
import type { ProcessExit } from './types.js';
import { logger } from './utils/logger.js';

export interface MenuSessionOptions {
  /** Menu invocation, split on whitespace */
  menuProgram: string;
  /** Directories in merge order, later ones win */
  searchDirectories: readonly string[];
  terminal?: string | undefined;
  environment: Environment;
}

export type MenuSessionOutcome =
  | { kind: 'cancelled' }
  | { kind: 'launched'; name: string; exit: ProcessExit };

/**
 * One pass of the pipeline: build the registry, ask the menu, launch the
 * pick. The menu and the application run one after the other, each waited
 * for before going on.
 */
export async function launchFromMenu(options: MenuSessionOptions): Promise<MenuSessionOutcome> {
  const chooserArgv = parseChooserCommand(options.menuProgram);
  const registry = await buildRegistry(options.searchDirectories);
  logger.debug('Registry built', {
    directories: options.searchDirectories,
    applications: registry.size,
  });

  const choice = await choose(registry.names(), chooserArgv);
  if (choice.kind === 'cancelled') {
    logger.debug('Selection cancelled');
    return { kind: 'cancelled' };
  }

  console.log(`chosen program: ${choice.name}`);

  const body = registry.get(choice.name);
  if (!body) {
    throw new UnknownApplicationError(choice.name);
  }

  const exit = await launch(body, {
    terminal: options.terminal,
    environment: options.environment,
  });
  return { kind: 'launched', name: choice.name, exit };
}
