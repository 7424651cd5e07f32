/**
 * @fileoverview Public API of the menu launcher.
 */

export {
  choose,
  interpretChooserOutput,
  parseChooserCommand,
  serializeNames,
} from './chooser/ChooserProtocol.js';
export {
  type CliCommand,
  type CliOptions,
  parseCommandLine,
  resolveSearchDirectories,
  run,
  USAGE,
} from './cli.js';
export {
  defaultSearchDirectories,
  type Environment,
  fixedEnvironment,
  processEnvironment,
} from './config/environment.js';
export { type LauncherConfig, loadLauncherConfig, locateConfig } from './config/launcherConfig.js';
export {
  DesktopEntrySchema,
  parseDescriptor,
  parseDescriptorFile,
  tokenizeExec,
} from './discovery/DescriptorParser.js';
export { isDescriptorName, scanDirectory } from './discovery/DescriptorReader.js';
export { parseDesktopEntry } from './discovery/desktopEntry.js';
export * from './errors.js';
export { buildLaunchCommand, launch, resolveTerminal } from './launch/LaunchDispatcher.js';
export { ApplicationRegistry, buildRegistry } from './registry/ApplicationRegistry.js';
export { launchFromMenu, type MenuSessionOptions, type MenuSessionOutcome } from './session.js';
export type { Application, ApplicationBody, ChooseResult, ProcessExit } from './types.js';
export { type LogLevel, logger, setLogLevel } from './utils/logger.js';
export { VERSION } from './version.js';
