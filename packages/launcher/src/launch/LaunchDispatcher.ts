import type { Environment } from '../config/environment.js';
import { LaunchError } from '../errors.js';
import type { ApplicationBody, ProcessExit } from '../types.js';
import { logger } from '../utils/logger.js';
import { runInherited } from '../utils/process.js';

export const FALLBACK_TERMINAL = 'xterm';

export interface LaunchOptions {
  /** Terminal emulator to wrap terminal applications in */
  terminal?: string | undefined;
  environment: Environment;
}

/**
 * Pick the terminal emulator: explicit choice, then `TERM`, then xterm.
 */
export function resolveTerminal(override: string | undefined, environment: Environment): string {
  if (override !== undefined && override.length > 0) {
    return override;
  }
  const fromEnvironment = environment.get('TERM');
  if (fromEnvironment !== undefined && fromEnvironment.length > 0) {
    return fromEnvironment;
  }
  logger.warn(`could not infer terminal emulator, assuming ${FALLBACK_TERMINAL}`);
  return FALLBACK_TERMINAL;
}

/**
 * argv for starting `body`, wrapped as `<terminal> -e <exec...>` when a
 * terminal is given.
 */
export function buildLaunchCommand(body: ApplicationBody, terminal?: string): string[] {
  if (terminal !== undefined) {
    return [terminal, '-e', ...body.exec];
  }
  return [...body.exec];
}

/**
 * Start the application and wait for it to finish.
 *
 * The application's own exit status is returned but not judged: only a
 * failure to start it is an error.
 * @throws {LaunchError} if the command is empty or cannot be started
 */
export async function launch(body: ApplicationBody, options: LaunchOptions): Promise<ProcessExit> {
  const terminal = body.terminal ? resolveTerminal(options.terminal, options.environment) : undefined;
  const argv = buildLaunchCommand(body, terminal);
  const commandLine =
    terminal !== undefined ? `${terminal} -e ${body.exec.join(' ')}` : body.exec.join(' ');

  const [command, ...args] = argv;
  if (command === undefined) {
    throw new LaunchError(commandLine, new Error(`empty command line in ${body.path}`));
  }

  logger.debug('Launching', { argv, descriptor: body.path });

  let exit: ProcessExit;
  try {
    exit = await runInherited(command, args);
  } catch (err) {
    throw new LaunchError(commandLine, err);
  }

  logger.debug('Application exited', { exitCode: exit.exitCode, signal: exit.signal });
  return exit;
}
