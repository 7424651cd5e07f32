/**
 * @fileoverview Conversation with the external menu program.
 *
 * The menu reads one application name per line on stdin and prints the
 * picked name on stdout. A non-zero exit status or blank output means the
 * user cancelled.
 */

import { ChooserOutputError, ChooserSpawnError, UsageError } from '../errors.js';
import { compareCodepoints } from '../registry/ApplicationRegistry.js';
import type { ChooseResult, ProcessExit } from '../types.js';
import { logger } from '../utils/logger.js';
import { type CapturedProcess, runWithInput } from '../utils/process.js';

/**
 * Split a menu invocation such as `"dmenu -i -l 20"` into argv.
 * @throws {UsageError} if the command holds no program
 */
export function parseChooserCommand(command: string): string[] {
  const argv = command.trim().split(/\s+/).filter((token) => token.length > 0);
  if (argv.length === 0) {
    throw new UsageError('menu program must not be empty');
  }
  return argv;
}

/**
 * Serialize names for the menu's stdin: sorted by code point, each followed
 * by a newline.
 */
export function serializeNames(names: Iterable<string>): string {
  return [...names]
    .sort(compareCodepoints)
    .map((name) => `${name}\n`)
    .join('');
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decide what the menu's exit status and output mean.
 * @throws {ChooserOutputError} if the output is not valid UTF-8
 */
export function interpretChooserOutput(
  exit: ProcessExit & { stdout: Uint8Array }
): ChooseResult {
  if (exit.exitCode !== 0) {
    return { kind: 'cancelled' };
  }

  let text: string;
  try {
    text = utf8.decode(exit.stdout);
  } catch (err) {
    throw new ChooserOutputError(err instanceof Error ? err.message : String(err));
  }

  const name = text.trim();
  if (name.length === 0) {
    return { kind: 'cancelled' };
  }
  return { kind: 'selected', name };
}

/**
 * Offer `names` through the menu program and wait for the user's pick.
 * @throws {ChooserSpawnError} if the menu program cannot be started
 */
export async function choose(
  names: Iterable<string>,
  chooserArgv: readonly string[]
): Promise<ChooseResult> {
  const [command, ...args] = chooserArgv;
  if (command === undefined) {
    throw new UsageError('menu program must not be empty');
  }

  const input = serializeNames(names);

  let result: CapturedProcess;
  try {
    result = await runWithInput(command, args, input);
  } catch (err) {
    throw new ChooserSpawnError(chooserArgv, err);
  }

  if (result.exitCode !== 0) {
    logger.debug('Menu exited without a selection', {
      exitCode: result.exitCode,
      signal: result.signal,
      stderr: result.stderr.toString('utf8').trim(),
    });
  }

  return interpretChooserOutput(result);
}
