/**
 * Core types for the launcher pipeline.
 */

/** How to start one application. */
export interface ApplicationBody {
  /** Canonical path of the descriptor file this came from */
  readonly path: string;
  /** Program followed by its arguments, placeholders removed */
  readonly exec: readonly string[];
  /** Run inside a terminal emulator */
  readonly terminal: boolean;
}

export interface Application {
  /** Display name, unique key in the registry */
  readonly name: string;
  readonly body: ApplicationBody;
}

export type ChooseResult = { kind: 'selected'; name: string } | { kind: 'cancelled' };

/** Result of a finished child process. `exitCode` is null when killed by a signal. */
export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}
