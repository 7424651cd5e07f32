/**
 * @fileoverview Error types raised across the launcher.
 *
 * Every fatal condition is a `LauncherError`; the CLI prints its message and
 * exits with its `exitCode`. `DirectoryReadError` is the only one that is
 * caught on the way up (an unreadable search directory contributes nothing).
 */

export class LauncherError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = 'LauncherError';
  }
}

/**
 * Bad command line.
 */
export class UsageError extends LauncherError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Configuration file missing (when named explicitly), unparseable or invalid.
 */
export class ConfigError extends LauncherError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

export class MissingEnvironmentError extends LauncherError {
  readonly variable: string;

  constructor(variable: string) {
    super(`environment variable ${variable} is not set`);
    this.name = 'MissingEnvironmentError';
    this.variable = variable;
  }
}

export class DirectoryReadError extends LauncherError {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    super(`cannot read directory '${directory}': ${describeCause(cause)}`);
    this.name = 'DirectoryReadError';
    this.directory = directory;
  }
}

export class ChooserSpawnError extends LauncherError {
  readonly command: readonly string[];

  constructor(command: readonly string[], cause: unknown) {
    super(`failed to spawn menu '${command.join(' ')}': ${describeCause(cause)}`);
    this.name = 'ChooserSpawnError';
    this.command = command;
  }
}

export class ChooserOutputError extends LauncherError {
  constructor(message: string) {
    super(`unreadable menu output: ${message}`);
    this.name = 'ChooserOutputError';
  }
}

export class LaunchError extends LauncherError {
  readonly commandLine: string;

  constructor(commandLine: string, cause: unknown) {
    super(`error when executing '${commandLine}': ${describeCause(cause)}`);
    this.name = 'LaunchError';
    this.commandLine = commandLine;
  }
}

/**
 * The chooser answered with a name the registry does not hold.
 */
export class UnknownApplicationError extends LauncherError {
  readonly applicationName: string;

  constructor(applicationName: string) {
    super(`no application named '${applicationName}'`);
    this.name = 'UnknownApplicationError';
    this.applicationName = applicationName;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
