import { spawn } from 'node:child_process';
import type { ProcessExit } from '../types.js';

/**
 * A finished child process with its captured output.
 */
export interface CapturedProcess extends ProcessExit {
  stdout: Buffer;
  stderr: Buffer;
}

function isBrokenPipe(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EPIPE';
}

/**
 * Run a program with piped stdio: write `input` to its stdin, close it, and
 * collect stdout and stderr until the process exits.
 *
 * Rejects with the underlying error when the program cannot be started. A
 * broken pipe on stdin (the program exited without reading) is not an
 * error; the exit status tells what happened.
 */
export function runWithInput(
  command: string,
  args: readonly string[],
  input: string
): Promise<CapturedProcess> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'pipe' });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', reject);
    child.once('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
      });
    });

    child.stdin.on('error', (err: Error) => {
      if (!isBrokenPipe(err)) {
        reject(err);
      }
    });
    child.stdin.end(input);
  });
}

/**
 * Run a program on the launcher's own stdio and wait for it to exit.
 * Rejects when the program cannot be started.
 */
export function runInherited(command: string, args: readonly string[]): Promise<ProcessExit> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });
    child.once('error', reject);
    child.once('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      resolve({ exitCode, signal });
    });
  });
}
