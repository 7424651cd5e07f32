import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Text of a descriptor with a single `[Desktop Entry]` section.
 */
export function desktopFile(fields: Record<string, string>): string {
  const lines = Object.entries(fields).map(([key, value]) => `${key}=${value}`);
  return `[Desktop Entry]\n${lines.join('\n')}\n`;
}

export function appFile(name: string, exec: string, extra: Record<string, string> = {}): string {
  return desktopFile({ Type: 'Application', Name: name, Exec: exec, ...extra });
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'menu-launcher-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Create `dir` and write each `files` entry into it.
 */
export async function writeFiles(dir: string, files: Record<string, string | Uint8Array>): Promise<void> {
  await mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(dir, name), content);
  }
}
