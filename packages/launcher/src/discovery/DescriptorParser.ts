import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Application } from '../types.js';
import { logger } from '../utils/logger.js';
import { DESKTOP_ENTRY_SECTION, parseDesktopEntry } from './desktopEntry.js';

// Terminal is textual and case-insensitive; anything but true/false rejects the file.
const TerminalSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) {
      return false;
    }
    const lowered = value.toLowerCase();
    if (lowered === 'true') {
      return true;
    }
    if (lowered === 'false') {
      return false;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `not a boolean: ${value}`,
    });
    return z.NEVER;
  });

/**
 * The keys of the `[Desktop Entry]` section that decide whether and how an
 * application is offered. Every other key is stripped.
 */
export const DesktopEntrySchema = z.object({
  NoDisplay: z
    .string()
    .optional()
    .refine((value) => value !== 'true', { message: 'hidden from menus' }),
  Type: z.literal('Application'),
  Name: z.string(),
  Exec: z.string(),
  Terminal: TerminalSchema,
});

/**
 * Split an Exec value into tokens, dropping `%` field codes.
 *
 * @example
 * ```typescript
 * tokenizeExec('firefox %u --new-window'); // ['firefox', '--new-window']
 * ```
 */
export function tokenizeExec(exec: string): string[] {
  return exec
    .trim()
    .split(/\s+/)
    .filter((token) => token.length > 0 && !token.startsWith('%'));
}

/**
 * Turn the text of a descriptor into an application, or null when the file
 * should not be offered.
 */
export function parseDescriptor(content: string, path: string): Application | null {
  const parsed = parseDesktopEntry(content);
  if (!parsed.ok) {
    logger.debug('Skipping unparseable descriptor', {
      path,
      line: parsed.line,
      error: parsed.error,
    });
    return null;
  }

  const section = parsed.sections.get(DESKTOP_ENTRY_SECTION);
  if (!section) {
    logger.debug('Skipping descriptor without desktop entry section', { path });
    return null;
  }

  const result = DesktopEntrySchema.safeParse(Object.fromEntries(section));
  if (!result.success) {
    logger.debug('Skipping descriptor', {
      path,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }

  const entry = result.data;
  return {
    name: entry.Name,
    body: {
      path,
      exec: tokenizeExec(entry.Exec),
      terminal: entry.Terminal,
    },
  };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read and parse one descriptor file. Never rejects: unreadable or
 * undecodable files are skipped like malformed ones.
 */
export async function parseDescriptorFile(path: string): Promise<Application | null> {
  let content: string;
  try {
    content = utf8.decode(await readFile(path));
  } catch (err) {
    logger.debug('Skipping unreadable descriptor', {
      path,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
  return parseDescriptor(content, path);
}
