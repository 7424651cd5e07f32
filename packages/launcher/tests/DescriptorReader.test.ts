import { mkdir, realpath, symlink } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isDescriptorName, scanDirectory } from '../src/discovery/DescriptorReader.js';
import { DirectoryReadError } from '../src/errors.js';
import { appFile, makeTempDir, removeTempDir, writeFiles } from './helpers/fixtures.js';

describe('isDescriptorName', () => {
  it('should match any name ending in desktop', () => {
    expect(isDescriptorName('firefox.desktop')).toBe(true);
    expect(isDescriptorName('mydesktop')).toBe(true);
    expect(isDescriptorName('desktop')).toBe(true);
  });

  it('should not match other names', () => {
    expect(isDescriptorName('firefox.desktop.bak')).toBe(false);
    expect(isDescriptorName('Firefox.DESKTOP')).toBe(false);
    expect(isDescriptorName('notes.txt')).toBe(false);
  });
});

describe('scanDirectory', () => {
  let root: string;
  let apps: string;

  beforeEach(async () => {
    root = await realpath(await makeTempDir());
    apps = join(root, 'applications');
    await writeFiles(apps, {
      'editor.desktop': appFile('Editor', 'editor'),
      mydesktop: appFile('Mine', 'mine'),
      'notes.txt': 'not a descriptor',
    });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should list regular files whose names end in desktop', async () => {
    const found = await scanDirectory(apps);

    expect(found.sort()).toEqual([join(apps, 'editor.desktop'), join(apps, 'mydesktop')]);
  });

  it('should skip directories with a matching name', async () => {
    await mkdir(join(apps, 'folder.desktop'));

    const found = await scanDirectory(apps);

    expect(found).not.toContain(join(apps, 'folder.desktop'));
    expect(found).toHaveLength(2);
  });

  it('should follow symlinks to their canonical location', async () => {
    await writeFiles(join(root, 'elsewhere'), { 'shared.entry': appFile('Shared', 'shared') });
    await symlink(join(root, 'elsewhere', 'shared.entry'), join(apps, 'shared.desktop'));

    const found = await scanDirectory(apps);

    expect(found).toContain(join(root, 'elsewhere', 'shared.entry'));
    expect(found).not.toContain(join(apps, 'shared.desktop'));
  });

  it('should skip dangling symlinks', async () => {
    await symlink(join(root, 'gone.desktop'), join(apps, 'dangling.desktop'));

    const found = await scanDirectory(apps);

    expect(found).toHaveLength(2);
  });

  it('should reject with DirectoryReadError for a missing directory', async () => {
    await expect(scanDirectory(join(root, 'missing'))).rejects.toBeInstanceOf(DirectoryReadError);
  });

  it('should reject with DirectoryReadError when given a file', async () => {
    await expect(scanDirectory(join(apps, 'notes.txt'))).rejects.toBeInstanceOf(
      DirectoryReadError
    );
  });
});
