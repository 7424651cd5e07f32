import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fixedEnvironment } from '../src/config/environment.js';
import {
  loadLauncherConfig,
  locateConfig,
  validateConfig,
} from '../src/config/launcherConfig.js';
import { ConfigError } from '../src/errors.js';
import { makeTempDir, removeTempDir, writeFiles } from './helpers/fixtures.js';

describe('locateConfig', () => {
  it('should prefer the explicit path', () => {
    const env = fixedEnvironment({ MENU_LAUNCHER_CONFIG: '/etc/ml.yaml', HOME: '/home/test' });

    expect(locateConfig('/tmp/given.yaml', env)).toEqual({
      path: '/tmp/given.yaml',
      explicit: true,
    });
  });

  it('should use MENU_LAUNCHER_CONFIG next', () => {
    const env = fixedEnvironment({ MENU_LAUNCHER_CONFIG: '/etc/ml.yaml', HOME: '/home/test' });

    expect(locateConfig(undefined, env)).toEqual({ path: '/etc/ml.yaml', explicit: true });
  });

  it('should look in XDG_CONFIG_HOME before HOME', () => {
    const env = fixedEnvironment({ XDG_CONFIG_HOME: '/home/test/.cfg', HOME: '/home/test' });

    expect(locateConfig(undefined, env)).toEqual({
      path: '/home/test/.cfg/menu-launcher/config.yaml',
      explicit: false,
    });
  });

  it('should fall back to ~/.config', () => {
    expect(locateConfig(undefined, fixedEnvironment({ HOME: '/home/test' }))).toEqual({
      path: '/home/test/.config/menu-launcher/config.yaml',
      explicit: false,
    });
  });

  it('should return null when nothing can be derived', () => {
    expect(locateConfig(undefined, fixedEnvironment({}))).toBeNull();
  });
});

describe('validateConfig', () => {
  it('should accept a complete configuration', () => {
    expect(
      validateConfig({ terminal: 'foot', searchDirs: ['/opt/apps'], logLevel: 'debug' })
    ).toEqual({ terminal: 'foot', searchDirs: ['/opt/apps'], logLevel: 'debug' });
  });

  it('should treat an empty document as an empty configuration', () => {
    expect(validateConfig(null)).toEqual({});
  });

  it('should reject values of the wrong type', () => {
    expect(() => validateConfig({ terminal: 5 })).toThrow(ConfigError);
    expect(() => validateConfig({ searchDirs: [] })).toThrow(ConfigError);
    expect(() => validateConfig({ logLevel: 'loud' })).toThrow(ConfigError);
  });
});

describe('loadLauncherConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should load the file from the default location', async () => {
    await writeFiles(join(dir, 'menu-launcher'), {
      'config.yaml': 'terminal: alacritty\nsearchDirs:\n  - /opt/apps\n  - /srv/apps\n',
    });

    const config = loadLauncherConfig(undefined, fixedEnvironment({ XDG_CONFIG_HOME: dir }));

    expect(config).toEqual({ terminal: 'alacritty', searchDirs: ['/opt/apps', '/srv/apps'] });
  });

  it('should return an empty configuration when the default file is missing', () => {
    expect(loadLauncherConfig(undefined, fixedEnvironment({ XDG_CONFIG_HOME: dir }))).toEqual({});
  });

  it('should throw ConfigError when an explicit file is missing', () => {
    expect(() => loadLauncherConfig(join(dir, 'nope.yaml'), fixedEnvironment({}))).toThrow(
      ConfigError
    );
  });

  it('should throw ConfigError for invalid YAML', async () => {
    await writeFiles(dir, { 'bad.yaml': 'terminal: [unclosed\n' });

    expect(() => loadLauncherConfig(join(dir, 'bad.yaml'), fixedEnvironment({}))).toThrow(
      /is not valid YAML/
    );
  });

  it('should throw ConfigError naming the offending key', async () => {
    await writeFiles(dir, { 'config.yaml': 'logLevel: loud\n' });

    expect(() => loadLauncherConfig(join(dir, 'config.yaml'), fixedEnvironment({}))).toThrow(
      /^Invalid configuration: logLevel: /
    );
  });
});
