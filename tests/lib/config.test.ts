import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  findConfigFile,
  loadConfig,
  validateConfig,
  createDefaultConfig,
  ConfigError,
  CONFIG_FILE_NAME,
} from '@/lib/config.js';
import { atomicWriteJson } from '@/lib/fs.js';

describe('findConfigFile', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = realpathSync(await mkdtemp(join(tmpdir(), 'htpcgui-pkg-config-')));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should find the config file in the start directory', async () => {
    const configPath = join(testDir, CONFIG_FILE_NAME);
    await atomicWriteJson(configPath, createDefaultConfig('https://example.com/htpc.git'));

    expect(await findConfigFile(testDir)).toBe(configPath);
  });

  it('should find the config file in a parent directory', async () => {
    const configPath = join(testDir, CONFIG_FILE_NAME);
    await atomicWriteJson(configPath, createDefaultConfig('https://example.com/htpc.git'));
    const nested = join(testDir, 'a', 'b');
    await mkdir(nested, { recursive: true });

    expect(await findConfigFile(nested)).toBe(configPath);
  });
});

describe('validateConfig', () => {
  it('should accept the default config', async () => {
    const result = await validateConfig(createDefaultConfig('https://example.com/htpc.git'));

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it('should reject a missing section', async () => {
    const { staging: _staging, ...rest } = createDefaultConfig('https://example.com/htpc.git');

    const result = await validateConfig(rest);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["#/required: must have required property 'staging'"]);
  });

  it('should reject a release below 1', async () => {
    const config = createDefaultConfig('https://example.com/htpc.git');
    config.package.release = 0;

    const result = await validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['/package/release: must be >= 1']);
  });

  it('should reject unknown keys', async () => {
    const config = { ...createDefaultConfig('https://example.com/htpc.git'), extra: true };

    const result = await validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['#/additionalProperties: must NOT have additional properties']);
  });

  it('should reject a staged destination escaping the install root', async () => {
    const config = createDefaultConfig('https://example.com/htpc.git');
    config.staging.files[1].dest = '../etc/htpc';

    const result = await validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['/staging/files/1/dest: Path contains traversal (..)']);
  });

  it('should reject an absolute backup entry', async () => {
    const config = createDefaultConfig('https://example.com/htpc.git');
    config.package.backup = ['/etc/htpc/htpcgui.conf'];

    const result = await validateConfig(config);

    expect(result.errors).toEqual(['/package/backup/0: Path is absolute']);
  });
});

describe('loadConfig', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = realpathSync(await mkdtemp(join(tmpdir(), 'htpcgui-pkg-load-')));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should resolve build dir and install root against the config directory', async () => {
    const configPath = join(testDir, CONFIG_FILE_NAME);
    await atomicWriteJson(configPath, createDefaultConfig('https://example.com/htpc.git'));

    const config = await loadConfig(configPath);

    expect(config.source.build_dir).toBe(join(testDir, 'build'));
    expect(config.staging.install_root).toBe(join(testDir, 'pkg'));
    expect(config.source.url).toBe('https://example.com/htpc.git');
  });

  it('should throw ConfigError for a missing file', async () => {
    await expect(loadConfig(join(testDir, 'missing.json'))).rejects.toThrow(ConfigError);
  });

  it('should throw ConfigError for invalid JSON', async () => {
    const configPath = join(testDir, CONFIG_FILE_NAME);
    await writeFile(configPath, '{ not json', 'utf-8');

    await expect(loadConfig(configPath)).rejects.toThrow(/Failed to read configuration file/);
  });

  it('should throw ConfigError listing schema violations', async () => {
    const configPath = join(testDir, CONFIG_FILE_NAME);
    const config = createDefaultConfig('https://example.com/htpc.git');
    await atomicWriteJson(configPath, { ...config, package: { ...config.package, arch: [] } });

    await expect(loadConfig(configPath)).rejects.toThrow(
      'Invalid configuration file: /package/arch: must NOT have fewer than 1 items'
    );
  });
});

describe('createDefaultConfig', () => {
  it('should stage the helper script and its config', () => {
    const config = createDefaultConfig('https://example.com/htpc.git');

    expect(config.staging.files).toEqual([
      { source: 'htpcgui.py', dest: 'usr/share/htpclib' },
      { source: 'htpcgui.conf', dest: 'etc/htpc' },
    ]);
    expect(config.package.backup).toEqual(['etc/htpc/htpcgui.conf']);
    expect(config.package.depends).toHaveLength(4);
  });
});
