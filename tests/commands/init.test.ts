import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { initCommand } from '@/commands/init.js';
import { loadConfig, CONFIG_FILE_NAME } from '@/lib/config.js';

describe('initCommand', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'htpcgui-pkg-init-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should write a config that loads', async () => {
    const path = await initCommand({ url: 'https://example.com/htpc.git', cwd: testDir });

    expect(path).toBe(join(testDir, CONFIG_FILE_NAME));
    const config = await loadConfig(path);
    expect(config.source.url).toBe('https://example.com/htpc.git');
    expect(config.package.name).toBe('htpcgui-git');
  });

  it('should refuse to overwrite without force', async () => {
    const path = join(testDir, CONFIG_FILE_NAME);
    await writeFile(path, '{}', 'utf-8');

    await expect(initCommand({ url: 'https://example.com/htpc.git', cwd: testDir })).rejects.toThrow(
      'already exists'
    );
    expect(await readFile(path, 'utf-8')).toBe('{}');
  });

  it('should overwrite with force', async () => {
    const path = join(testDir, CONFIG_FILE_NAME);
    await writeFile(path, '{}', 'utf-8');

    await initCommand({ url: 'https://example.com/htpc.git', cwd: testDir, force: true });

    const config = await loadConfig(path);
    expect(config.staging.files).toHaveLength(2);
  });
});
