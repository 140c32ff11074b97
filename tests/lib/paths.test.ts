import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { checkRelativePath, resolveFromConfigDir, workingCopyPath, stagingSourceDir } from '@/lib/paths.js';
import { createMockConfig } from '../helpers/mocks.js';

describe('checkRelativePath', () => {
  it('should accept plain relative paths', () => {
    expect(checkRelativePath('usr/share/htpclib')).toEqual({ safe: true });
    expect(checkRelativePath('htpcgui.conf')).toEqual({ safe: true });
  });

  it('should accept names that merely contain dots', () => {
    expect(checkRelativePath('lib..old/file')).toEqual({ safe: true });
  });

  it('should reject empty paths', () => {
    expect(checkRelativePath('  ')).toEqual({ safe: false, reason: 'Empty or whitespace-only path' });
  });

  it('should reject traversal', () => {
    expect(checkRelativePath('etc/../../root')).toEqual({ safe: false, reason: 'Path contains traversal (..)' });
  });

  it('should reject absolute paths', () => {
    expect(checkRelativePath('/etc/htpc')).toEqual({ safe: false, reason: 'Path is absolute' });
  });

  it('should reject Windows absolute paths', () => {
    expect(checkRelativePath('C:\\htpc')).toEqual({ safe: false, reason: 'Path is an absolute Windows path' });
  });
});

describe('resolveFromConfigDir', () => {
  it('should resolve relative paths against the config directory', () => {
    expect(resolveFromConfigDir('/srv/pkg', 'build')).toBe('/srv/pkg/build');
  });

  it('should keep absolute paths', () => {
    expect(resolveFromConfigDir('/srv/pkg', '/var/cache/build')).toBe('/var/cache/build');
  });
});

describe('workingCopyPath', () => {
  it('should derive the directory from package name and version', () => {
    const config = createMockConfig('/tmp/root', 'https://example.com/htpc.git');

    expect(workingCopyPath(config)).toBe(join('/tmp/root', 'build', 'htpcgui-git-0.1'));
    expect(stagingSourceDir(config)).toBe(join('/tmp/root', 'build', 'htpcgui-git-0.1', 'src'));
  });

  it('should not depend on the source URL', () => {
    const a = createMockConfig('/tmp/root', 'https://example.com/a.git');
    const b = createMockConfig('/tmp/root', 'https://example.com/b.git');

    expect(workingCopyPath(a)).toBe(workingCopyPath(b));
  });
});
