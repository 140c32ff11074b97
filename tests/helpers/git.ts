/**
 * Test helpers for throwaway git repositories.
 *
 * Each "upstream" is a plain repository on disk, cloned by path.
 */

import { execFileSync } from 'node:child_process';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

export const HELPER_SCRIPT = '#!/usr/bin/env python\nprint("helper")\n';

export const HELPER_CONF = [
  '[Paths]',
  'wake_persistent = /var/lib/htpc/wake',
  '',
  '[Commands]',
  'gui_load = kodi',
  'gui_stop =',
  'shutdown = systemctl poweroff',
  '',
].join('\n');

/**
 * Runs git in `dir` and returns trimmed stdout. Throws on failure.
 */
export function git(dir: string, ...args: string[]): string {
  return execFileSync('git', args, {
    cwd: dir,
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
  }).trim();
}

/**
 * Writes a file (creating parents), stages it and commits.
 *
 * @returns The new HEAD SHA
 */
export async function commitFile(
  repoDir: string,
  relPath: string,
  content: string,
  message: string
): Promise<string> {
  const path = join(repoDir, relPath);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
  git(repoDir, 'add', relPath);
  git(repoDir, 'commit', '-q', '-m', message);
  return git(repoDir, 'rev-parse', 'HEAD');
}

/**
 * Creates an upstream repository at `<root>/upstream` holding
 * src/htpcgui.py and src/htpcgui.conf in one commit.
 */
export async function createUpstream(root: string): Promise<string> {
  const dir = join(root, 'upstream');
  await mkdir(dir, { recursive: true });
  git(dir, 'init', '-q');
  git(dir, 'config', 'user.email', 'test@example.com');
  git(dir, 'config', 'user.name', 'Test User');
  await mkdir(join(dir, 'src'), { recursive: true });
  await writeFile(join(dir, 'src', 'htpcgui.py'), HELPER_SCRIPT, 'utf-8');
  await writeFile(join(dir, 'src', 'htpcgui.conf'), HELPER_CONF, 'utf-8');
  git(dir, 'add', '.');
  git(dir, 'commit', '-q', '-m', 'initial import');
  return dir;
}
