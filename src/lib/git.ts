/**
 * Git helper functions for working copy management.
 *
 * Uses spawnSync for git operations to ensure synchronous, blocking behavior.
 * All git commands use argv-only (no shell strings).
 */

import { spawnSync } from 'node:child_process';
import micromatch from 'micromatch';

/**
 * Outcome of a single git invocation.
 */
export interface GitResult {
  ok: boolean;
  status: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs git with the given arguments.
 *
 * Never throws: a missing git binary shows up as `ok: false` with the
 * spawn error in `stderr`. Terminal prompts are disabled so a credential
 * request fails instead of hanging the build.
 *
 * @param args - Arguments after `git`
 * @param cwd - Directory to run in, defaults to the current directory
 */
export function runGit(args: string[], cwd?: string): GitResult {
  const result = spawnSync('git', args, {
    cwd,
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
  });

  if (result.error) {
    return { ok: false, status: null, stdout: '', stderr: result.error.message };
  }

  return {
    ok: result.status === 0,
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
  };
}

/**
 * Formats a failed git result for error messages.
 */
export function describeGitFailure(args: string[], result: GitResult): string {
  const detail = result.stderr.trim() || result.stdout.trim() || `exit status ${result.status ?? 'unknown'}`;
  return `git ${args.join(' ')} failed: ${detail}`;
}

/**
 * Checks if git is installed and on PATH.
 */
export function isGitAvailable(): boolean {
  return runGit(['--version']).ok;
}

/**
 * Gets the top-level directory of the working tree containing `dir`.
 *
 * @returns Absolute path, or null if `dir` is not inside a work tree
 */
export function getGitTopLevel(dir: string): string | null {
  const result = runGit(['rev-parse', '--show-toplevel'], dir);
  if (!result.ok) {
    return null;
  }
  const topLevel = result.stdout.trim();
  return topLevel || null;
}

/**
 * Gets the HEAD commit SHA of the repository at `dir`.
 *
 * @returns The full 40-character SHA of HEAD
 * @throws {Error} If not in a git repo or HEAD doesn't exist
 */
export function getHeadCommit(dir: string): string {
  const args = ['rev-parse', 'HEAD'];
  const result = runGit(args, dir);
  if (!result.ok) {
    throw new Error(`Failed to get HEAD commit: ${describeGitFailure(args, result)}`);
  }
  return result.stdout.trim();
}

/**
 * Gets the fetch URL configured for `remote` in the repository at `dir`.
 *
 * @returns The URL, or null if the remote is not configured
 */
export function getRemoteUrl(dir: string, remote = 'origin'): string | null {
  const result = runGit(['remote', 'get-url', remote], dir);
  if (!result.ok) {
    return null;
  }
  const url = result.stdout.trim();
  return url || null;
}

/**
 * Checks whether `ancestor` is reachable from `descendant`.
 * A commit counts as its own ancestor.
 */
export function isAncestor(ancestor: string, descendant: string, dir: string): boolean {
  return runGit(['merge-base', '--is-ancestor', ancestor, descendant], dir).ok;
}

/**
 * Parses git status porcelain output and filters files based on exclusion globs.
 *
 * @param statusOutput - Raw output from `git status --porcelain`
 * @param excludeGlobs - Glob patterns for files to exclude from the dirty check
 * @returns Object with `clean` (boolean), `dirtyFiles`, and `excludedFiles`
 *   (modified files the globs matched)
 */
export function parseGitStatusWithExclusions(
  statusOutput: string,
  excludeGlobs: string[]
): { clean: boolean; dirtyFiles: string[]; excludedFiles: string[] } {
  // Only trim trailing whitespace to preserve leading space in status format
  const trimmed = statusOutput.trimEnd();
  if (trimmed.trim() === '') {
    return { clean: true, dirtyFiles: [], excludedFiles: [] };
  }

  // Format: XY PATH, or XY ORIG -> PATH for renames and copies
  const allFiles = trimmed
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const rawPath = line.slice(3);
      const arrow = rawPath.indexOf(' -> ');
      return arrow === -1 ? rawPath : rawPath.slice(arrow + 4);
    });

  const excludedFiles: string[] = [];
  const dirtyFiles: string[] = [];

  for (const file of allFiles) {
    if (excludeGlobs.length > 0 && micromatch.isMatch(file, excludeGlobs)) {
      excludedFiles.push(file);
    } else {
      dirtyFiles.push(file);
    }
  }

  return {
    clean: dirtyFiles.length === 0,
    dirtyFiles,
    excludedFiles,
  };
}

/**
 * Checks if the working copy at `dir` is clean, excluding files matching
 * the given globs.
 *
 * @example
 * ```typescript
 * const result = getWorktreeStatus('build/htpcgui-git-0.1', ['*.pyc']);
 * if (!result.clean) {
 *   console.warn('Local modifications:', result.dirtyFiles);
 * }
 * ```
 */
export function getWorktreeStatus(
  dir: string,
  excludeGlobs: string[]
): { clean: boolean; dirtyFiles: string[]; excludedFiles: string[] } {
  const result = runGit(['status', '--porcelain'], dir);
  if (!result.ok) {
    // If git status fails, assume not clean
    return { clean: false, dirtyFiles: ['<git status failed>'], excludedFiles: [] };
  }
  return parseGitStatusWithExclusions(result.stdout, excludeGlobs);
}
