/**
 * Source acquisition: make sure a working copy of the upstream repository
 * exists at a fixed path and is up to date.
 *
 * Safe to call repeatedly with the same arguments. There is no retry and
 * no cleanup on failure; re-running after fixing the cause is enough.
 */

import { existsSync, mkdirSync, realpathSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { AcquireResult } from '../types/build.js';
import {
  runGit,
  describeGitFailure,
  getGitTopLevel,
  getHeadCommit,
  getRemoteUrl,
  getWorktreeStatus,
  isAncestor,
} from './git.js';

/**
 * Error thrown when the working copy cannot be cloned, updated or read.
 */
export class AcquireError extends Error {
  constructor(
    message: string,
    public readonly targetDir: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AcquireError';
  }
}

export interface AcquireOptions {
  /** Working copy files ignored by the local modification check */
  ignoreDirtyGlobs?: string[];
}

/**
 * Checks that `dir` is the root of its own work tree, not merely a
 * directory nested inside some other repository.
 */
function isWorkingCopyRoot(dir: string): boolean {
  const topLevel = getGitTopLevel(dir);
  if (!topLevel) {
    return false;
  }
  try {
    return realpathSync(topLevel) === realpathSync(dir);
  } catch {
    return false;
  }
}

/**
 * Compares two remote locations. Paths that exist locally are compared by
 * their real path; anything else by its text without trailing slashes.
 */
function sameRemote(a: string, b: string): boolean {
  const canonical = (location: string): string => {
    if (existsSync(location)) {
      try {
        return realpathSync(location);
      } catch {
        return location;
      }
    }
    return location.replace(/\/+$/, '');
  };
  return canonical(a) === canonical(b);
}

/**
 * Rejects a working copy whose `origin` is not `url`.
 */
function assertOrigin(target: string, url: string): void {
  const origin = getRemoteUrl(target);
  if (origin === null) {
    throw new AcquireError(`${target} has no origin remote; expected ${url}`, target);
  }
  if (!sameRemote(origin, url)) {
    throw new AcquireError(
      `${target} was cloned from ${origin}, not ${url}; remove it or fix source.url`,
      target
    );
  }
}

function headOf(targetDir: string): string {
  try {
    return getHeadCommit(targetDir);
  } catch (error) {
    throw new AcquireError(
      error instanceof Error ? error.message : String(error),
      targetDir,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Clones `url` into `targetDir`, or pulls the upstream default branch into
 * it when it already exists.
 *
 * The pull is unconditional: local modifications are reported in the
 * result but neither stashed nor reset, so git itself decides whether the
 * merge can proceed. An existing working copy must have `url` as its
 * `origin`.
 *
 * @param targetDir - Working copy location
 * @param url - Remote repository URL or path
 * @throws {AcquireError} If cloning or updating fails, or the existing
 *   working copy tracks another remote
 *
 * @example
 * ```typescript
 * const result = ensureCheckout('build/htpcgui-git-0.1', 'https://example.com/htpc.git');
 * console.log(`${result.action} at ${result.head_after}`);
 * ```
 */
export function ensureCheckout(
  targetDir: string,
  url: string,
  options: AcquireOptions = {}
): AcquireResult {
  const target = resolve(targetDir);

  if (existsSync(target)) {
    if (!isWorkingCopyRoot(target)) {
      throw new AcquireError(`${target} exists but is not a git working copy`, target);
    }
    assertOrigin(target, url);

    const headBefore = headOf(target);
    const status = getWorktreeStatus(target, options.ignoreDirtyGlobs ?? []);

    const args = ['pull', '--no-rebase'];
    const pull = runGit(args, target);
    if (!pull.ok) {
      throw new AcquireError(`Failed to update ${target}: ${describeGitFailure(args, pull)}`, target);
    }

    const headAfter = headOf(target);
    if (!isAncestor(headBefore, headAfter, target)) {
      throw new AcquireError(`Update moved ${target} off its previous HEAD ${headBefore}`, target);
    }

    return {
      action: 'updated',
      target_dir: target,
      url,
      head_before: headBefore,
      head_after: headAfter,
      dirty: !status.clean,
      dirty_files: status.dirtyFiles,
    };
  }

  try {
    mkdirSync(dirname(target), { recursive: true });
  } catch (error) {
    throw new AcquireError(
      `Failed to create parent directory of ${target}: ${error instanceof Error ? error.message : String(error)}`,
      target,
      error instanceof Error ? error : undefined
    );
  }

  const args = ['clone', '--', url, target];
  const clone = runGit(args);
  if (!clone.ok) {
    throw new AcquireError(`Failed to clone ${url}: ${describeGitFailure(args, clone)}`, target);
  }

  return {
    action: 'cloned',
    target_dir: target,
    url,
    head_before: null,
    head_after: headOf(target),
    dirty: false,
    dirty_files: [],
  };
}

/**
 * Uses an existing working copy without contacting the remote. Local
 * modifications are reported as they are found.
 *
 * @throws {AcquireError} If the working copy does not exist or tracks
 *   another remote
 */
export function reuseCheckout(
  targetDir: string,
  url: string,
  options: AcquireOptions = {}
): AcquireResult {
  const target = resolve(targetDir);
  if (!existsSync(target) || !isWorkingCopyRoot(target)) {
    throw new AcquireError(`Working copy not found at ${target}; run a fetch first`, target);
  }
  assertOrigin(target, url);

  const head = headOf(target);
  const status = getWorktreeStatus(target, options.ignoreDirtyGlobs ?? []);
  return {
    action: 'reused',
    target_dir: target,
    url,
    head_before: head,
    head_after: head,
    dirty: !status.clean,
    dirty_files: status.dirtyFiles,
  };
}
