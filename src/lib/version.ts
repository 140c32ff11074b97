/**
 * Version resolution from repository tag history.
 *
 * `git describe --tags` yields `tag-N-gHASH` (or just `tag` when HEAD is
 * on it). The package version rewrites that into `tag.rN.gHASH`, which
 * sorts correctly under the package manager's version comparison.
 */

import { existsSync } from 'node:fs';
import type { DescribeParts } from '../types/build.js';
import { runGit, describeGitFailure } from './git.js';

/**
 * Error thrown when no version can be derived.
 */
export class VersionError extends Error {
  constructor(
    message: string,
    public readonly descriptor?: string
  ) {
    super(message);
    this.name = 'VersionError';
  }
}

const DESCRIBE_SUFFIX = /^(.+)-(\d+)-g([0-9a-f]+)$/;

/**
 * Splits a describe descriptor into tag, commit count and abbreviated hash.
 *
 * @throws {VersionError} If the descriptor is empty
 */
export function parseDescribe(descriptor: string): DescribeParts {
  const trimmed = descriptor.trim();
  if (trimmed === '') {
    throw new VersionError('Empty describe descriptor', descriptor);
  }

  const match = DESCRIBE_SUFFIX.exec(trimmed);
  if (!match) {
    return { tag: trimmed, commits: 0, hash: null };
  }

  return {
    tag: match[1],
    commits: Number.parseInt(match[2], 10),
    hash: match[3],
  };
}

/**
 * Rewrites a describe descriptor into a package version.
 *
 * - `v1-2-gabc1234` becomes `v1.r2.gabc1234`
 * - `rel-1-3-gabc1234` becomes `rel.1.r3.gabc1234`
 * - `v1` stays `v1`; `v1-beta` (HEAD on that tag) becomes `v1.beta`
 *
 * @throws {VersionError} If the descriptor is empty
 */
export function formatDescribeVersion(descriptor: string): string {
  const trimmed = descriptor.trim();
  const parts = parseDescribe(trimmed);
  const tag = parts.tag.replace(/-/g, '.');

  if (parts.hash === null) {
    return tag;
  }
  return `${tag}.r${parts.commits}.g${parts.hash}`;
}

/**
 * Runs `git describe --tags` in the working copy.
 *
 * @throws {VersionError} If the working copy is missing, no tag is
 *   reachable from HEAD, or git fails
 */
export function describeHead(dir: string): string {
  if (!existsSync(dir)) {
    throw new VersionError(`Working copy not found at ${dir}; run fetch first`);
  }

  const args = ['describe', '--tags'];
  const result = runGit(args, dir);
  if (!result.ok) {
    throw new VersionError(
      `Cannot derive a version in ${dir}; the repository needs at least one tag reachable from HEAD (${describeGitFailure(args, result)})`
    );
  }

  const descriptor = result.stdout.trim();
  if (descriptor === '') {
    throw new VersionError(`git describe returned nothing in ${dir}`, descriptor);
  }
  return descriptor;
}

/**
 * Derives the package version of the working copy at `dir`.
 *
 * @throws {VersionError} If no tag is reachable from HEAD
 */
export function resolveVersion(dir: string): { version: string; describe: DescribeParts } {
  const descriptor = describeHead(dir);
  return {
    version: formatDescribeVersion(descriptor),
    describe: parseDescribe(descriptor),
  };
}
