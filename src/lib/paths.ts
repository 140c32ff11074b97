/**
 * Path helpers for config-relative and root-relative paths.
 */

import { isAbsolute, join, resolve } from 'node:path';
import type { HtpcPkgConfig } from '../types/config.js';

/**
 * Result of a relative path safety check.
 */
export type PathSafetyResult = { safe: true } | { safe: false; reason: string };

/**
 * Checks that a path stays inside whatever root it is joined to.
 *
 * Unsafe paths:
 * - Empty or whitespace-only paths
 * - Paths with a `..` segment
 * - Unix absolute paths (starting with `/`)
 * - Windows absolute paths (e.g., `C:\`)
 */
export function checkRelativePath(p: string): PathSafetyResult {
  if (!p || p.trim() === '') {
    return { safe: false, reason: 'Empty or whitespace-only path' };
  }

  if (p.split(/[\\/]/).includes('..')) {
    return { safe: false, reason: 'Path contains traversal (..)' };
  }

  if (isAbsolute(p) || p.startsWith('/')) {
    return { safe: false, reason: 'Path is absolute' };
  }

  if (/^[A-Za-z]:[\\/]/.test(p)) {
    return { safe: false, reason: 'Path is an absolute Windows path' };
  }

  return { safe: true };
}

/**
 * Resolves a config path against the directory holding the config file.
 * Absolute paths are returned as-is.
 */
export function resolveFromConfigDir(configDir: string, p: string): string {
  if (isAbsolute(p)) return p;
  return resolve(configDir, p);
}

/**
 * Working copy location: `<build_dir>/<name>-<version>`.
 *
 * Derived only from the declared package name and version, so repeated
 * builds reuse the same directory.
 */
export function workingCopyPath(config: HtpcPkgConfig): string {
  return join(config.source.build_dir, `${config.package.name}-${config.package.version}`);
}

/**
 * Directory inside the working copy the staged files are read from.
 */
export function stagingSourceDir(config: HtpcPkgConfig): string {
  return join(workingCopyPath(config), config.staging.source_subdir);
}
