/**
 * Build result type definitions.
 */

import type { BuildCodeValue } from '../constants/build_codes.js';

/**
 * How the working copy was brought up to date.
 */
export type AcquireAction = 'cloned' | 'updated' | 'reused';

export interface AcquireResult {
  action: AcquireAction;
  target_dir: string;
  url: string;
  /** HEAD before the update, null for a fresh clone */
  head_before: string | null;
  head_after: string;
  /** Whether the working copy had local modifications before the update */
  dirty: boolean;
  dirty_files: string[];
}

export interface StagedFile {
  source_path: string;
  dest_path: string;
  size: number;
  sha256: string;
}

/**
 * Describe descriptor split into its parts.
 * `commits` is 0 and `hash` null when HEAD sits exactly on the tag.
 */
export interface DescribeParts {
  tag: string;
  commits: number;
  hash: string | null;
}

export type BuildCode = BuildCodeValue;

export interface BuildReport {
  ok: boolean;
  code: BuildCode;
  package_name: string;
  started_at: string;
  ended_at: string;
  duration_ms: number;
  /** Message of the failing step, null on success */
  error: string | null;
  /** Resolved version, null if resolution did not run or failed */
  version: string | null;
  describe: DescribeParts | null;
  acquire: AcquireResult | null;
  staged: StagedFile[];
  pkginfo_path: string | null;
  warnings: string[];
}
