/**
 * Build runner.
 *
 * Runs the package build strictly in sequence:
 * ACQUIRE → STAGE → VERSION → METADATA → REPORT
 *
 * The first failing step aborts the build. The report is persisted either
 * way so a failed build can be diagnosed afterwards.
 */

import { mkdir, readFile } from 'node:fs/promises';
import { join, relative } from 'node:path';
import type { HtpcPkgConfig } from '../types/config.js';
import type { AcquireResult, BuildCode, BuildReport, StagedFile } from '../types/build.js';
import { ensureCheckout, reuseCheckout, AcquireError } from '../lib/acquire.js';
import { stageArtifacts, StageError } from '../lib/stage.js';
import { resolveVersion, VersionError } from '../lib/version.js';
import { writePkgInfo } from '../lib/pkginfo.js';
import { checkGuiConfig } from '../lib/guiconf.js';
import { atomicWriteJson } from '../lib/fs.js';
import { stagingSourceDir, workingCopyPath } from '../lib/paths.js';
import { BUILD_REPORT_FILE_NAME } from '../lib/branding.js';

export interface BuildOptions {
  /** Use the existing working copy without pulling */
  skipFetch?: boolean;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Maps a step error to its build code, or null for unexpected errors.
 */
function failureCode(error: unknown): BuildCode | null {
  if (error instanceof AcquireError) return 'ACQUIRE_FAILED';
  if (error instanceof StageError) return 'STAGE_FAILED';
  if (error instanceof VersionError) return 'VERSION_FAILED';
  return null;
}

/**
 * Brings the working copy up to date (or reuses it with `skipFetch`).
 *
 * @throws {AcquireError}
 */
export function runFetch(config: HtpcPkgConfig, options: Pick<BuildOptions, 'skipFetch'> = {}): AcquireResult {
  const target = workingCopyPath(config);
  const acquireOptions = { ignoreDirtyGlobs: config.source.ignore_dirty_globs };
  if (options.skipFetch) {
    return reuseCheckout(target, config.source.url, acquireOptions);
  }
  return ensureCheckout(target, config.source.url, acquireOptions);
}

/**
 * Stages the configured files from the working copy into the install root.
 *
 * @throws {StageError}
 */
export async function runStage(config: HtpcPkgConfig): Promise<StagedFile[]> {
  return stageArtifacts(stagingSourceDir(config), config.staging.install_root, config.staging.files);
}

/**
 * Warnings for staged `.conf` files missing settings the GUI helper needs.
 */
export async function checkStagedGuiConfig(staged: StagedFile[], installRoot: string): Promise<string[]> {
  const warnings: string[] = [];
  for (const file of staged) {
    if (!file.dest_path.endsWith('.conf')) continue;
    const check = checkGuiConfig(await readFile(file.dest_path, 'utf-8'));
    if (!check.ok) {
      warnings.push(
        `${relative(installRoot, file.dest_path)} is missing required settings: ${check.missing.join(', ')}`
      );
    }
  }
  return warnings;
}

/**
 * Runs a full build and writes BUILD_REPORT.json into the build directory.
 *
 * Step failures are reported through `code`/`error`; anything else
 * (e.g. an unwritable build directory) propagates.
 */
export async function runBuild(config: HtpcPkgConfig, options: BuildOptions = {}): Promise<BuildReport> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  const report: BuildReport = {
    ok: false,
    code: 'SUCCESS',
    package_name: config.package.name,
    started_at: startedAt.toISOString(),
    ended_at: startedAt.toISOString(),
    duration_ms: 0,
    error: null,
    version: null,
    describe: null,
    acquire: null,
    staged: [],
    pkginfo_path: null,
    warnings: [],
  };

  await mkdir(config.source.build_dir, { recursive: true });

  try {
    const acquire = runFetch(config, options);
    report.acquire = acquire;
    if (acquire.dirty) {
      const when = acquire.action === 'reused' ? 'has local modifications' : 'had local modifications before update';
      report.warnings.push(`Working copy ${when}: ${acquire.dirty_files.join(', ')}`);
    }

    report.staged = await runStage(config);

    const resolved = resolveVersion(acquire.target_dir);
    report.version = resolved.version;
    report.describe = resolved.describe;

    const size = report.staged.reduce((sum, file) => sum + file.size, 0);
    report.pkginfo_path = await writePkgInfo(config.staging.install_root, {
      pkg: config.package,
      version: resolved.version,
      size,
      buildDate: startedAt,
    });

    report.warnings.push(...(await checkStagedGuiConfig(report.staged, config.staging.install_root)));
    report.ok = true;
  } catch (error) {
    const code = failureCode(error);
    if (code === null) {
      throw error;
    }
    report.code = code;
    report.error = error instanceof Error ? error.message : String(error);
  }

  const endedAt = now();
  report.ended_at = endedAt.toISOString();
  report.duration_ms = endedAt.getTime() - startedAt.getTime();

  await atomicWriteJson(join(config.source.build_dir, BUILD_REPORT_FILE_NAME), report);
  return report;
}
