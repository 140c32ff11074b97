/**
 * Doctor checks for the build configuration and environment.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { HtpcPkgConfig } from '../types/config.js';
import { loadConfig, findConfigFile, CONFIG_FILE_NAME } from './config.js';
import { isGitAvailable, getWorktreeStatus } from './git.js';
import { resolveVersion } from './version.js';
import { checkGuiConfig } from './guiconf.js';
import { workingCopyPath } from './paths.js';

export type DoctorStatus = 'ok' | 'warn' | 'fail' | 'info';

export interface DoctorCheck {
  status: DoctorStatus;
  message: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  /** Messages of every failed check */
  issues: string[];
  config: HtpcPkgConfig | null;
}

/**
 * Runs all doctor checks. Never throws for a bad environment; each
 * problem becomes a `fail` or `warn` entry.
 *
 * @param configPath - Explicit config path, otherwise searched upward
 */
export async function runDoctor(configPath?: string): Promise<DoctorResult> {
  const checks: DoctorCheck[] = [];
  const add = (status: DoctorStatus, message: string) => checks.push({ status, message });

  if (isGitAvailable()) {
    add('ok', 'Git is available');
  } else {
    add('fail', 'Git is not installed or not in PATH');
  }

  let config: HtpcPkgConfig | null = null;
  const path = configPath ?? (await findConfigFile());
  if (!path) {
    add('fail', `Config file not found (expected ${CONFIG_FILE_NAME})`);
  } else {
    try {
      config = await loadConfig(path);
      add('ok', `Config file is valid: ${path}`);
    } catch (error) {
      add('fail', error instanceof Error ? error.message : String(error));
    }
  }

  if (config) {
    const workingCopy = workingCopyPath(config);
    if (!existsSync(workingCopy)) {
      add('info', `Working copy not found (will be cloned on first build): ${workingCopy}`);
    } else {
      add('ok', `Working copy exists: ${workingCopy}`);

      try {
        const { version } = resolveVersion(workingCopy);
        add('ok', `Resolved version: ${version}`);
      } catch (error) {
        add('fail', error instanceof Error ? error.message : String(error));
      }

      const status = getWorktreeStatus(workingCopy, config.source.ignore_dirty_globs);
      if (status.clean) {
        add('ok', 'Working copy has no local modifications');
      } else {
        add('warn', `Working copy has local modifications: ${status.dirtyFiles.join(', ')}`);
      }
      if (status.excludedFiles.length > 0) {
        add('info', `Ignored local modifications: ${status.excludedFiles.join(', ')}`);
      }
    }

    for (const file of config.staging.files) {
      if (!file.source.endsWith('.conf')) continue;
      const staged = join(config.staging.install_root, file.dest, basename(file.source));
      if (!existsSync(staged)) {
        add('info', `Not staged yet: ${staged}`);
        continue;
      }
      const check = checkGuiConfig(await readFile(staged, 'utf-8'));
      if (check.ok) {
        add('ok', `Helper config has all required settings: ${staged}`);
      } else {
        add('warn', `Helper config is missing: ${check.missing.join(', ')} (${staged})`);
      }
    }
  }

  return {
    checks,
    issues: checks.filter((c) => c.status === 'fail').map((c) => c.message),
    config,
  };
}
