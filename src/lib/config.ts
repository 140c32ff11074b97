/**
 * Configuration loading and validation utilities.
 *
 * Provides functions to find, load, validate and create htpcgui-pkg config files.
 */

import { access } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { loadSchema, validateWithSchema, SCHEMAS_DIR, type ValidationResult } from './schema.js';
import { checkRelativePath, resolveFromConfigDir } from './paths.js';
import { CONFIG_FILE_NAME } from './branding.js';
import type { HtpcPkgConfig } from '../types/config.js';

export { CONFIG_FILE_NAME };

export const CONFIG_SCHEMA_PATH = join(SCHEMAS_DIR, 'config.schema.json');

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Searches for a configuration file by walking upward from a directory.
 * Stops at the filesystem root if not found.
 *
 * @param startDir - Directory to start from, defaults to the current directory
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here, keep walking up.
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/**
 * Validates a parsed config against the JSON schema, then checks that
 * every staged file path stays inside its root.
 */
export async function validateConfig(config: unknown): Promise<ValidationResult<HtpcPkgConfig>> {
  const schema = await loadSchema(CONFIG_SCHEMA_PATH);
  const result = validateWithSchema<HtpcPkgConfig>(config, schema);
  if (!result.valid || result.data === null) {
    return result;
  }

  const errors: string[] = [];
  const { staging } = result.data;
  const rootRelative: Array<[string, string]> = [['/staging/source_subdir', staging.source_subdir]];
  staging.files.forEach((file, i) => {
    rootRelative.push([`/staging/files/${i}/source`, file.source]);
    rootRelative.push([`/staging/files/${i}/dest`, file.dest]);
  });
  result.data.package.backup.forEach((entry, i) => {
    rootRelative.push([`/package/backup/${i}`, entry]);
  });

  for (const [path, value] of rootRelative) {
    const check = checkRelativePath(value);
    if (!check.safe) {
      errors.push(`${path}: ${check.reason}`);
    }
  }

  if (errors.length > 0) {
    return { valid: false, data: null, errors };
  }
  return result;
}

/**
 * Loads and validates a configuration file.
 *
 * `source.build_dir` and `staging.install_root` come back absolute,
 * resolved against the directory holding the config file.
 *
 * @param configPath - Optional path to the config file. If not provided,
 *                     searches upward from the current directory.
 * @throws {ConfigError} If the config file cannot be found, read, or is invalid
 */
export async function loadConfig(configPath?: string): Promise<HtpcPkgConfig> {
  let resolvedPath: string;

  if (configPath) {
    resolvedPath = resolve(configPath);
  } else {
    const found = await findConfigFile();
    if (!found) {
      throw new ConfigError(
        `Configuration file not found. Expected ${CONFIG_FILE_NAME} in current directory or parent directories.`
      );
    }
    resolvedPath = found;
  }

  let rawConfig: unknown;
  try {
    rawConfig = await atomicReadJson<unknown>(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(
        `Failed to read configuration file: ${error.message}`,
        resolvedPath,
        error
      );
    }
    throw error;
  }

  const result = await validateConfig(rawConfig);
  if (!result.valid || result.data === null) {
    throw new ConfigError(
      `Invalid configuration file: ${result.errors.join('; ')}`,
      resolvedPath
    );
  }

  const config = result.data;
  const configDir = dirname(resolvedPath);
  return {
    ...config,
    source: {
      ...config.source,
      build_dir: resolveFromConfigDir(configDir, config.source.build_dir),
    },
    staging: {
      ...config.staging,
      install_root: resolveFromConfigDir(configDir, config.staging.install_root),
    },
  };
}

/**
 * Default configuration written by `init`: stages the GUI helper script
 * under usr/share/htpclib and its config under etc/htpc.
 */
export function createDefaultConfig(sourceUrl: string): HtpcPkgConfig {
  return {
    version: '1',
    package: {
      name: 'htpcgui-git',
      version: '0.1',
      release: 1,
      description: 'HTPC GUI helper that starts and stops the media center',
      arch: ['any'],
      url: sourceUrl,
      license: ['GPL'],
      depends: ['python', 'python-psutil', 'python-tvhc', 'kodi'],
      backup: ['etc/htpc/htpcgui.conf'],
    },
    source: {
      url: sourceUrl,
      build_dir: 'build',
      ignore_dirty_globs: [],
    },
    staging: {
      source_subdir: 'src',
      install_root: 'pkg',
      files: [
        { source: 'htpcgui.py', dest: 'usr/share/htpclib' },
        { source: 'htpcgui.conf', dest: 'etc/htpc' },
      ],
    },
  };
}
