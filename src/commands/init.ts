/**
 * Write a default htpcgui-pkg config into the current directory.
 */

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { atomicWriteJson } from '../lib/fs.js';
import { createDefaultConfig } from '../lib/config.js';
import { CONFIG_FILE_NAME } from '../lib/branding.js';

export interface InitOptions {
  /** Remote repository URL */
  url: string;
  /** Overwrite an existing config file */
  force?: boolean;
  /** Directory to write into, defaults to the current directory */
  cwd?: string;
}

/**
 * Writes the default config.
 *
 * @returns Path of the written config file
 * @throws {Error} If a config file already exists and `force` is not set
 */
export async function initCommand(options: InitOptions): Promise<string> {
  const configPath = join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  let exists = true;
  try {
    await access(configPath);
  } catch {
    exists = false;
  }

  if (exists && !options.force) {
    throw new Error(`${configPath} already exists (use --force to overwrite)`);
  }

  await atomicWriteJson(configPath, createDefaultConfig(options.url));
  console.log(`Wrote ${configPath}`);
  return configPath;
}
