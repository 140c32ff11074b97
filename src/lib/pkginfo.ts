/**
 * Package metadata file (.PKGINFO) written at the top of the install root.
 *
 * One `key = value` line per field; list fields repeat their key.
 */

import { join } from 'node:path';
import type { PackageMetadata } from '../types/config.js';
import { atomicWriteFile } from './fs.js';
import { CLI_NAME, PKGINFO_FILE_NAME } from './branding.js';

export interface PkgInfoInput {
  pkg: PackageMetadata;
  /** Resolved version, without the release counter */
  version: string;
  /** Installed size in bytes */
  size: number;
  buildDate: Date;
}

/**
 * Renders .PKGINFO content. `pkgver` is `<version>-<release>`.
 */
export function renderPkgInfo({ pkg, version, size, buildDate }: PkgInfoInput): string {
  const lines: string[] = [
    `# Generated by ${CLI_NAME}`,
    `pkgname = ${pkg.name}`,
    `pkgbase = ${pkg.name}`,
    `pkgver = ${version}-${pkg.release}`,
    `pkgdesc = ${pkg.description}`,
    `url = ${pkg.url}`,
    `builddate = ${Math.floor(buildDate.getTime() / 1000)}`,
    `size = ${size}`,
  ];

  const repeated: Array<[string, string[]]> = [
    ['arch', pkg.arch],
    ['license', pkg.license],
    ['depend', pkg.depends],
    ['backup', pkg.backup],
  ];
  for (const [key, values] of repeated) {
    for (const value of values) {
      lines.push(`${key} = ${value}`);
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * Writes .PKGINFO into the install root.
 *
 * @returns Path of the written file
 */
export async function writePkgInfo(installRoot: string, input: PkgInfoInput): Promise<string> {
  const path = join(installRoot, PKGINFO_FILE_NAME);
  await atomicWriteFile(path, renderPkgInfo(input));
  return path;
}
