/**
 * Artifact staging: byte-for-byte copies of named files from the working
 * copy into directories under the install root.
 */

import { access, copyFile, mkdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { StagedFileSpec } from '../types/config.js';
import type { StagedFile } from '../types/build.js';
import { checkRelativePath } from './paths.js';
import { sha256File } from './fs.js';

/**
 * Error thrown when a file cannot be staged.
 */
export class StageError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StageError';
  }
}

/**
 * Copies every file in `files` from `sourceDir` into
 * `<installRoot>/<dest>/<basename(source)>`, creating missing directories
 * and overwriting earlier copies.
 *
 * All paths are checked before anything is copied. A missing source file
 * aborts the run; files staged before it stay where they are.
 *
 * @throws {StageError} On an unsafe path, a missing source file or a failed copy
 */
export async function stageArtifacts(
  sourceDir: string,
  installRoot: string,
  files: StagedFileSpec[]
): Promise<StagedFile[]> {
  for (const file of files) {
    for (const p of [file.source, file.dest]) {
      const check = checkRelativePath(p);
      if (!check.safe) {
        throw new StageError(`Refusing to stage '${p}': ${check.reason}`, p);
      }
    }
  }

  const staged: StagedFile[] = [];

  for (const file of files) {
    const sourcePath = join(sourceDir, file.source);
    const destDir = join(installRoot, file.dest);
    const destPath = join(destDir, basename(file.source));

    try {
      await access(sourcePath);
    } catch (error) {
      throw new StageError(
        `Missing source file: ${sourcePath}`,
        sourcePath,
        error instanceof Error ? error : undefined
      );
    }

    try {
      await mkdir(destDir, { recursive: true });
      await copyFile(sourcePath, destPath);
    } catch (error) {
      throw new StageError(
        `Failed to copy ${sourcePath} to ${destPath}: ${error instanceof Error ? error.message : String(error)}`,
        destPath,
        error instanceof Error ? error : undefined
      );
    }

    const { size } = await stat(destPath);
    staged.push({
      source_path: sourcePath,
      dest_path: destPath,
      size,
      sha256: await sha256File(destPath),
    });
  }

  return staged;
}
