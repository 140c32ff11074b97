/**
 * Single source of truth for build result codes.
 *
 * SUCCESS: every step completed
 * *_FAILED: the named step aborted the build
 */
export const BUILD_CODES = [
  'SUCCESS',
  'ACQUIRE_FAILED',
  'STAGE_FAILED',
  'VERSION_FAILED',
] as const;

export type BuildCodeValue = (typeof BUILD_CODES)[number];

/**
 * Step name printed for each failure code.
 */
export const FAILED_STEP: Readonly<Record<Exclude<BuildCodeValue, 'SUCCESS'>, string>> = {
  ACQUIRE_FAILED: 'Source acquisition',
  STAGE_FAILED: 'Staging',
  VERSION_FAILED: 'Version resolution',
};
