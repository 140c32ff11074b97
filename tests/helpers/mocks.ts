/**
 * Test helpers for build configurations.
 */

import { join } from 'node:path';
import type { HtpcPkgConfig } from '@/types/config.js';
import { createDefaultConfig } from '@/lib/config.js';

/**
 * Creates a valid config whose build dir and install root live under `root`.
 */
export function createMockConfig(root: string, sourceUrl: string, overrides?: Partial<HtpcPkgConfig>): HtpcPkgConfig {
  const base = createDefaultConfig(sourceUrl);
  return {
    ...base,
    source: {
      ...base.source,
      build_dir: join(root, 'build'),
    },
    staging: {
      ...base.staging,
      install_root: join(root, 'pkg'),
    },
    ...overrides,
  };
}
