/**
 * TypeScript interfaces for htpcgui-pkg.config.json.
 *
 * These types define the complete structure of the build configuration file.
 * Field names mirror the JSON keys, which use snake_case.
 */

/**
 * Package metadata consumed by the packaging system.
 */
export interface PackageMetadata {
  /** Package name, also the stem of the working copy directory */
  name: string;
  /** Declared package version (the resolved version is derived from git) */
  version: string;
  /** Release counter, bumped when the same version is repackaged */
  release: number;
  description: string;
  /** Supported architectures, e.g. ["any"] */
  arch: string[];
  url: string;
  license: string[];
  /** Runtime dependency names */
  depends: string[];
  /** Install-root-relative files whose local edits survive upgrades */
  backup: string[];
}

/**
 * Where the upstream source lives and where its working copy is kept.
 */
export interface SourceConfig {
  /** Remote repository URL, or any path `git clone` accepts */
  url: string;
  /** Directory holding working copies and the build report */
  build_dir: string;
  /** Working copy files ignored when checking for local modifications */
  ignore_dirty_globs: string[];
}

/**
 * One file to stage: `source` relative to the staging source dir,
 * `dest` a directory relative to the install root.
 */
export interface StagedFileSpec {
  source: string;
  dest: string;
}

export interface StagingConfig {
  /** Subdirectory of the working copy the files are taken from */
  source_subdir: string;
  /** Install root the files are staged under */
  install_root: string;
  files: StagedFileSpec[];
}

/**
 * Root configuration object.
 */
export interface HtpcPkgConfig {
  /** Config file format version */
  version: string;
  package: PackageMetadata;
  source: SourceConfig;
  staging: StagingConfig;
}
