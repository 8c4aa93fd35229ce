/**
 * Types shared by the source-model builders
 */

import type { PackageInfo } from '../graph/types.js';

/** An in-memory source file handed to the builder */
export interface SourceInput {
  /** Absolute path of the file */
  filePath: string;
  content: string;
}

/** Finds the package a file belongs to */
export interface PackageLocator {
  locate(filePath: string): PackageInfo | null;
}

export interface ModelBuildOptions {
  /** Directory qualified names are relative to */
  rootDir: string;
  /** Extra glob patterns to skip (added to defaults) */
  ignore?: string[];
  /** Package lookup; defaults to reading package.json files from disk */
  packages?: PackageLocator;
  /**
   * Infer missing return and field types with the type checker.
   * Defaults to true.
   */
  inferTypes?: boolean;
}
