// Core exports
export { loadProjectConfig, mergeWithDefaults, DEFAULT_SOURCE_ROOTS } from './config.js';
export type { HoistConfig, ResolvedConfig } from './config.js';

import type { SourceModel } from '../graph/model.js';
import { buildSourceModel } from '../parsers/typescript.js';
import { loadProjectConfig, mergeWithDefaults, type HoistConfig } from './config.js';

/**
 * Build a source model with project config automatically loaded
 */
export async function createConfiguredModel(
  rootDir: string = process.cwd(),
  overrides: HoistConfig = {}
): Promise<SourceModel> {
  const config = mergeWithDefaults(overrides, loadProjectConfig(rootDir));
  return buildSourceModel(config.sourceRoots, { rootDir, ignore: config.ignore });
}
