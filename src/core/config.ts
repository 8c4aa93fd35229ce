import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_STUB_MESSAGE } from '../refactor/types.js';

export interface HoistConfig {
  // Directories to scan, relative to the project root
  sourceRoots?: string[];

  // Patterns to ignore (added to defaults)
  ignore?: string[];

  // Snapshot files before writing
  backup?: boolean;

  // Message thrown by synthesized stubs; {class} and {method} are substituted
  stubMessage?: string;
}

export interface ResolvedConfig {
  sourceRoots: string[];
  ignore: string[];
  backup: boolean;
  stubMessage: string;
}

const CONFIG_FILES = ['.hoistrc', '.hoistrc.json', 'hoist.config.json'];

export const DEFAULT_SOURCE_ROOTS = ['src'];

export function loadProjectConfig(rootDir: string): HoistConfig {
  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(rootDir, configFile);
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        return toConfig(JSON.parse(content));
      } catch (error) {
        console.warn(`Warning: Failed to parse ${configFile}: ${error}`);
      }
    }
  }

  // Also check package.json for "hoist" key
  const pkgPath = path.join(rootDir, 'package.json');
  if (fs.existsSync(pkgPath)) {
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'hoist' in pkg) {
        return toConfig(pkg.hoist);
      }
    } catch {
      // Ignore
    }
  }

  return {};
}

/**
 * Layer the sources of settings: flags win over the project file, which
 * wins over global defaults.
 */
export function mergeWithDefaults(...layers: HoistConfig[]): ResolvedConfig {
  const pick = <K extends keyof HoistConfig>(key: K): HoistConfig[K] => {
    for (const layer of layers) {
      const value = layer[key];
      if (value !== undefined) return value;
    }
    return undefined;
  };

  const sourceRoots = pick('sourceRoots');
  return {
    sourceRoots: sourceRoots && sourceRoots.length > 0 ? sourceRoots : DEFAULT_SOURCE_ROOTS,
    ignore: layers.flatMap(layer => layer.ignore ?? []),
    backup: pick('backup') ?? true,
    stubMessage: pick('stubMessage') ?? DEFAULT_STUB_MESSAGE,
  };
}

/** Keep only the settings we understand, with the right types */
function toConfig(value: unknown): HoistConfig {
  if (typeof value !== 'object' || value === null) return {};

  const config: HoistConfig = {};
  if ('sourceRoots' in value && isStringArray(value.sourceRoots)) config.sourceRoots = value.sourceRoots;
  if ('ignore' in value && isStringArray(value.ignore)) config.ignore = value.ignore;
  if ('backup' in value && typeof value.backup === 'boolean') config.backup = value.backup;
  if ('stubMessage' in value && typeof value.stubMessage === 'string') config.stubMessage = value.stubMessage;
  return config;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
