import * as fs from 'node:fs';
import * as path from 'node:path';
import * as ts from 'typescript';
import type { SourceModel } from '../graph/model.js';
import type { PackageInfo } from '../graph/types.js';
import { packageOfSpecifier } from '../parsers/typescript.js';

const DEPENDENCY_KEYS = ['dependencies', 'devDependencies', 'peerDependencies'] as const;

/** A package.json that needs new dependency entries */
export interface ManifestChange {
  manifestPath: string;
  packageName: string | null;
  /** Dependency name to version range */
  added: Record<string, string>;
  originalContent: string;
  newContent: string;
}

/**
 * Work out which workspace packages each rewritten file now imports without
 * its own package.json declaring them. Nothing is written.
 *
 * @param files - rewritten file paths and their new content
 */
export function planManifestChanges(
  model: SourceModel,
  files: Array<{ filePath: string; content: string }>
): ManifestChange[] {
  const workspace = workspacePackages(model);
  const wanted = new Map<string, { owner: PackageInfo; deps: Map<string, string> }>();

  for (const { filePath, content } of files) {
    const owner = model.getFile(filePath)?.package;
    if (!owner) continue;

    for (const specifier of bareSpecifiers(filePath, content)) {
      const dependency = workspace.get(packageOfSpecifier(specifier));
      if (!dependency || dependency.root === owner.root || dependency.name === null || dependency.version === null) {
        continue;
      }
      const entry = wanted.get(owner.root) ?? { owner, deps: new Map<string, string>() };
      entry.deps.set(dependency.name, `^${dependency.version}`);
      wanted.set(owner.root, entry);
    }
  }

  const changes: ManifestChange[] = [];
  for (const { owner, deps } of wanted.values()) {
    const manifestPath = path.join(owner.root, 'package.json');
    if (!fs.existsSync(manifestPath)) continue;

    const originalContent = fs.readFileSync(manifestPath, 'utf-8');
    const manifest = parseManifest(originalContent);
    if (!manifest) continue;

    const added: Record<string, string> = {};
    for (const [name, range] of deps) {
      if (!isDeclared(manifest, name)) added[name] = range;
    }
    if (Object.keys(added).length === 0) continue;

    const current = manifest['dependencies'];
    const merged: Record<string, unknown> = { ...(isRecord(current) ? current : {}), ...added };
    const sorted = Object.fromEntries(Object.entries(merged).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

    changes.push({
      manifestPath,
      packageName: owner.name,
      added,
      originalContent,
      newContent: JSON.stringify({ ...manifest, dependencies: sorted }, null, 2) + '\n',
    });
  }

  return changes;
}

/** Named packages that own at least one model file, by name */
function workspacePackages(model: SourceModel): Map<string, PackageInfo> {
  const packages = new Map<string, PackageInfo>();
  for (const file of model.allFiles()) {
    const pkg = file.package;
    if (pkg?.name && !packages.has(pkg.name)) packages.set(pkg.name, pkg);
  }
  return packages;
}

function bareSpecifiers(filePath: string, content: string): string[] {
  const sourceFile = ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, false);
  const specifiers: string[] = [];

  for (const statement of sourceFile.statements) {
    if (
      (ts.isImportDeclaration(statement) || ts.isExportDeclaration(statement)) &&
      statement.moduleSpecifier &&
      ts.isStringLiteral(statement.moduleSpecifier)
    ) {
      const specifier = statement.moduleSpecifier.text;
      if (!specifier.startsWith('.') && !specifier.startsWith('/') && !specifier.startsWith('node:')) {
        specifiers.push(specifier);
      }
    }
  }

  return specifiers;
}

function isDeclared(manifest: Record<string, unknown>, name: string): boolean {
  return DEPENDENCY_KEYS.some(key => {
    const deps = manifest[key];
    return isRecord(deps) && name in deps;
  });
}

function parseManifest(content: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(content);
    return isRecord(parsed) ? parsed : null;
  } catch {
    // Leave manifests we cannot parse untouched
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
