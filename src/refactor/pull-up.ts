/**
 * Pull-up Method
 *
 * Runs a migration against files on disk: build the model, migrate in
 * memory, render the changed classes, fix imports, plan package manifest
 * updates, then snapshot and write.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { SourceModel } from '../graph/model.js';
import { buildSourceModel } from '../parsers/typescript.js';
import { fixImports } from './import-rewriter.js';
import { planManifestChanges } from './manifest.js';
import { migrate } from './operations/migrate.js';
import { renderFile } from './printer.js';
import { createSnapshot } from './snapshot.js';
import type { FileChange, PullUpOptions, RefactoringResult } from './types.js';

export async function pullUpMethod(options: PullUpOptions): Promise<RefactoringResult> {
  const rootDir = path.resolve(options.rootDir);

  let model: SourceModel;
  try {
    model = await buildSourceModel(options.sourceRoots, { rootDir, ignore: options.ignore });
  } catch (error) {
    return failed(`Could not read sources: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = migrate(
    model,
    {
      className: options.className,
      methodName: options.methodName,
      targetClassName: options.targetClassName,
    },
    { stubMessage: options.stubMessage }
  );
  if (!result.success || result.modifiedFiles.length === 0) {
    return result;
  }

  const warnings = [...result.warnings];
  const changes = renderChanges(model, result.modifiedFiles, warnings);
  const manifestChanges = planManifestChanges(
    model,
    changes.map(c => ({ filePath: c.filePath, content: c.newContent }))
  );
  for (const manifest of manifestChanges) {
    const names = Object.keys(manifest.added).join(', ');
    warnings.push(`Added ${names} to dependencies in ${path.relative(rootDir, manifest.manifestPath)}`);
    changes.push({
      filePath: manifest.manifestPath,
      changeType: 'modify',
      originalContent: manifest.originalContent,
      newContent: manifest.newContent,
      description: `Declare ${names}`,
    });
  }

  const modifiedFiles = changes.map(c => c.filePath);

  if (options.dryRun) {
    return {
      ...result,
      message: `${result.message} (dry run)`,
      modifiedFiles,
      warnings,
      changes,
    };
  }

  const applied = applyChanges(rootDir, changes, {
    backup: options.backup !== false,
    description: `pull-up ${options.className}.${options.methodName}`,
  });
  if (!applied.success) {
    return {
      ...result,
      success: false,
      code: 'MigrationFailed',
      message: 'Could not snapshot files before writing; nothing was changed on disk',
      modifiedFiles,
      warnings,
      changes,
    };
  }

  return { ...result, modifiedFiles, warnings, changes, snapshotId: applied.snapshotId };
}

/**
 * Write rendered changes, taking a snapshot of the files first unless
 * backups are off. Nothing is written when the snapshot fails.
 */
export function applyChanges(
  rootDir: string,
  changes: FileChange[],
  options: { backup: boolean; description: string }
): { success: boolean; snapshotId?: string } {
  let snapshotId: string | undefined;
  if (options.backup) {
    const id = createSnapshot(rootDir, changes.map(c => c.filePath), options.description);
    if (id === null) return { success: false };
    snapshotId = id;
  }

  for (const change of changes) {
    fs.writeFileSync(change.filePath, change.newContent);
  }
  return { success: true, snapshotId };
}

/** Re-render every changed class and fix the imports of each touched file */
export function renderChanges(model: SourceModel, filePaths: string[], warnings: string[]): FileChange[] {
  const changed = model.changedClasses();
  const changes: FileChange[] = [];

  for (const filePath of filePaths) {
    const file = model.getFile(filePath);
    if (!file) continue;

    const classes = changed.filter(c => c.filePath === filePath);
    const rendered = renderFile(model, filePath, classes);
    const fixed = fixImports(model, filePath, rendered);
    warnings.push(...fixed.warnings);

    changes.push({
      filePath,
      changeType: 'modify',
      originalContent: file.content,
      newContent: fixed.content,
      description: `Re-render ${classes.map(c => c.name).join(', ')}`,
    });
  }

  return changes;
}

function failed(message: string): RefactoringResult {
  return {
    success: false,
    message,
    code: 'MigrationFailed',
    modifiedFiles: [],
    warnings: [],
    changedClasses: [],
    visibilityChangedClasses: [],
    trace: [],
  };
}
