/**
 * Refactoring Module
 *
 * Pulls methods up class hierarchies, in memory (`migrate`) or against
 * files on disk (`pullUpMethod`).
 */

export type {
  FileChange,
  TextEdit,
  DependencyOwner,
  DependencyFinding,
  ConflictOutcome,
  MigrationPlan,
  FailureCode,
  PullUpRequest,
  MigrationOptions,
  PullUpOptions,
  RefactoringResult,
} from './types.js';
export { DEFAULT_STUB_MESSAGE } from './types.js';

export { MigrationContext } from './context.js';
export { pullUpMethod, renderChanges, applyChanges } from './pull-up.js';
export { listClasses, listMethods, listAncestors, type ClassSummary, type MethodSummary } from './queries.js';
export { renderFile, renderClass } from './printer.js';
export { fixImports, type ImportFixResult, type PlannedImport } from './import-rewriter.js';
export { createSnapshot, restoreSnapshot, listSnapshots, SNAPSHOT_DIR, type SnapshotInfo } from './snapshot.js';
export { planManifestChanges, type ManifestChange } from './manifest.js';
export { calculateRelativeImport } from './import-rewriter.helpers.js';

// Operations
export * from './operations/index.js';
