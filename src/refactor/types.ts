import type { ClassNode, FieldNode, MemberNode, MethodNode, Visibility } from '../graph/types.js';

// ============================================================================
// File Change Types
// ============================================================================

/** Describes a change to be made to a file */
export interface FileChange {
  /** Absolute path to the file */
  filePath: string;
  /** Type of change */
  changeType: 'create' | 'modify';
  /** Original content (for verification/rollback) */
  originalContent?: string;
  /** New content after the change */
  newContent: string;
  /** Description of the change */
  description: string;
}

/** A single text edit to apply to a file */
export interface TextEdit {
  /** Start offset in the file */
  startOffset: number;
  /** End offset in the file */
  endOffset: number;
  /** New text to insert */
  newText: string;
  /** Human-readable description of the edit */
  description?: string;
}

// ============================================================================
// Analysis Types
// ============================================================================

/** Where a referenced member lives relative to the migration path */
export type DependencyOwner = 'origin' | 'intermediate' | 'irrelevant';

/** A member touched by a body that may have to travel with it */
export interface DependencyFinding {
  member: MemberNode;
  owner: DependencyOwner;
  /** Informational note, e.g. that the member is private today */
  issue: string | null;
}

/** Result of comparing a method against the destination's declarations */
export type ConflictOutcome =
  | { kind: 'clear' }
  | { kind: 'duplicate'; existing: MethodNode }
  | { kind: 'signature-conflict'; existing: MethodNode | FieldNode | null; reason: string }
  | { kind: 'overload-ambiguity'; existing: MethodNode };

/** Decisions made before the model is touched */
export interface MigrationPlan {
  method: MethodNode;
  origin: ClassNode;
  destination: ClassNode;
  /** Same-named declarations below the destination, origin's own excluded */
  counterparts: MethodNode[];
  visibility: Visibility;
  returnType: string;
  warnings: string[];
}

// ============================================================================
// Requests and Results
// ============================================================================

export type FailureCode =
  | 'ClassNotFound'
  | 'MethodNotFound'
  | 'NotAnAncestor'
  | 'UnresolvableType'
  | 'SignatureConflict'
  | 'DuplicateMethod'
  | 'OverloadAmbiguity'
  | 'MigrationFailed';

/** What to pull up and where to */
export interface PullUpRequest {
  /** Simple or qualified (`module#Name`) class name */
  className: string;
  methodName: string;
  /** Destination ancestor; the direct superclass when omitted */
  targetClassName?: string;
}

export interface MigrationOptions {
  /**
   * Message thrown by synthesized stubs. `{class}` and `{method}` are
   * replaced with the stub's class and method names.
   */
  stubMessage?: string;
}

export const DEFAULT_STUB_MESSAGE = 'Not implemented: {class}.{method}';

/** Options for a run against files on disk */
export interface PullUpOptions extends PullUpRequest, MigrationOptions {
  /** Directories to scan, relative to rootDir */
  sourceRoots: string[];
  /** Project root; snapshots and qualified names are relative to it */
  rootDir: string;
  ignore?: string[];
  /** Compute and return the changes without writing them */
  dryRun?: boolean;
  /** Snapshot files before overwriting them (default true) */
  backup?: boolean;
}

export interface RefactoringResult {
  success: boolean;
  message: string;
  /** Set on failure, and on success when an identical method made the run a no-op */
  code?: FailureCode;
  /** Files written (or that would be written on a dry run) */
  modifiedFiles: string[];
  /** Recoverable issues, in the order they happened */
  warnings: string[];
  /** Qualified names of classes that were re-serialized */
  changedClasses: string[];
  /** Qualified names of classes whose member visibility changed */
  visibilityChangedClasses: string[];
  /** Step-by-step record of what the engine did */
  trace: string[];
  /** Rendered file contents, present after rendering */
  changes?: FileChange[];
  /** Snapshot taken before writing */
  snapshotId?: string;
}
