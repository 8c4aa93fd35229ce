import type { HierarchyNavigator } from '../graph/hierarchy.js';
import type { SourceModel } from '../graph/model.js';
import type { ClassId, ClassNode, MemberId, MethodNode } from '../graph/types.js';
import { DEFAULT_STUB_MESSAGE, type MigrationOptions } from './types.js';

/**
 * State threaded through one migration: the model being edited, the
 * warnings and trace handed back to the caller, and the bookkeeping the
 * later steps need.
 */
export class MigrationContext {
  readonly warnings: string[] = [];
  readonly trace: string[] = [];
  readonly visibilityChanged = new Set<ClassId>();
  /** Abstract declarations added to the destination, by name */
  readonly introducedAbstracts = new Map<string, MethodNode>();
  /** Classes whose abstract modifier was added by this run */
  readonly madeAbstract = new Set<ClassId>();
  readonly pulledFields: string[] = [];
  /** Members already handled, so dependency cycles terminate */
  readonly visited = new Set<MemberId>();
  /** Members the pre-check already warned about */
  readonly announced = new Set<MemberId>();
  readonly stubMessage: string;

  constructor(
    readonly model: SourceModel,
    readonly navigator: HierarchyNavigator,
    options: MigrationOptions = {}
  ) {
    this.stubMessage = options.stubMessage ?? DEFAULT_STUB_MESSAGE;
  }

  warn(message: string): void {
    if (this.warnings.includes(message)) return;
    this.warnings.push(message);
    this.trace.push(`warning: ${message}`);
  }

  debug(message: string): void {
    this.trace.push(message);
  }

  /** Members in different packages must end up public */
  isCrossModule(a: ClassNode, b: ClassNode): boolean {
    const first = this.model.getFile(a.filePath)?.package ?? null;
    const second = this.model.getFile(b.filePath)?.package ?? null;
    return first !== null && second !== null && first.root !== second.root;
  }

  stubMessageFor(cls: ClassNode, methodName: string): string {
    return this.stubMessage.replace(/\{class\}/g, cls.name).replace(/\{method\}/g, methodName);
  }
}
