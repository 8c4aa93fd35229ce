import { HierarchyNavigator } from '../../graph/hierarchy.js';
import type { SourceModel } from '../../graph/model.js';
import type { ClassNode, MethodNode } from '../../graph/types.js';
import { MigrationContext } from '../context.js';
import type { FailureCode, MigrationOptions, PullUpRequest, RefactoringResult } from '../types.js';
import { checkConflict } from './conflicts.js';
import { analyzeDependencies } from './dependencies.js';
import { abstractionBlocker, migrateMethod, planMigration } from './method-migration.js';
import { methodTypeParameterNames, methodTypes, unresolvableNames } from './type-resolution.js';

type Resolved<T> = { ok: true; value: T } | { ok: false; result: RefactoringResult };

/**
 * Pull a method up to an ancestor inside an already-built model.
 *
 * Every check that can fail runs before the model is touched, so a failed
 * result leaves the model as it was. After that, problems become warnings
 * on a successful result, except for unexpected errors, which are reported
 * as `MigrationFailed` with whatever edits were already made left in place.
 */
export function migrate(model: SourceModel, request: PullUpRequest, options: MigrationOptions = {}): RefactoringResult {
  const navigator = new HierarchyNavigator(model);
  const ctx = new MigrationContext(model, navigator, options);

  // --- Resolution ---

  const origin = model.findClass(request.className);
  if (!origin) {
    return failure(ctx, 'ClassNotFound', `Class ${request.className} not found`);
  }

  const method = model.methodsOf(origin).find(m => m.name === request.methodName && !m.isStatic);
  if (!method) {
    const isStatic = model.methodsOf(origin).some(m => m.name === request.methodName);
    return failure(
      ctx,
      'MethodNotFound',
      isStatic
        ? `${origin.name}.${request.methodName}() is static; only instance methods can be pulled up`
        : `Method ${request.methodName} not found in ${origin.name}`
    );
  }

  const destination = resolveDestination(ctx, origin, request.targetClassName);
  if (!destination.ok) return destination.result;
  const target = destination.value;
  ctx.debug(`Pulling ${origin.qualifiedName}.${method.name}() up to ${target.qualifiedName}`);

  // --- Gates ---

  const conflict = checkConflict(model, navigator, method, target);
  switch (conflict.kind) {
    case 'duplicate': {
      const message = `${target.name} already declares an identical ${method.name}(); nothing was pulled up`;
      ctx.warn(message);
      return { ...summary(ctx, true, message), code: 'DuplicateMethod' };
    }
    case 'signature-conflict':
      return failure(ctx, 'SignatureConflict', `Cannot pull up ${origin.name}.${method.name}(): ${conflict.reason}`);
    case 'overload-ambiguity':
      return failure(
        ctx,
        'OverloadAmbiguity',
        `Cannot pull up ${origin.name}.${method.name}(): calls could not tell it apart from ` +
          `${target.name}.${conflict.existing.name}(${conflict.existing.parameters.map(p => p.type).join(', ')})`
      );
    case 'clear':
      break;
  }

  const inScope = methodTypeParameterNames(method);
  const unresolved = [...new Set(methodTypes(method).flatMap(t => unresolvableNames(model, t, origin, target, inScope)))];
  if (unresolved.length > 0) {
    return failure(
      ctx,
      'UnresolvableType',
      `Type ${unresolved.join(', ')} used by ${origin.name}.${method.name}() cannot be resolved from ${target.name}`
    );
  }

  // --- Plan and migrate ---

  const plan = planMigration(ctx, method, origin, target);
  precheck(ctx, method, origin, target);
  for (const warning of plan.warnings) ctx.warn(warning);

  try {
    migrateMethod(ctx, plan);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return failure(ctx, 'MigrationFailed', `Migration failed: ${message}`);
  }

  return summary(ctx, true, `Pulled up ${origin.name}.${method.name}() to ${target.name}`);
}

function resolveDestination(
  ctx: MigrationContext,
  origin: ClassNode,
  targetName: string | undefined
): Resolved<ClassNode> {
  const { model, navigator } = ctx;

  if (targetName) {
    const target = model.findClass(targetName);
    if (!target) {
      return { ok: false, result: failure(ctx, 'ClassNotFound', `Class ${targetName} not found`) };
    }
    if (!navigator.isAncestor(target, origin)) {
      return {
        ok: false,
        result: failure(ctx, 'NotAnAncestor', `${target.name} is not an ancestor of ${origin.name}`),
      };
    }
    return { ok: true, value: target };
  }

  const parent = model.superclassOf(origin);
  if (parent) return { ok: true, value: parent };

  return {
    ok: false,
    result: origin.extendsText
      ? failure(ctx, 'ClassNotFound', `Superclass ${origin.extendsText} of ${origin.name} is not in the scanned sources`)
      : failure(ctx, 'NotAnAncestor', `${origin.name} has no superclass to pull into`),
  };
}

/** Tell the caller up front what will travel with the method */
function precheck(ctx: MigrationContext, method: MethodNode, origin: ClassNode, destination: ClassNode): void {
  const report = analyzeDependencies(ctx.model, ctx.navigator, method.body, { origin, destination, self: method.id });

  for (const finding of report.findings) {
    const node = finding.member.node;
    const owner = ctx.model.ownerOf(node);

    if (finding.member.kind === 'field') {
      if (finding.issue === null || finding.member.node.isParameterProperty) continue;
      ctx.warn(`Private field ${owner.name}.${node.name} will be pulled up to ${destination.name}`);
      ctx.announced.add(node.id);
    } else if (abstractionBlocker(ctx, finding.member.node, destination) === null) {
      ctx.warn(`Method ${owner.name}.${node.name}() will be pulled up to ${destination.name} as abstract`);
      ctx.announced.add(node.id);
    }
  }

  for (const note of report.unsupported) ctx.warn(note);
}

function summary(ctx: MigrationContext, success: boolean, message: string): RefactoringResult {
  const changed = ctx.model.changedClasses();
  return {
    success,
    message,
    modifiedFiles: [...new Set(changed.map(c => c.filePath))],
    warnings: [...ctx.warnings],
    changedClasses: changed.map(c => c.qualifiedName),
    visibilityChangedClasses: [...ctx.visibilityChanged]
      .map(id => ctx.model.getClass(id)?.qualifiedName)
      .filter((name): name is string => name !== undefined),
    trace: [...ctx.trace],
  };
}

function failure(ctx: MigrationContext, code: FailureCode, message: string): RefactoringResult {
  return { ...summary(ctx, false, message), code };
}
