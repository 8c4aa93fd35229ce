import { normalizeType } from '../../graph/hierarchy.js';
import { VOID_TYPES } from '../../graph/model.js';
import type { ClassNode, MethodNode, Parameter } from '../../graph/types.js';
import { walkBody } from '../../parsers/body.js';
import type { MigrationContext } from '../context.js';
import type { MigrationPlan } from '../types.js';
import { sameSignature } from './conflicts.js';
import { analyzeDependencies, lookupMember, type DependencyReport } from './dependencies.js';
import { migrateField } from './field-migration.js';
import { rewriteBody } from './rewriter.js';
import { sameType, unifyTypes } from './type-unifier.js';
import { applyVisibility, resolveVisibility } from './visibility.js';

// ============================================================================
// Planning
// ============================================================================

/** Same-named instance methods declared anywhere below `cls` */
export function sameNamedBelow(ctx: MigrationContext, cls: ClassNode, name: string, exclude: number | null): MethodNode[] {
  return ctx.navigator
    .descendantsOf(cls)
    .flatMap(d => ctx.model.methodsOf(d))
    .filter(m => m.name === name && !m.isStatic && m.id !== exclude);
}

/**
 * Work out the visibility and return type of the pulled-up method without
 * touching the model.
 */
export function planMigration(
  ctx: MigrationContext,
  method: MethodNode,
  origin: ClassNode,
  destination: ClassNode
): MigrationPlan {
  const counterparts = sameNamedBelow(ctx, destination, method.name, method.id);
  const visibility = resolveVisibility(
    [method.visibility, ...counterparts.map(c => c.visibility)],
    ctx.isCrossModule(origin, destination)
  );
  const unified = unifyTypes(ctx.model, ctx.navigator, method.returnType, counterparts.map(c => c.returnType));

  const warnings: string[] = [];
  if (visibility !== method.visibility) {
    warnings.push(`${method.name}() will be ${visibility} in ${destination.name} (was ${method.visibility})`);
  }
  if (unified.widenedToTop) {
    warnings.push(`Overrides of ${method.name}() share no return type; ${destination.name} declares ${unified.type}`);
  }

  return { method, origin, destination, counterparts, visibility, returnType: unified.type, warnings };
}

/**
 * Why a dependent method needs no abstract declaration on the destination,
 * or null when it does.
 */
export function abstractionBlocker(ctx: MigrationContext, dep: MethodNode, destination: ClassNode): string | null {
  const { model, navigator } = ctx;
  const owner = model.ownerOf(dep);

  const existing = model.methodsOf(destination).find(m => m.name === dep.name && !m.isStatic);
  if (existing) {
    if (existing.isAbstract && sameSignature(existing, dep)) return 'declared';
    if (sameSignature(existing, dep)) {
      return `${destination.name} already declares ${dep.name}() with the same signature; ${owner.name}.${dep.name}() was not abstracted`;
    }
    return `${destination.name}.${dep.name}() has a different signature than ${owner.name}.${dep.name}(); not abstracted`;
  }

  const inherited = navigator.ancestorsOf(destination).find(c => model.methodsOf(c).some(m => m.name === dep.name && !m.isStatic));
  return inherited ? 'inherited' : null;
}

// ============================================================================
// Migration
// ============================================================================

/**
 * Move a method to the destination along with everything it needs, then
 * repair the hierarchy below so every class still compiles.
 */
export function migrateMethod(ctx: MigrationContext, plan: MigrationPlan): MethodNode {
  const { model, navigator } = ctx;
  const { method, origin, destination } = plan;
  ctx.visited.add(method.id);

  const clone = model.cloneMethod(method, destination.id, {
    visibility: plan.visibility,
    returnType: plan.returnType,
    returnTypeIsExplicit: method.returnTypeIsExplicit || !sameType(plan.returnType, method.returnType),
  });
  ctx.debug(`Copied ${origin.name}.${method.name}() to ${destination.name}`);

  applyVisibility(ctx, clone, plan.counterparts, plan.visibility);

  if (clone.body !== null) {
    clone.body = rewriteBody(
      ctx,
      clone.body,
      { origin, host: destination, methodName: method.name },
      {
        selfCasts: true,
        redirectSuperCalls: true,
        retype: sameType(plan.returnType, method.returnType)
          ? undefined
          : { from: method.returnType, to: plan.returnType },
      }
    );
  }

  if (method.isAbstract) {
    makeAbstract(ctx, destination);
    ctx.introducedAbstracts.set(method.name, clone);
  }

  resolveDependencies(
    ctx,
    analyzeDependencies(model, navigator, method.body, { origin, destination, self: method.id }),
    destination
  );

  repairSuperCalls(ctx, destination);
  synthesizeStubs(ctx, destination);
  releaseAbstract(ctx, destination);

  model.removeMethod(method);
  ctx.debug(`Removed ${origin.name}.${method.name}()`);

  reconcileOverrides(ctx, destination);
  return clone;
}

/** Move fields and abstract methods a body depends on, recursively */
export function resolveDependencies(ctx: MigrationContext, report: DependencyReport, destination: ClassNode): void {
  for (const note of report.unsupported) ctx.warn(note);

  for (const finding of report.findings) {
    if (finding.member.kind === 'field') {
      migrateField(ctx, finding.member.node, destination, nested => resolveDependencies(ctx, nested, destination));
    } else {
      abstractDependency(ctx, finding.member.node, destination);
    }
  }
}

/**
 * Declare a dependent method abstract on the destination. Its body stays
 * where it is and becomes an override; its own dependencies are processed
 * the same way.
 */
function abstractDependency(ctx: MigrationContext, dep: MethodNode, destination: ClassNode): void {
  if (ctx.visited.has(dep.id)) return;
  ctx.visited.add(dep.id);

  const { model, navigator } = ctx;
  const owner = model.ownerOf(dep);

  const blocker = abstractionBlocker(ctx, dep, destination);
  if (blocker === 'declared' || blocker === 'inherited') {
    ctx.debug(`${destination.name} already provides ${dep.name}() (${blocker})`);
    return;
  }
  if (blocker !== null) {
    ctx.warn(blocker);
    return;
  }

  const counterparts = sameNamedBelow(ctx, destination, dep.name, null);
  const visibility = resolveVisibility(counterparts.map(c => c.visibility), ctx.isCrossModule(owner, destination));
  const unified = unifyTypes(
    model,
    navigator,
    dep.returnType,
    counterparts.filter(c => c.id !== dep.id).map(c => c.returnType)
  );
  if (unified.widenedToTop) {
    ctx.warn(`No common return type for ${dep.name}() below ${destination.name}; declared as ${unified.type}`);
  }

  const abstract = model.addMethod(destination.id, {
    name: dep.name,
    parameters: dep.parameters.map(signatureParameter),
    returnType: unified.type,
    returnTypeIsExplicit: true,
    visibility,
    explicitPublic: false,
    isAbstract: true,
    isStatic: false,
    isAsync: false,
    isOverride: false,
    typeParameters: dep.typeParameters,
    body: null,
    overloads: [],
    docs: null,
    decorators: [],
  });
  makeAbstract(ctx, destination);
  ctx.introducedAbstracts.set(dep.name, abstract);

  if (ctx.announced.has(dep.id)) {
    ctx.debug(`Declared abstract ${destination.name}.${dep.name}()`);
  } else {
    ctx.warn(`Declared abstract ${destination.name}.${dep.name}() for ${owner.name}.${dep.name}()`);
  }

  applyVisibility(ctx, abstract, counterparts, visibility);

  resolveDependencies(
    ctx,
    analyzeDependencies(model, navigator, dep.body, { origin: owner, destination, self: dep.id }),
    destination
  );
}

/** Parameter as written in a signature without a body: no initializer */
export function signatureParameter(param: Parameter): Parameter {
  const rest = param.text.startsWith('...');
  const nameAt = param.text.indexOf(param.name);
  const afterName = nameAt >= 0 ? param.text.slice(nameAt + param.name.length) : '';
  const optional = afterName.trimStart().startsWith('?');
  const typeAt = afterName.indexOf(param.type);
  const tail = typeAt >= 0 ? afterName.slice(typeAt + param.type.length) : afterName;
  const hasInitializer = /=/.test(tail.replace(/=>/g, ''));

  const question = optional || hasInitializer ? '?' : '';
  return {
    name: param.name,
    type: param.type,
    text: `${rest ? '...' : ''}${param.name}${question}: ${param.type}`,
  };
}

function makeAbstract(ctx: MigrationContext, cls: ClassNode): void {
  if (cls.isAbstract) return;
  cls.isAbstract = true;
  ctx.madeAbstract.add(cls.id);
  ctx.model.markChanged(cls);
  ctx.debug(`Marked ${cls.name} abstract`);
}

// ============================================================================
// Repairs Below the Destination
// ============================================================================

/**
 * `super.n()` calls that would now land on a freshly abstract `n` either
 * get a forwarding body on the destination (when something above it
 * implements `n`) or are removed with a marker comment.
 */
function repairSuperCalls(ctx: MigrationContext, destination: ClassNode): void {
  const { model, navigator } = ctx;

  for (const [name, abstract] of ctx.introducedAbstracts) {
    if (!abstract.isAbstract) continue;

    const callers = navigator
      .descendantsOf(destination)
      .flatMap(cls => model.methodsOf(cls))
      .filter(m => m.body !== null && callsAbstractThroughSuper(ctx, m, name, destination));
    if (callers.length === 0) continue;

    const implementer = concreteAbove(ctx, destination, name);
    if (implementer !== null) {
      abstract.isAbstract = false;
      abstract.isOverride = true;
      abstract.body = forwardingBody(abstract);
      ctx.warn(`${destination.name}.${name}() forwards to ${implementer} so existing super.${name}() calls keep working`);
      continue;
    }

    const marker = `// super.${name}() call removed: ${name} is now abstract in ${destination.name}`;
    for (const caller of callers) {
      const owner = model.ownerOf(caller);
      if (caller.body === null) continue;
      const rewritten = rewriteBody(
        ctx,
        caller.body,
        { origin: owner, host: owner, methodName: caller.name },
        { removeSuperCalls: new Map([[name, marker]]) }
      );
      if (rewritten !== caller.body) {
        caller.body = rewritten;
        model.markChanged(owner);
      }
    }
  }
}

function callsAbstractThroughSuper(ctx: MigrationContext, method: MethodNode, name: string, destination: ClassNode): boolean {
  const { model, navigator } = ctx;
  const parent = model.superclassOf(model.ownerOf(method));
  if (!parent) return false;

  const found = lookupMember(model, navigator, parent, name);
  if (!found || !('member' in found) || found.owner.id !== destination.id) return false;
  if (found.member.kind !== 'method' || !found.member.node.isAbstract) return false;

  let calls = false;
  if (method.body !== null) {
    walkBody(method.body, {
      onSuperAccess: access => {
        if (access.name === name && access.isCall) calls = true;
      },
    });
  }
  return calls;
}

/**
 * Name of whatever implements `name` above `cls`: a model ancestor with a
 * body, or a supertype outside the model that must have provided it for
 * the original super call to compile.
 */
function concreteAbove(ctx: MigrationContext, cls: ClassNode, name: string): string | null {
  const { model, navigator } = ctx;
  for (const ancestor of navigator.ancestorsOf(cls)) {
    if (model.methodsOf(ancestor).some(m => m.name === name && !m.isAbstract && !m.isStatic)) return ancestor.name;
  }

  const top = [cls, ...navigator.ancestorsOf(cls)].find(c => c.extendsText !== null && c.superclass === null);
  return top?.extendsText ?? null;
}

function forwardingBody(method: MethodNode): string {
  const args = method.parameters.map(p => (p.text.startsWith('...') ? `...${p.name}` : p.name)).join(', ');
  const call = `super.${method.name}(${args});`;
  return isVoid(method.returnType) ? `{\n  ${call}\n}` : `{\n  return ${call}\n}`;
}

/**
 * Give every concrete class below the destination that lacks an
 * implementation of a new abstract method a stub. Parents are handled
 * before children, so a stub on a parent covers its subtree.
 */
function synthesizeStubs(ctx: MigrationContext, destination: ClassNode): void {
  const { model, navigator } = ctx;

  for (const [name, abstract] of ctx.introducedAbstracts) {
    if (!abstract.isAbstract) continue;

    for (const cls of navigator.descendantsOf(destination)) {
      if (cls.isAbstract || implementsBelow(ctx, cls, destination, name)) continue;

      const isAsync = /^Promise\s*</.test(abstract.returnType.trim());
      model.addMethod(cls.id, {
        name,
        parameters: abstract.parameters.map(p => ({ ...p })),
        returnType: abstract.returnType,
        returnTypeIsExplicit: true,
        visibility: abstract.visibility,
        explicitPublic: false,
        isAbstract: false,
        isStatic: false,
        isAsync,
        isOverride: true,
        typeParameters: abstract.typeParameters,
        body: isVoid(abstract.returnType)
          ? '{}'
          : `{\n  throw new Error('${escapeString(ctx.stubMessageFor(cls, name))}');\n}`,
        overloads: [],
        docs: null,
        decorators: [],
      });
      ctx.warn(`Added stub ${cls.name}.${name}()`);
    }
  }
}

/** A body for `name` on `cls` or on a class between it and the destination */
function implementsBelow(ctx: MigrationContext, cls: ClassNode, destination: ClassNode, name: string): boolean {
  const { model, navigator } = ctx;
  for (const candidate of [cls, ...navigator.ancestorsOf(cls)]) {
    if (candidate.id === destination.id) return false;
    if (model.methodsOf(candidate).some(m => m.name === name && !m.isAbstract && !m.isStatic)) return true;
  }
  return false;
}

/**
 * Drop the abstract modifier once nothing abstract is left: on classes this
 * run made abstract, and on an abstract destination that received abstract
 * declarations which forwarding then made concrete. An abstract destination
 * this run gave no abstract declarations keeps its modifier.
 */
function releaseAbstract(ctx: MigrationContext, destination: ClassNode): void {
  const candidates = new Set(ctx.madeAbstract);
  if (destination.isAbstract && ctx.introducedAbstracts.size > 0) candidates.add(destination.id);

  for (const id of candidates) {
    const cls = ctx.model.getClass(id);
    if (!cls) continue;

    if (ctx.model.methodsOf(cls).some(m => m.isAbstract)) {
      if (ctx.madeAbstract.has(id)) {
        ctx.warn(`${cls.name} is now abstract; code that instantiates it directly must change`);
      }
    } else {
      cls.isAbstract = false;
      ctx.model.markChanged(cls);
      ctx.debug(`${cls.name} no longer needs to be abstract`);
    }
  }
}

/**
 * Remove `override` from members that no longer override anything in the
 * model. Classes that extend something outside the model are left alone.
 */
function reconcileOverrides(ctx: MigrationContext, destination: ClassNode): void {
  const { model, navigator } = ctx;

  for (const cls of [destination, ...navigator.descendantsOf(destination)]) {
    const chain = [cls, ...navigator.ancestorsOf(cls)];
    if (chain.some(c => c.extendsText !== null && c.superclass === null)) continue;

    const ancestors = chain.slice(1);
    for (const method of model.methodsOf(cls)) {
      if (!method.isOverride) continue;
      const declaredAbove = ancestors.some(
        a =>
          model.methodsOf(a).some(m => m.name === method.name) ||
          model.fieldsOf(a).some(f => f.name === method.name) ||
          model.accessorsOf(a).includes(method.name)
      );
      if (declaredAbove) continue;

      method.isOverride = false;
      model.markChanged(cls);
      ctx.debug(`Removed override from ${cls.name}.${method.name}(): nothing above declares it`);
    }
  }
}

// ============================================================================
// Utilities
// ============================================================================

export function isVoid(returnType: string): boolean {
  return VOID_TYPES.has(normalizeType(returnType));
}

function escapeString(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}
