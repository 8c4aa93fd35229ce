import { VISIBILITY_ORDER, type MethodNode, type Visibility } from '../../graph/types.js';
import type { MigrationContext } from '../context.js';

export function rank(level: Visibility): number {
  return VISIBILITY_ORDER.indexOf(level);
}

/** The wider of two levels */
export function widest(a: Visibility, b: Visibility): Visibility {
  return rank(a) >= rank(b) ? a : b;
}

/**
 * Least upper bound of every observed level, floored at `protected` (a
 * member that crosses a class boundary cannot stay private) or at
 * `public` when the move crosses packages.
 */
export function resolveVisibility(levels: Visibility[], crossModule: boolean): Visibility {
  if (crossModule) return 'public';
  return levels.reduce<Visibility>(widest, 'protected');
}

/**
 * Give a declaration and every same-named override below it the resolved
 * level, and mark the overrides. Re-running with the same level changes
 * nothing.
 */
export function applyVisibility(
  ctx: MigrationContext,
  declaration: MethodNode,
  overrides: MethodNode[],
  level: Visibility
): void {
  setVisibility(ctx, declaration, level);

  for (const override of overrides) {
    setVisibility(ctx, override, level);
    if (!override.isOverride) {
      override.isOverride = true;
      ctx.model.markChanged(ctx.model.ownerOf(override));
      ctx.debug(`Marked ${ctx.model.ownerOf(override).name}.${override.name}() as override`);
    }
  }
}

function setVisibility(ctx: MigrationContext, method: MethodNode, level: Visibility): void {
  if (method.visibility === level) return;

  const owner = ctx.model.ownerOf(method);
  ctx.debug(`${owner.name}.${method.name}(): ${method.visibility} -> ${level}`);
  method.visibility = level;
  ctx.model.markChanged(owner);
  ctx.visibilityChanged.add(owner.id);
}
