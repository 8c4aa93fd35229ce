import type { HierarchyNavigator } from '../../graph/hierarchy.js';
import { normalizeType } from '../../graph/hierarchy.js';
import { TOP_TYPE, type SourceModel } from '../../graph/model.js';

export interface UnifiedType {
  type: string;
  /** True when no common supertype below the top type exists */
  widenedToTop: boolean;
}

/**
 * Widen `seed` until every type in `others` is assignable to it. Types are
 * visited in the given order; the result never narrows.
 */
export function unifyTypes(
  model: SourceModel,
  navigator: HierarchyNavigator,
  seed: string,
  others: string[]
): UnifiedType {
  let current = seed;
  let widenedToTop = false;

  for (const type of others) {
    if (navigator.isAssignable(type, current)) continue;

    if (navigator.isAssignable(current, type)) {
      current = type;
      continue;
    }

    const currentClass = model.classForType(current);
    const common = currentClass
      ? navigator.ancestorsOf(currentClass).find(ancestor => navigator.isAssignable(type, ancestor.name))
      : undefined;

    if (common) {
      current = common.name;
    } else {
      current = TOP_TYPE;
      widenedToTop = true;
    }
  }

  return { type: current, widenedToTop };
}

/** Whether two type texts denote the same type */
export function sameType(a: string, b: string): boolean {
  return normalizeType(a) === normalizeType(b);
}
