import type { SourceModel } from './model.js';
import { TOP_TYPE } from './model.js';
import type { ClassNode } from './types.js';

/**
 * Read-only queries over the single-inheritance chain of a SourceModel.
 */
export class HierarchyNavigator {
  constructor(private readonly model: SourceModel) {}

  /** Ancestors from nearest to farthest. The chain stops early on a cycle. */
  ancestorsOf(cls: ClassNode): ClassNode[] {
    const result: ClassNode[] = [];
    const seen = new Set<number>([cls.id]);
    let current = this.model.superclassOf(cls);

    while (current && !seen.has(current.id)) {
      result.push(current);
      seen.add(current.id);
      current = this.model.superclassOf(current);
    }

    return result;
  }

  directSubclassesOf(cls: ClassNode): ClassNode[] {
    return this.model.allClasses().filter(c => c.superclass === cls.id && c.id !== cls.id);
  }

  /** Every transitive subclass, breadth first, parents before children */
  descendantsOf(cls: ClassNode): ClassNode[] {
    const result: ClassNode[] = [];
    const seen = new Set<number>([cls.id]);
    const queue = [cls];

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      for (const child of this.directSubclassesOf(next)) {
        if (seen.has(child.id)) continue;
        seen.add(child.id);
        result.push(child);
        queue.push(child);
      }
    }

    return result;
  }

  isAncestor(ancestor: ClassNode, descendant: ClassNode): boolean {
    return this.ancestorsOf(descendant).some(c => c.id === ancestor.id);
  }

  /**
   * Classes strictly between a descendant and one of its ancestors, nearest
   * to the descendant first. Empty for a direct supertype and for unrelated
   * classes; use isAncestor to tell the two apart.
   */
  pathBetween(descendant: ClassNode, ancestor: ClassNode): ClassNode[] {
    const chain = this.ancestorsOf(descendant);
    const index = chain.findIndex(c => c.id === ancestor.id);
    return index <= 0 ? [] : chain.slice(0, index);
  }

  /** True when a value typed `subType` can be passed where `superType` is expected */
  isAssignable(subType: string, superType: string): boolean {
    const sub = normalizeType(subType);
    const sup = normalizeType(superType);

    if (sub === sup) return true;
    if (sup === TOP_TYPE || sup === 'any' || sub === 'never') return true;

    const alternatives = splitUnion(sup);
    if (alternatives.length > 1) {
      return alternatives.some(alt => this.isAssignable(sub, alt));
    }

    const subClass = this.model.classForType(sub);
    const supClass = this.model.classForType(sup);
    if (!subClass || !supClass) return false;
    if (subClass.id === supClass.id) return true;
    return this.isAncestor(supClass, subClass);
  }

  /** Either type assignable to the other */
  areRelated(a: string, b: string): boolean {
    return this.isAssignable(a, b) || this.isAssignable(b, a);
  }
}

/** Collapse whitespace so `Map<string,number>` and `Map<string, number>` compare equal */
export function normalizeType(typeText: string): string {
  return typeText
    .replace(/\s+/g, ' ')
    .replace(/\s*([<>,()[\]{}|&:;=])\s*/g, '$1')
    .trim();
}

function splitUnion(typeText: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < typeText.length; i++) {
    const ch = typeText[i];
    if (ch === '<' || ch === '(' || ch === '[' || ch === '{') depth++;
    else if ((ch === '>' && typeText[i - 1] !== '=') || ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === '|' && depth === 0) {
      parts.push(typeText.slice(start, i).trim());
      start = i + 1;
    }
  }
  parts.push(typeText.slice(start).trim());

  return parts.filter(p => p.length > 0);
}
