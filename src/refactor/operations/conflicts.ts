import type { HierarchyNavigator } from '../../graph/hierarchy.js';
import type { SourceModel } from '../../graph/model.js';
import type { ClassNode, MethodNode } from '../../graph/types.js';
import { normalizeBody } from '../../parsers/body.js';
import type { ConflictOutcome } from '../types.js';
import { sameType } from './type-unifier.js';

/** Same name and pairwise identical parameter types */
export function sameSignature(a: MethodNode, b: MethodNode): boolean {
  return (
    a.name === b.name &&
    a.parameters.length === b.parameters.length &&
    a.parameters.every((p, i) => {
      const other = b.parameters[i];
      return other !== undefined && sameType(p.type, other.type);
    })
  );
}

/**
 * Compare a method against the destination's own declarations.
 *
 * A class has one member per name, so any same-named method that is neither
 * an identical duplicate nor an overload-compatible near match is reported
 * as a signature conflict. A same-named field or accessor conflicts too.
 */
export function checkConflict(
  model: SourceModel,
  navigator: HierarchyNavigator,
  method: MethodNode,
  destination: ClassNode
): ConflictOutcome {
  const field = model.fieldsOf(destination).find(f => f.name === method.name);
  if (field) {
    return { kind: 'signature-conflict', existing: field, reason: `${destination.name} has a field named ${method.name}` };
  }

  if (model.accessorsOf(destination).includes(method.name)) {
    return { kind: 'signature-conflict', existing: null, reason: `${destination.name} has an accessor named ${method.name}` };
  }

  const existing = model.methodsOf(destination).find(m => m.name === method.name && m.isStatic === method.isStatic);
  if (!existing) return { kind: 'clear' };

  if (sameSignature(method, existing)) {
    if (normalizeBody(method.body) === normalizeBody(existing.body) && method.isAbstract === existing.isAbstract) {
      return { kind: 'duplicate', existing };
    }
    return {
      kind: 'signature-conflict',
      existing,
      reason: `${destination.name}.${method.name}() has the same signature and a different body`,
    };
  }

  if (
    method.parameters.length === existing.parameters.length &&
    method.parameters.every((p, i) => {
      const other = existing.parameters[i];
      return other !== undefined && navigator.areRelated(p.type, other.type);
    })
  ) {
    return { kind: 'overload-ambiguity', existing };
  }

  return {
    kind: 'signature-conflict',
    existing,
    reason: `${destination.name} already declares ${method.name}() with a different signature`,
  };
}
