import type { HierarchyNavigator } from '../../graph/hierarchy.js';
import type { SourceModel } from '../../graph/model.js';
import type { ClassNode, MemberId, MemberNode } from '../../graph/types.js';
import { walkBody, walkExpression, type BodyVisitor } from '../../parsers/body.js';
import type { DependencyFinding, DependencyOwner } from '../types.js';

export interface DependencyReport {
  /** Origin- and intermediate-owned members, in order of first use */
  findings: DependencyFinding[];
  /** Members that are used but can never move (accessors, `#private`) */
  unsupported: string[];
}

export interface DependencyScope {
  /** Class the analyzed code is declared in */
  origin: ClassNode;
  destination: ClassNode;
  /** Member being moved; references to itself are not dependencies */
  self: MemberId | null;
}

/**
 * Find the members a method body uses that live on the origin or on a class
 * between the origin and the destination. Only those have to travel.
 */
export function analyzeDependencies(
  model: SourceModel,
  navigator: HierarchyNavigator,
  body: string | null,
  scope: DependencyScope
): DependencyReport {
  const report: DependencyReport = { findings: [], unsupported: [] };
  if (body === null) return report;

  walkBody(body, collector(model, navigator, scope, report));
  return report;
}

/** Same as analyzeDependencies, for a field initializer */
export function analyzeInitializer(
  model: SourceModel,
  navigator: HierarchyNavigator,
  initializer: string | null,
  scope: DependencyScope
): DependencyReport {
  const report: DependencyReport = { findings: [], unsupported: [] };
  if (initializer === null) return report;

  walkExpression(initializer, collector(model, navigator, scope, report));
  return report;
}

/** Classify a declaring class relative to the origin and destination */
export function classifyOwner(
  navigator: HierarchyNavigator,
  owner: ClassNode,
  origin: ClassNode,
  destination: ClassNode
): DependencyOwner {
  if (owner.id === origin.id) return 'origin';
  return navigator.pathBetween(origin, destination).some(c => c.id === owner.id) ? 'intermediate' : 'irrelevant';
}

/**
 * First declaration of an instance member named `name`, searching `start`
 * and then its ancestors.
 */
export function lookupMember(
  model: SourceModel,
  navigator: HierarchyNavigator,
  start: ClassNode,
  name: string
): { member: MemberNode; owner: ClassNode } | { accessor: string; owner: ClassNode } | null {
  for (const cls of [start, ...navigator.ancestorsOf(start)]) {
    const method = model.methodsOf(cls).find(m => m.name === name && !m.isStatic);
    if (method) return { member: { kind: 'method', node: method }, owner: cls };

    const field = model.fieldsOf(cls).find(f => f.name === name && !f.isStatic);
    if (field) return { member: { kind: 'field', node: field }, owner: cls };

    if (model.accessorsOf(cls).includes(name)) return { accessor: name, owner: cls };
  }
  return null;
}

function collector(
  model: SourceModel,
  navigator: HierarchyNavigator,
  scope: DependencyScope,
  report: DependencyReport
): BodyVisitor {
  const seen = new Set<MemberId>();
  const noted = new Set<string>();

  const record = (start: ClassNode | undefined, name: string): void => {
    if (!start) return;
    const found = lookupMember(model, navigator, start, name);
    if (!found) return;

    const owner = classifyOwner(navigator, found.owner, scope.origin, scope.destination);
    if (owner === 'irrelevant') return;

    if ('accessor' in found) {
      const note = name.startsWith('#')
        ? `${found.owner.name}.${name} is an ECMAScript private member and cannot be moved`
        : `Accessor ${found.owner.name}.${name} is not moved; the pulled-up code still uses it`;
      if (!noted.has(note)) {
        noted.add(note);
        report.unsupported.push(note);
      }
      return;
    }

    const node = found.member.node;
    if (node.id === scope.self || seen.has(node.id)) return;
    seen.add(node.id);

    const kind = found.member.kind === 'method' ? 'Method' : 'Field';
    report.findings.push({
      member: found.member,
      owner,
      issue: node.visibility === 'private' ? `${kind} ${node.name} is private in ${found.owner.name}` : null,
    });
  };

  return {
    onMemberAccess: access => record(scope.origin, access.name),
    onSuperAccess: access => record(model.superclassOf(scope.origin), access.name),
  };
}
