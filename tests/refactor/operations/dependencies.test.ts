import { describe, it, expect } from 'vitest';
import { HierarchyNavigator } from '../../../src/graph/hierarchy.js';
import {
  analyzeDependencies,
  analyzeInitializer,
  classifyOwner,
  lookupMember,
} from '../../../src/refactor/operations/dependencies.js';
import { classNamed, methodOf, modelOf } from '../../helpers/model.js';

const source = `export class Base {
  protected shared = 0;

  describe(): string {
    return 'base';
  }
}

export class Middle extends Base {
  private level = 1;

  protected helper(): number {
    return this.level;
  }

  get label(): string {
    return 'middle';
  }
}

export class Leaf extends Middle {
  #secret = 3;
  private own = 2;

  compute(): number {
    const inner = function (this: unknown) {
      return this;
    };
    const arrow = () => this.own;
    return this.shared + this.level + this.helper() + arrow() + super.helper() + this.compute();
  }

  show(): string {
    return this.label + this.#secret + super.describe();
  }
}
`;

describe('analyzeDependencies', () => {
  const model = modelOf({ 'src/chain.ts': source });
  const navigator = new HierarchyNavigator(model);
  const base = classNamed(model, 'Base');
  const leaf = classNamed(model, 'Leaf');

  it('collects origin and intermediate members in order of first use', () => {
    const compute = methodOf(model, 'Leaf', 'compute');
    const report = analyzeDependencies(model, navigator, compute.body, { origin: leaf, destination: base, self: compute.id });

    expect(report.findings.map(f => [f.member.node.name, f.owner, f.issue])).toEqual([
      ['own', 'origin', 'Field own is private in Leaf'],
      ['level', 'intermediate', 'Field level is private in Middle'],
      ['helper', 'intermediate', null],
    ]);
    expect(report.unsupported).toEqual([]);
  });

  it('notes accessors and ECMAScript private members it cannot move', () => {
    const show = methodOf(model, 'Leaf', 'show');
    const report = analyzeDependencies(model, navigator, show.body, { origin: leaf, destination: base, self: show.id });

    expect(report.findings).toEqual([]);
    expect(report.unsupported).toEqual([
      'Accessor Middle.label is not moved; the pulled-up code still uses it',
      'Leaf.#secret is an ECMAScript private member and cannot be moved',
    ]);
  });

  it('ignores members of the destination itself', () => {
    const middle = classNamed(model, 'Middle');
    const compute = methodOf(model, 'Leaf', 'compute');
    const report = analyzeDependencies(model, navigator, compute.body, { origin: leaf, destination: middle, self: compute.id });

    expect(report.findings.map(f => f.member.node.name)).toEqual(['own']);
  });

  it('reports nothing for an abstract method', () => {
    const report = analyzeDependencies(model, navigator, null, { origin: leaf, destination: base, self: null });
    expect(report).toEqual({ findings: [], unsupported: [] });
  });
});

describe('analyzeInitializer', () => {
  it('finds members used by a field initializer', () => {
    const model = modelOf({
      'src/config.ts': `export class Base {}
export class Settings extends Base {
  private prefix = 'app';
  key = this.prefix + '.key';
}
`,
    });
    const navigator = new HierarchyNavigator(model);
    const settings = classNamed(model, 'Settings');

    const report = analyzeInitializer(model, navigator, "this.prefix + '.key'", {
      origin: settings,
      destination: classNamed(model, 'Base'),
      self: null,
    });

    expect(report.findings.map(f => f.member.node.name)).toEqual(['prefix']);
  });
});

describe('lookupMember and classifyOwner', () => {
  const model = modelOf({ 'src/chain.ts': source });
  const navigator = new HierarchyNavigator(model);

  it('searches the class and then its ancestors', () => {
    const found = lookupMember(model, navigator, classNamed(model, 'Leaf'), 'describe');
    expect(found && 'member' in found ? [found.owner.name, found.member.kind] : null).toEqual(['Base', 'method']);
    expect(lookupMember(model, navigator, classNamed(model, 'Leaf'), 'missing')).toBeNull();
  });

  it('places an owner relative to origin and destination', () => {
    const leaf = classNamed(model, 'Leaf');
    const base = classNamed(model, 'Base');
    expect(classifyOwner(navigator, leaf, leaf, base)).toBe('origin');
    expect(classifyOwner(navigator, classNamed(model, 'Middle'), leaf, base)).toBe('intermediate');
    expect(classifyOwner(navigator, base, leaf, base)).toBe('irrelevant');
  });
});
