import { describe, it, expect } from 'vitest';
import {
  bodyTypeTexts,
  normalizeBody,
  typeParameterNames,
  typeReferences,
  walkBody,
  walkExpression,
  type CallTarget,
  type MemberAccess,
  type SuperAccess,
} from '../../src/parsers/body.js';

describe('walkBody', () => {
  it('reports this member accesses with their call shape and span', () => {
    const body = '{\n  return this.size + this.grow(1, 2);\n}';
    const accesses: MemberAccess[] = [];
    walkBody(body, { onMemberAccess: access => accesses.push(access) });

    expect(accesses.map(a => [a.name, a.isCall, a.argumentCount])).toEqual([
      ['size', false, 0],
      ['grow', true, 2],
    ]);
    const [size] = accesses;
    expect(size && body.slice(size.start, size.end)).toBe('this.size');
  });

  it('reports super accesses and the statement a lone call stands in', () => {
    const body = '{\n  super.init();\n  const n = super.count() + 1;\n  await super.flush();\n}';
    const accesses: SuperAccess[] = [];
    walkBody(body, { onSuperAccess: access => accesses.push(access) });

    expect(accesses.map(a => a.name)).toEqual(['init', 'count', 'flush']);
    const [init, count, flush] = accesses;
    expect(init?.statement && body.slice(init.statement.start, init.statement.end)).toBe('super.init();');
    expect(count?.statement).toBeNull();
    expect(flush?.statement && body.slice(flush.statement.start, flush.statement.end)).toBe('await super.flush();');
  });

  it('classifies what a this argument is passed to', () => {
    const body = `{
  register(this);
  new Tracker(1, this);
  this.attach(this);
  super.attach(this);
  Registry.add(this);
  list[0](this);
}`;
    const callees: Array<[CallTarget, number]> = [];
    walkBody(body, { onSelfArgument: argument => callees.push([argument.callee, argument.index]) });

    expect(callees).toEqual([
      [{ kind: 'function', name: 'register' }, 0],
      [{ kind: 'constructor', className: 'Tracker' }, 1],
      [{ kind: 'this-member', name: 'attach' }, 0],
      [{ kind: 'super-member', name: 'attach' }, 0],
      [{ kind: 'static', className: 'Registry', name: 'add' }, 0],
      [{ kind: 'other' }, 0],
    ]);
  });

  it('reports annotated locals with the span of the annotation', () => {
    const body = '{\n  const a: Dog = make();\n  let b = 2;\n}';
    const found: Array<[string, string, string]> = [];
    walkBody(body, {
      onLocalAnnotation: local => found.push([local.name, local.type, body.slice(local.start, local.end)]),
    });

    expect(found).toEqual([['a', 'Dog', 'Dog']]);
  });

  it('skips functions that rebind this but walks arrow functions', () => {
    const body = `{
  const f = function () { return this.hidden; };
  class Inner { run() { return this.alsoHidden; } }
  const g = () => this.visible;
}`;
    const names: string[] = [];
    walkBody(body, { onMemberAccess: access => names.push(access.name) });

    expect(names).toEqual(['visible']);
  });
});

describe('walkExpression', () => {
  it('walks an initializer expression', () => {
    const names: string[] = [];
    walkExpression('this.base * 2', { onMemberAccess: access => names.push(access.name) });
    expect(names).toEqual(['base']);
  });
});

describe('typeReferences', () => {
  it('lists the leftmost name of every reference once', () => {
    expect(typeReferences('Map<Key, ns.Value> | Key[]')).toEqual(['Map', 'Key', 'ns']);
  });

  it('skips keywords and literal types', () => {
    expect(typeReferences("string | null | 'on' | 42")).toEqual([]);
  });

  it('leaves out type parameters declared inside the annotation', () => {
    expect(typeReferences('<T>(value: T) => Result<T>')).toEqual(['Result']);
  });

  it('includes typeof queries', () => {
    expect(typeReferences('typeof defaults')).toEqual(['defaults']);
  });
});

describe('bodyTypeTexts', () => {
  it('collects annotations, casts, type arguments and constructed classes', () => {
    const body = `{
  const a: Map<string, Key> = new Map();
  const b = value as Secret;
  const c = make<Item>();
  return new Helper(function () {
    const d: Inner = 1;
  });
}`;

    expect(bodyTypeTexts(body)).toEqual(['Map<string, Key>', 'Map', 'Secret', 'Item', 'Helper', 'Inner']);
  });

  it('returns nothing for an untyped body', () => {
    expect(bodyTypeTexts('{\n  return this.count + 1;\n}')).toEqual([]);
  });
});

describe('typeParameterNames', () => {
  it('reads the declared names', () => {
    expect(typeParameterNames('<T, K extends keyof T = keyof T>')).toEqual(['T', 'K']);
  });
});

describe('normalizeBody', () => {
  it('ignores whitespace and comments', () => {
    const a = '{\n  // says hi\n  return greet( name ) ;\n}';
    const b = '{ /* inline */ return greet(name); }';
    expect(normalizeBody(a)).toBe(normalizeBody(b));
    expect(normalizeBody(a)).toBe('{return greet(name);}');
  });

  it('keeps string contents that look like URLs', () => {
    expect(normalizeBody("{ return 'http://example.test'; }")).toBe("{return 'http://example.test';}");
  });

  it('treats a missing body as empty', () => {
    expect(normalizeBody(null)).toBe('');
  });
});
