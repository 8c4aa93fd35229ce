import { describe, it, expect } from 'vitest';
import { listAncestors, listClasses, listMethods } from '../../src/refactor/queries.js';
import { modelOf } from '../helpers/model.js';

const model = modelOf({
  'src/shapes.ts': `import { Component } from 'ui-kit';

export abstract class Shape extends Component {
  protected abstract area(): number;

  static create(): void {}
}

export class Square extends Shape {
  side = 1;

  area(): number {
    return this.side * this.side;
  }

  scale<T>(factor: number, label: T): T {
    return label;
  }
}
`,
});

describe('listClasses', () => {
  it('summarizes every class in discovery order', () => {
    expect(listClasses(model)).toEqual([
      {
        name: 'Shape',
        qualifiedName: 'src/shapes#Shape',
        filePath: 'src/shapes.ts',
        superclass: 'Component',
        isAbstract: true,
        methodCount: 2,
        fieldCount: 0,
      },
      {
        name: 'Square',
        qualifiedName: 'src/shapes#Square',
        filePath: 'src/shapes.ts',
        superclass: 'src/shapes#Shape',
        isAbstract: false,
        methodCount: 2,
        fieldCount: 1,
      },
    ]);
  });
});

describe('listMethods', () => {
  it('prints signatures from parameter types', () => {
    expect(listMethods(model, 'Square')).toEqual([
      { name: 'area', signature: 'area(): number', visibility: 'public', isAbstract: false, isStatic: false },
      { name: 'scale', signature: 'scale<T>(number, T): T', visibility: 'public', isAbstract: false, isStatic: false },
    ]);
    expect(listMethods(model, 'Shape')?.map(m => [m.name, m.visibility, m.isAbstract, m.isStatic])).toEqual([
      ['area', 'protected', true, false],
      ['create', 'public', false, true],
    ]);
  });

  it('returns null for an unknown class', () => {
    expect(listMethods(model, 'Circle')).toBeNull();
  });
});

describe('listAncestors', () => {
  it('lists ancestors nearest first and ends with an external supertype', () => {
    expect(listAncestors(model, 'Square')).toEqual(['src/shapes#Shape', 'Component']);
    expect(listAncestors(model, 'Shape')).toEqual(['Component']);
    expect(listAncestors(model, 'Circle')).toBeNull();
  });
});
