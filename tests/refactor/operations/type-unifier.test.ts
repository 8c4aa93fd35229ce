import { describe, it, expect } from 'vitest';
import { HierarchyNavigator } from '../../../src/graph/hierarchy.js';
import { sameType, unifyTypes } from '../../../src/refactor/operations/type-unifier.js';
import { modelOf } from '../../helpers/model.js';

describe('unifyTypes', () => {
  const model = modelOf({
    'src/zoo.ts': `export class Animal {}
export class Mammal extends Animal {}
export class Dog extends Mammal {}
export class Cat extends Mammal {}
export class Bird extends Animal {}
export class Stone {}
`,
  });
  const navigator = new HierarchyNavigator(model);

  it('returns the ancestor when one type is an ancestor of the other', () => {
    expect(unifyTypes(model, navigator, 'Animal', ['Dog'])).toEqual({ type: 'Animal', widenedToTop: false });
    expect(unifyTypes(model, navigator, 'Dog', ['Animal'])).toEqual({ type: 'Animal', widenedToTop: false });
  });

  it('finds the nearest common ancestor of siblings', () => {
    expect(unifyTypes(model, navigator, 'Dog', ['Cat'])).toEqual({ type: 'Mammal', widenedToTop: false });
    expect(unifyTypes(model, navigator, 'Dog', ['Cat', 'Bird'])).toEqual({ type: 'Animal', widenedToTop: false });
  });

  it('widens to unknown when nothing below the top is shared', () => {
    expect(unifyTypes(model, navigator, 'Dog', ['Stone'])).toEqual({ type: 'unknown', widenedToTop: true });
    expect(unifyTypes(model, navigator, 'string', ['number'])).toEqual({ type: 'unknown', widenedToTop: true });
  });

  it('keeps the seed when every other type already fits', () => {
    expect(unifyTypes(model, navigator, 'string', ['string', 'never'])).toEqual({ type: 'string', widenedToTop: false });
    expect(unifyTypes(model, navigator, 'number', [])).toEqual({ type: 'number', widenedToTop: false });
  });

  it('never narrows once widened', () => {
    expect(unifyTypes(model, navigator, 'Dog', ['Stone', 'Cat'])).toEqual({ type: 'unknown', widenedToTop: true });
  });
});

describe('sameType', () => {
  it('ignores whitespace differences', () => {
    expect(sameType('Array< string >', 'Array<string>')).toBe(true);
    expect(sameType('string', 'String')).toBe(false);
  });
});
