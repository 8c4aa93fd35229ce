import { describe, it, expect } from 'vitest';
import { HierarchyNavigator } from '../../../src/graph/hierarchy.js';
import { checkConflict, sameSignature } from '../../../src/refactor/operations/conflicts.js';
import { classNamed, methodOf, modelOf } from '../../helpers/model.js';

const source = `export class Food {}
export class Kibble extends Food {}

export class Animal {
  private _mood = 'calm';

  get mood(): string {
    return this._mood;
  }

  eat(food: Food): void {
    console.log(food);
  }

  rest(hours: number): void {
    console.log(hours);
  }
}

export class Dog extends Animal {
  eat(food: Kibble): void {
    console.log(food);
  }

  rest(hours: number): void {
    console.log( hours );
  }

  mood(): string {
    return 'happy';
  }

  _mood(): void {}

  fetch(): void {}
}

export class Cat extends Animal {
  rest(hours: number): void {
    console.log(hours * 2);
  }

  eat(food: Food, extra: Food): void {
    console.log(food, extra);
  }
}
`;

describe('checkConflict', () => {
  const model = modelOf({ 'src/pets.ts': source });
  const navigator = new HierarchyNavigator(model);
  const animal = classNamed(model, 'Animal');
  const check = (cls: string, name: string) => checkConflict(model, navigator, methodOf(model, cls, name), animal);

  it('is clear when the destination has no member of that name', () => {
    expect(check('Dog', 'fetch')).toEqual({ kind: 'clear' });
  });

  it('reports an identical method as a duplicate', () => {
    const outcome = check('Dog', 'rest');
    expect(outcome.kind).toBe('duplicate');
  });

  it('reports the same signature with another body as a conflict', () => {
    expect(check('Cat', 'rest')).toMatchObject({
      kind: 'signature-conflict',
      reason: 'Animal.rest() has the same signature and a different body',
    });
  });

  it('reports related parameter types as an overload ambiguity', () => {
    const outcome = check('Dog', 'eat');
    expect(outcome.kind).toBe('overload-ambiguity');
  });

  it('reports a different arity as a conflict', () => {
    expect(check('Cat', 'eat')).toMatchObject({
      kind: 'signature-conflict',
      reason: 'Animal already declares eat() with a different signature',
    });
  });

  it('conflicts with a same-named accessor or field', () => {
    expect(check('Dog', 'mood')).toEqual({
      kind: 'signature-conflict',
      existing: null,
      reason: 'Animal has an accessor named mood',
    });
    expect(check('Dog', '_mood')).toMatchObject({
      kind: 'signature-conflict',
      reason: 'Animal has a field named _mood',
    });
  });
});

describe('sameSignature', () => {
  const model = modelOf({ 'src/pets.ts': source });

  it('compares names and parameter types', () => {
    expect(sameSignature(methodOf(model, 'Dog', 'rest'), methodOf(model, 'Cat', 'rest'))).toBe(true);
    expect(sameSignature(methodOf(model, 'Dog', 'eat'), methodOf(model, 'Animal', 'eat'))).toBe(false);
  });
});
