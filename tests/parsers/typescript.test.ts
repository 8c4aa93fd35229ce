import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  buildModelFromSources,
  buildSourceModel,
  DiskPackageLocator,
  packageOfSpecifier,
  resolveModuleFile,
} from '../../src/parsers/typescript.js';
import { classNamed, methodOf, modelOf } from '../helpers/model.js';

describe('TypeScriptModelBuilder', () => {
  describe('classes', () => {
    it('records names, flags and the raw heritage clauses', () => {
      const model = modelOf({
        'src/shapes.ts': `@Entity()
export default abstract class Shape<T extends object> extends Base<T> implements Drawable, Named {}

class Base<T> {}
`,
      });

      const shape = classNamed(model, 'Shape');
      expect(shape.qualifiedName).toBe('src/shapes#Shape');
      expect(shape.isAbstract).toBe(true);
      expect(shape.isExported).toBe(true);
      expect(shape.isDefaultExport).toBe(true);
      expect(shape.decorators).toEqual(['@Entity()']);
      expect(shape.typeParameters).toBe('<T extends object>');
      expect(shape.typeParameterNames).toEqual(['T']);
      expect(shape.extendsText).toBe('Base<T>');
      expect(shape.implementsText).toBe('Drawable, Named');
      expect(model.superclassOf(shape)?.name).toBe('Base');
      expect(classNamed(model, 'Base').isExported).toBe(false);
    });

    it('resolves superclasses imported from other files, in any order', () => {
      const model = modelOf({
        'src/dog.ts': `import Animal from './animal.js';\nexport class Dog extends Animal {}\n`,
        'src/cat.ts': `import { Animal as Pet } from './animal';\nexport class Cat extends Pet {}\n`,
        'src/animal.ts': `export default class Animal {}\n`,
      });

      expect(model.superclassOf(classNamed(model, 'Dog'))?.qualifiedName).toBe('src/animal#Animal');
      expect(model.superclassOf(classNamed(model, 'Cat'))).toBeUndefined();
    });

    it('keeps the text of a superclass outside the sources', () => {
      const model = modelOf({
        'src/emitter.ts': `import { EventEmitter } from 'node:events';\nexport class Bus extends EventEmitter {}\n`,
      });

      const bus = classNamed(model, 'Bus');
      expect(bus.superclass).toBeNull();
      expect(bus.extendsText).toBe('EventEmitter');
    });

    it('resolves superclasses from another workspace package by name', () => {
      const model = modelOf(
        {
          'packages/core/src/base.ts': `export class Base {}\n`,
          'packages/app/src/feature.ts': `import { Base } from '@demo/core/base';\nexport class Feature extends Base {}\n`,
        },
        [
          { root: '/project/packages/core', name: '@demo/core', version: '2.0.0' },
          { root: '/project/packages/app', name: '@demo/app', version: '1.0.0' },
        ]
      );

      expect(model.superclassOf(classNamed(model, 'Feature'))?.name).toBe('Base');
    });

    it('records the class and member indentation', () => {
      const model = modelOf({
        'src/nested.ts': `namespace Outer {
    export class Inner {
        run(): void {}
    }
}
export class Empty {}
`,
      });

      expect(model.allClasses().map(c => c.name)).toEqual(['Empty']);
      const empty = classNamed(model, 'Empty');
      expect(empty.indent).toBe('');
      expect(empty.memberIndent).toBe('  ');
    });

    it('finds duplicate simple names by discovery order and by qualified name', () => {
      const model = modelOf({
        'src/a/item.ts': 'export class Item {}\n',
        'src/b/item.ts': 'export class Item {}\n',
      });

      expect(model.findClass('Item')?.qualifiedName).toBe('src/a/item#Item');
      expect(model.findClass('src/b/item#Item')?.filePath).toBe('/project/src/b/item.ts');
      expect(model.findClass('./src/b/item.ts#Item')?.filePath).toBe('/project/src/b/item.ts');
    });
  });

  describe('methods', () => {
    const model = modelOf({
      'src/service.ts': `export abstract class Service {
  /**
   * Loads everything.
   */
  public async load(id: string, retries = 3): Promise<void> {
    await this.fetch(id);
  }

  protected abstract fetch(id: string): Promise<string>;

  /** @internal */
  reset(): void {}

  private static create(): void {}

  format(value: number): string;
  format(value: string): string;
  format(value: number | string): string {
    return String(value);
  }

  pick<K extends string>(...keys: K[]): K[] {
    return keys;
  }

  @Memo()
  override toString(): string {
    return 'service';
  }
}
`,
    });

    it('reads modifiers and visibility', () => {
      const load = methodOf(model, 'Service', 'load');
      expect(load.visibility).toBe('public');
      expect(load.explicitPublic).toBe(true);
      expect(load.isAsync).toBe(true);
      expect(load.returnType).toBe('Promise<void>');

      const fetch = methodOf(model, 'Service', 'fetch');
      expect(fetch.visibility).toBe('protected');
      expect(fetch.isAbstract).toBe(true);
      expect(fetch.body).toBeNull();

      expect(methodOf(model, 'Service', 'reset').visibility).toBe('package-private');

      const create = methodOf(model, 'Service', 'create');
      expect(create.visibility).toBe('private');
      expect(create.isStatic).toBe(true);

      const toString = methodOf(model, 'Service', 'toString');
      expect(toString.isOverride).toBe(true);
      expect(toString.decorators).toEqual(['@Memo()']);
    });

    it('reads parameters with their written text', () => {
      const load = methodOf(model, 'Service', 'load');
      expect(load.parameters).toEqual([
        { name: 'id', type: 'string', text: 'id: string' },
        { name: 'retries', type: 'number', text: 'retries = 3' },
      ]);

      const pick = methodOf(model, 'Service', 'pick');
      expect(pick.typeParameters).toBe('<K extends string>');
      expect(pick.parameters).toEqual([{ name: 'keys', type: 'K[]', text: '...keys: K[]' }]);
    });

    it('keeps docs and re-bases the body to the member indentation', () => {
      const load = methodOf(model, 'Service', 'load');
      expect(load.docs).toBe('/**\n * Loads everything.\n */');
      expect(load.body).toBe('{\n  await this.fetch(id);\n}');
    });

    it('attaches overload signatures to their implementation', () => {
      const format = methodOf(model, 'Service', 'format');
      expect(format.overloads).toEqual(['format(value: number): string', 'format(value: string): string']);
      expect(model.methodsOf(classNamed(model, 'Service')).filter(m => m.name === 'format')).toHaveLength(1);
    });

    it('falls back to any for a missing return type when inference is off', () => {
      const bare = modelOf({ 'src/x.ts': 'export class X {\n  run() {\n    return 1;\n  }\n}\n' });
      const run = methodOf(bare, 'X', 'run');
      expect(run.returnType).toBe('any');
      expect(run.returnTypeIsExplicit).toBe(false);
    });
  });

  describe('fields and opaque members', () => {
    const model = modelOf({
      'src/account.ts': `export class Account {
  static count = 0;
  readonly id: string;
  balance = 0;
  label = \`acct\`;
  owner?: string;
  ready!: boolean;
  private ledger = new Ledger();
  #pin = 1234;

  constructor(id: string, protected readonly bank: string, public branch = 'main') {
    this.id = id;
  }

  get summary(): string {
    return this.id;
  }

  [key: string]: unknown;
}
`,
    });
    const account = classNamed(model, 'Account');
    const field = (name: string) => model.fieldsOf(account).find(f => f.name === name);

    it('reads field flags and infers simple initializer types', () => {
      expect(field('count')?.isStatic).toBe(true);
      expect(field('id')?.isReadonly).toBe(true);
      expect(field('balance')?.type).toBe('number');
      expect(field('balance')?.typeIsExplicit).toBe(false);
      expect(field('label')?.type).toBe('string');
      expect(field('owner')?.isOptional).toBe(true);
      expect(field('ready')?.isDefinite).toBe(true);
      expect(field('ledger')?.type).toBe('Ledger');
      expect(field('ledger')?.visibility).toBe('private');
    });

    it('turns constructor parameter properties into fields', () => {
      expect(field('bank')).toMatchObject({
        visibility: 'protected',
        isReadonly: true,
        isParameterProperty: true,
        type: 'string',
      });
      expect(field('branch')).toMatchObject({ visibility: 'public', explicitPublic: true, type: 'string' });
      expect(account.constructorParameters?.map(p => p.name)).toEqual(['id', 'bank', 'branch']);
    });

    it('keeps constructors, accessors, index signatures and #private fields opaque', () => {
      const opaque = account.members.flatMap(ref => (ref.kind === 'opaque' ? [ref.name] : []));
      expect(opaque).toEqual(['#pin', null, 'summary', null]);
      expect(model.accessorsOf(account)).toEqual(['#pin', 'summary']);
    });
  });

  describe('file facts', () => {
    const model = modelOf({
      'src/facts.ts': `import Default, { a, b as c } from './a.js';
import type { T } from './t.js';
import * as ns from 'lib';

export interface Shown {}
interface Hidden {}
type Alias = string;
export const value = 1;
function helper(x: Shown): void {}
export { Alias };
`,
    });
    const file = model.getFile('/project/src/facts.ts');

    it('records import bindings', () => {
      expect(file?.imports).toEqual([
        { localName: 'Default', importedName: 'default', specifier: './a.js', typeOnly: false },
        { localName: 'a', importedName: 'a', specifier: './a.js', typeOnly: false },
        { localName: 'c', importedName: 'b', specifier: './a.js', typeOnly: false },
        { localName: 'T', importedName: 'T', specifier: './t.js', typeOnly: true },
        { localName: 'ns', importedName: '*', specifier: 'lib', typeOnly: false },
      ]);
    });

    it('records top-level declarations and whether they are exported', () => {
      expect(Object.fromEntries(file?.declarations ?? [])).toEqual({
        Shown: { exported: true },
        Hidden: { exported: false },
        Alias: { exported: true },
        value: { exported: true },
        helper: { exported: false },
      });
    });

    it('records top-level function parameters', () => {
      expect(file?.functions.get('helper')).toEqual([{ name: 'x', type: 'Shown', text: 'x: Shown' }]);
    });
  });

  describe('type inference', () => {
    it('fills in missing return and field types with the checker', () => {
      const model = buildModelFromSources(
        [
          {
            filePath: '/project/src/infer.ts',
            content: `export class Counter {
  total = [1, 2].length;

  next() {
    return this.total + 1;
  }

  names() {
    return ['a'];
  }
}
`,
          },
        ],
        { rootDir: '/project' }
      );

      expect(methodOf(model, 'Counter', 'next').returnType).toBe('number');
      expect(methodOf(model, 'Counter', 'names').returnType).toBe('string[]');
      expect(model.fieldsOf(classNamed(model, 'Counter'))[0]?.type).toBe('number');
    });
  });
});

describe('buildSourceModel', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hoist-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('discovers TypeScript files under the roots and skips ignored ones', async () => {
    fs.mkdirSync(path.join(tempDir, 'src', 'nested'), { recursive: true });
    fs.mkdirSync(path.join(tempDir, 'src', 'generated'), { recursive: true });
    fs.writeFileSync(path.join(tempDir, 'src', 'a.ts'), 'export class A {}\n');
    fs.writeFileSync(path.join(tempDir, 'src', 'nested', 'b.tsx'), 'export class B {}\n');
    fs.writeFileSync(path.join(tempDir, 'src', 'types.d.ts'), 'declare class D {}\n');
    fs.writeFileSync(path.join(tempDir, 'src', 'generated', 'g.ts'), 'export class G {}\n');
    fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({ name: 'demo', version: '0.3.0' }));

    const model = await buildSourceModel(['src', 'missing'], { rootDir: tempDir, ignore: ['**/generated/**'] });

    expect(model.allClasses().map(c => c.qualifiedName)).toEqual(['src/a#A', 'src/nested/b#B']);
    expect(model.getFile(path.join(tempDir, 'src', 'a.ts'))?.package).toEqual({
      root: tempDir,
      name: 'demo',
      version: '0.3.0',
    });
  });
});

describe('DiskPackageLocator', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hoist-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('finds the nearest package.json', () => {
    const inner = path.join(tempDir, 'packages', 'core');
    fs.mkdirSync(path.join(inner, 'src'), { recursive: true });
    fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({ name: 'root' }));
    fs.writeFileSync(path.join(inner, 'package.json'), JSON.stringify({ name: '@demo/core', version: '1.0.0' }));

    const locator = new DiskPackageLocator();
    expect(locator.locate(path.join(inner, 'src', 'x.ts'))).toEqual({ root: inner, name: '@demo/core', version: '1.0.0' });
    expect(locator.locate(path.join(tempDir, 'tools', 'y.ts'))).toEqual({ root: tempDir, name: 'root', version: null });
  });

  it('treats an unreadable manifest as an unnamed package', () => {
    fs.writeFileSync(path.join(tempDir, 'package.json'), '{ not json');
    expect(new DiskPackageLocator().locate(path.join(tempDir, 'x.ts'))).toEqual({ root: tempDir, name: null, version: null });
  });
});

describe('module helpers', () => {
  it('resolves relative specifiers to model files', () => {
    const model = modelOf({
      'src/a.ts': 'export class A {}\n',
      'src/lib/index.ts': 'export class L {}\n',
    });

    expect(resolveModuleFile(model, '/project/src/b.ts', './a.js')).toBe('/project/src/a.ts');
    expect(resolveModuleFile(model, '/project/src/b.ts', './lib')).toBe('/project/src/lib/index.ts');
    expect(resolveModuleFile(model, '/project/src/b.ts', './missing.js')).toBeUndefined();
    expect(resolveModuleFile(model, '/project/src/b.ts', 'lodash')).toBeUndefined();
  });

  it('takes the package part of a bare specifier', () => {
    expect(packageOfSpecifier('@demo/core/sub/path')).toBe('@demo/core');
    expect(packageOfSpecifier('lodash/get')).toBe('lodash');
  });
});
