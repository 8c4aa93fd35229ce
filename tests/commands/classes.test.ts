import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

const mockOra = {
  start: vi.fn().mockReturnThis(),
  succeed: vi.fn().mockReturnThis(),
  fail: vi.fn().mockReturnThis(),
  stop: vi.fn().mockReturnThis(),
  text: '',
};
vi.mock('ora', () => ({
  default: vi.fn(() => mockOra),
}));

const SHAPES = `import { Component } from 'ui-kit';

export abstract class Shape extends Component {
  protected abstract area(): number;
}

export class Square extends Shape {
  side = 1;

  area(): number {
    return this.side * this.side;
  }
}
`;

describe('query commands', () => {
  let tempDir: string;
  let originalCwd: string;
  let consoleLogs: string[];
  let consoleErrors: string[];
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogs = [];
    consoleErrors = [];

    originalCwd = process.cwd();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hoist-test-'));
    fs.mkdirSync(path.join(tempDir, 'src'));
    fs.writeFileSync(path.join(tempDir, 'src', 'shapes.ts'), SHAPES);
    process.chdir(tempDir);

    logSpy = vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      consoleLogs.push(args.join(' '));
    });
    errorSpy = vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      consoleErrors.push(args.join(' '));
    });
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    exitSpy.mockRestore();
    process.chdir(originalCwd);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('classesCommand', () => {
    it('lists classes with their supertypes', async () => {
      const { classesCommand } = await import('../../src/commands/classes.js');
      await classesCommand();

      const output = consoleLogs.join('\n');
      expect(output).toContain('Classes (2):');
      expect(output).toContain('src/shapes#Square');
      expect(output).toContain('extends src/shapes#Shape');
      expect(output).toContain('1 methods, 1 fields');
      expect(mockOra.stop).toHaveBeenCalled();
    });

    it('prints JSON', async () => {
      const { classesCommand } = await import('../../src/commands/classes.js');
      await classesCommand({ json: true });

      const parsed: unknown = JSON.parse(consoleLogs.join('\n'));
      expect(parsed).toEqual([
        {
          name: 'Shape',
          qualifiedName: 'src/shapes#Shape',
          filePath: 'src/shapes.ts',
          superclass: 'Component',
          isAbstract: true,
          methodCount: 1,
          fieldCount: 0,
        },
        {
          name: 'Square',
          qualifiedName: 'src/shapes#Square',
          filePath: 'src/shapes.ts',
          superclass: 'src/shapes#Shape',
          isAbstract: false,
          methodCount: 1,
          fieldCount: 1,
        },
      ]);
    });

    it('says so when the source roots hold no classes', async () => {
      const { classesCommand } = await import('../../src/commands/classes.js');
      await classesCommand({ source: ['empty'] });

      expect(consoleLogs.join('\n')).toContain('No classes found.');
    });
  });

  describe('methodsCommand', () => {
    it('lists signatures and flags', async () => {
      const { methodsCommand } = await import('../../src/commands/classes.js');
      await methodsCommand('Shape');

      const output = consoleLogs.join('\n');
      expect(output).toContain('Methods of Shape:');
      expect(output).toContain('area(): number');
      expect(output).toContain('protected abstract');
    });

    it('exits when the class is unknown', async () => {
      const { methodsCommand } = await import('../../src/commands/classes.js');
      await expect(methodsCommand('Circle')).rejects.toThrow('process.exit(1)');

      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(consoleErrors.join('\n')).toContain('Class Circle not found');
    });
  });

  describe('ancestorsCommand', () => {
    it('marks supertypes outside the scanned sources', async () => {
      const { ancestorsCommand } = await import('../../src/commands/classes.js');
      await ancestorsCommand('Square');

      const output = consoleLogs.join('\n');
      expect(output).toContain('Ancestors of Square, nearest first:');
      expect(output).toContain('src/shapes#Shape');
      expect(output).toContain('Component');
      expect(output).toContain('(not scanned)');
    });

    it('prints JSON', async () => {
      const { ancestorsCommand } = await import('../../src/commands/classes.js');
      await ancestorsCommand('Square', { json: true });

      const parsed: unknown = JSON.parse(consoleLogs.join('\n'));
      expect(parsed).toEqual(['src/shapes#Shape', 'Component']);
    });
  });
});
