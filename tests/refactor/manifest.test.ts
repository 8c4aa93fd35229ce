import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { planManifestChanges } from '../../src/refactor/manifest.js';
import { buildModelFromSources, DiskPackageLocator } from '../../src/parsers/typescript.js';

describe('planManifestChanges', () => {
  let tempDir: string;
  let corePath: string;
  let appPath: string;

  const writeManifest = (dir: string, manifest: object): void => {
    fs.mkdirSync(path.join(dir, 'src'), { recursive: true });
    fs.writeFileSync(path.join(dir, 'package.json'), JSON.stringify(manifest, null, 2) + '\n');
  };

  const buildModel = () =>
    buildModelFromSources(
      [
        { filePath: corePath, content: 'export class Base {}\n' },
        { filePath: appPath, content: 'export class Feature {}\n' },
      ],
      { rootDir: tempDir, inferTypes: false, packages: new DiskPackageLocator() }
    );

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hoist-test-'));
    corePath = path.join(tempDir, 'packages', 'core', 'src', 'base.ts');
    appPath = path.join(tempDir, 'packages', 'app', 'src', 'feature.ts');
    writeManifest(path.join(tempDir, 'packages', 'core'), { name: '@demo/core', version: '2.1.0' });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('declares a workspace package the rewritten file now imports', () => {
    writeManifest(path.join(tempDir, 'packages', 'app'), {
      name: '@demo/app',
      version: '1.0.0',
      dependencies: { zod: '^3.0.0' },
    });

    const changes = planManifestChanges(buildModel(), [
      {
        filePath: appPath,
        content: "import { Base } from '@demo/core';\nimport { z } from 'zod';\nexport class Feature extends Base {}\n",
      },
    ]);

    expect(changes).toHaveLength(1);
    expect(changes[0]?.packageName).toBe('@demo/app');
    expect(changes[0]?.added).toEqual({ '@demo/core': '^2.1.0' });
    expect(changes[0]?.newContent).toBe(
      JSON.stringify(
        { name: '@demo/app', version: '1.0.0', dependencies: { '@demo/core': '^2.1.0', zod: '^3.0.0' } },
        null,
        2
      ) + '\n'
    );
  });

  it('leaves packages that already declare the dependency alone', () => {
    writeManifest(path.join(tempDir, 'packages', 'app'), {
      name: '@demo/app',
      devDependencies: { '@demo/core': 'workspace:*' },
    });

    const changes = planManifestChanges(buildModel(), [
      { filePath: appPath, content: "import { Base } from '@demo/core/base';\n" },
    ]);

    expect(changes).toEqual([]);
  });

  it('ignores imports within the same package and of unknown packages', () => {
    writeManifest(path.join(tempDir, 'packages', 'app'), { name: '@demo/app', version: '1.0.0' });

    const changes = planManifestChanges(buildModel(), [
      { filePath: corePath, content: "import { x } from '@demo/core';\nimport { y } from 'left-pad';\n" },
      { filePath: appPath, content: "import { readFileSync } from 'node:fs';\n" },
    ]);

    expect(changes).toEqual([]);
  });
});
