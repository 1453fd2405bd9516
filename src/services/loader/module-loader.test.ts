/**
 * Tests for the module loader
 *
 * Fixture modules are written to the OS temp directory so the project's own
 * node_modules never satisfies a dependency check.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_DEPENDENCIES,
  ModuleLoader,
  createCatalog,
  createLoaderConfig,
  isClass,
  loadModule
} from './module-loader.js';
import { ConfigError, LoadError } from '../../core/errors.js';

let testCounter = 0;

const FIXTURE = `
export class Zeta {}
export class Alpha {}
export const value = 42;
export function helper() {}
export { Alpha as AlsoAlpha };
`;

describe('ModuleLoader', () => {
  let testDir: string;

  async function writeModule(name: string, source: string): Promise<string> {
    const modulePath = path.join(testDir, name);
    await fs.writeFile(modulePath, source, 'utf-8');
    return modulePath;
  }

  async function installPackage(name: string, manifest: Record<string, unknown>): Promise<string> {
    const directory = path.join(testDir, 'node_modules', name);
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(path.join(directory, 'package.json'), JSON.stringify(manifest), 'utf-8');
    return directory;
  }

  beforeEach(async () => {
    testDir = path.join(os.tmpdir(), `pipeline-kit-test-loader-${process.pid}-${++testCounter}`);
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('createLoaderConfig - unit tests', () => {
    it('should resolve the module path and apply default dependencies', () => {
      const config = createLoaderConfig('dist/pipelines.js', { cwd: testDir });

      expect(config).toEqual({
        modulePath: path.join(testDir, 'dist', 'pipelines.js'),
        dependencies: DEFAULT_DEPENDENCIES
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should reject an empty module path', () => {
      expect(() => createLoaderConfig('  ')).toThrow(ConfigError);
    });
  });

  describe('load - unit tests', () => {
    it('should catalog exported classes without duplicates', async () => {
      const modulePath = await writeModule('definitions.mjs', FIXTURE);
      const directory = await installPackage('fake-dep', { name: 'fake-dep', version: '1.2.3' });

      const catalog = await loadModule(createLoaderConfig(modulePath, { dependencies: ['fake-dep'] }));

      expect(catalog.moduleId).toBe('definitions.mjs');
      expect(catalog.entries.map(e => e.exportName).sort()).toEqual(['Alpha', 'Zeta']);
      expect(catalog.find('definitions.mjs#Zeta')?.exportName).toBe('Zeta');
      expect(catalog.dependencies).toEqual([{ name: 'fake-dep', version: '1.2.3', directory }]);
    });

    it('should fail when the module does not exist', async () => {
      const modulePath = path.join(testDir, 'missing.mjs');

      await expect(loadModule(createLoaderConfig(modulePath, { dependencies: [] })))
        .rejects.toThrow(`Module not found: ${modulePath}`);
    });

    it('should name a dependency that cannot be found', async () => {
      const modulePath = await writeModule('definitions.mjs', FIXTURE);
      const loader = new ModuleLoader(createLoaderConfig(modulePath, { dependencies: ['definitely-missing-dependency'] }));

      await expect(loader.load()).rejects.toThrow(LoadError);
      await expect(loader.load()).rejects.toThrow(
        `Failed to find dependency "definitely-missing-dependency" required by ${modulePath}. ` +
        'Make sure it is installed next to the module.'
      );
    });

    it('should reject a dependency whose package.json has no version', async () => {
      const modulePath = await writeModule('definitions.mjs', FIXTURE);
      await installPackage('broken-dep', { name: 'broken-dep' });

      await expect(loadModule(createLoaderConfig(modulePath, { dependencies: ['broken-dep'] })))
        .rejects.toThrow(/Dependency "broken-dep" at .* has an unreadable package.json/);
    });

    it('should wrap errors thrown while the module is evaluated', async () => {
      const modulePath = await writeModule('throwing.mjs', `throw new Error('kaboom');\n`);

      await expect(loadModule(createLoaderConfig(modulePath, { dependencies: [] })))
        .rejects.toThrow(LoadError);
      await expect(loadModule(createLoaderConfig(modulePath, { dependencies: [] })))
        .rejects.toThrow(/kaboom/);
    });

    it('should resolve dependencies once per loader', async () => {
      const modulePath = await writeModule('definitions.mjs', FIXTURE);
      await installPackage('fake-dep', { version: '0.1.0' });
      const loader = new ModuleLoader(createLoaderConfig(modulePath, { dependencies: ['fake-dep'] }));

      const first = await loader.resolveDependencies();
      await fs.rm(path.join(testDir, 'node_modules'), { recursive: true });

      expect(await loader.resolveDependencies()).toBe(first);
      expect((await loader.load()).size).toBe(2);
      expect((await loader.load()).size).toBe(2);
    });
  });

  describe('createCatalog - unit tests', () => {
    it('should list classes in the order the namespace enumerates them', () => {
      class Alpha {}
      class Zeta {}

      const catalog = createCatalog('mod.js', { Zeta, Alpha });

      expect(catalog.entries.map(e => e.exportName)).toEqual(['Zeta', 'Alpha']);
    });

    it('should skip non-class exports', () => {
      function plainFunction() {
        return 1;
      }
      class Definition {}

      const catalog = createCatalog('mod.js', { plainFunction, Definition, arrow: () => 2, count: 3 });

      expect(catalog.entries.map(e => e.qualifiedName)).toEqual(['mod.js#Definition']);
    });

    it('should keep the first export name of a class exported twice', () => {
      class Shared {}

      const catalog = createCatalog('mod.js', { First: Shared, Second: Shared });

      expect(catalog.size).toBe(1);
      expect(catalog.find('Second')).toBeUndefined();
      expect(catalog.find('First')?.type).toBe(Shared);
    });
  });

  describe('isClass - unit tests', () => {
    it('should tell classes from functions', () => {
      expect(isClass(class {})).toBe(true);
      expect(isClass(function named() {})).toBe(false);
      expect(isClass(() => undefined)).toBe(false);
      expect(isClass('class')).toBe(false);
    });
  });
});
