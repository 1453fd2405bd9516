/**
 * Module Loader
 *
 * Imports a compiled ES module and turns its exports into a catalog of classes.
 * Before importing, checks that the packages the module needs at run time can be
 * resolved from the module's own directory, the same way Node will resolve them.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createRequire } from 'module';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { ConfigError, LoadError, errorMessage } from '../../core/errors.js';

/**
 * Packages every definitions module needs: the YAML serializer and this library
 */
export const DEFAULT_DEPENDENCIES: readonly string[] = ['yaml', 'pipeline-kit'];

/**
 * Explicit loader settings, built once per run and never mutated
 */
export interface LoaderConfig {
  /** Absolute path of the compiled module */
  readonly modulePath: string;
  /** Packages that must be resolvable from the module's directory */
  readonly dependencies: readonly string[];
}

export interface LoaderOptions {
  dependencies?: readonly string[];
  cwd?: string;
}

export function createLoaderConfig(modulePath: string, options: LoaderOptions = {}): LoaderConfig {
  if (!modulePath || modulePath.trim() === '') {
    throw new ConfigError('Module path is required. Pass it as an argument or set "module" in config.yaml');
  }

  return Object.freeze({
    modulePath: path.resolve(options.cwd ?? process.cwd(), modulePath),
    dependencies: Object.freeze([...(options.dependencies ?? DEFAULT_DEPENDENCIES)])
  });
}

/**
 * Where an auxiliary package was found
 */
export interface ResolvedDependency {
  name: string;
  version: string;
  directory: string;
}

/**
 * An exported class. Whether it really takes no arguments is checked at instantiation.
 */
export type CatalogClass = (new () => unknown) & { readonly name: string };

export interface CatalogEntry {
  exportName: string;
  /** `<module file>#<export name>` */
  qualifiedName: string;
  type: CatalogClass;
}

/**
 * Queryable list of the classes a module exports
 */
export class TypeCatalog {
  constructor(
    readonly moduleId: string,
    readonly entries: readonly CatalogEntry[],
    readonly dependencies: readonly ResolvedDependency[] = []
  ) {}

  get size(): number {
    return this.entries.length;
  }

  /**
   * Looks a class up by export name or qualified name
   */
  find(name: string): CatalogEntry | undefined {
    return this.entries.find(e => e.exportName === name || e.qualifiedName === name);
  }

  [Symbol.iterator](): Iterator<CatalogEntry> {
    return this.entries[Symbol.iterator]();
  }
}

export function isClass(value: unknown): value is CatalogClass {
  return typeof value === 'function' && /^class[\s{]/.test(Function.prototype.toString.call(value));
}

/**
 * Builds a catalog from a module namespace (or any record of exports).
 * A class exported under several names is listed once, under the first name seen.
 */
export function createCatalog(
  moduleId: string,
  namespace: Record<string, unknown>,
  dependencies: readonly ResolvedDependency[] = []
): TypeCatalog {
  const entries: CatalogEntry[] = [];
  const seen = new Set<CatalogClass>();

  for (const [exportName, value] of Object.entries(namespace)) {
    if (!isClass(value) || seen.has(value)) {
      continue;
    }
    seen.add(value);
    entries.push({ exportName, qualifiedName: `${moduleId}#${exportName}`, type: value });
  }

  return new TypeCatalog(moduleId, entries, dependencies);
}

const PackageManifestSchema = z.object({
  version: z.string()
});

/**
 * Loads a definitions module. Dependency resolution runs once per loader,
 * however often `load()` is called. A module already imported by this process
 * is not evaluated again; watch mode loads each cycle on a fresh worker thread.
 */
export class ModuleLoader {
  private resolved: ResolvedDependency[] | null = null;

  constructor(readonly config: LoaderConfig) {}

  /**
   * Finds each dependency in the node_modules directories searched from the module's location
   *
   * @throws LoadError naming the first dependency that cannot be found
   */
  async resolveDependencies(): Promise<ResolvedDependency[]> {
    if (this.resolved) {
      return this.resolved;
    }

    const { modulePath } = this.config;
    const requireFromModule = createRequire(modulePath);
    const resolved: ResolvedDependency[] = [];

    for (const name of this.config.dependencies) {
      const searchPaths = requireFromModule.resolve.paths(name) ?? [];
      const dependency = await this.findPackage(name, searchPaths);

      if (!dependency) {
        throw new LoadError(
          `Failed to find dependency "${name}" required by ${modulePath}. Make sure it is installed next to the module.`,
          modulePath,
          name
        );
      }
      resolved.push(dependency);
    }

    this.resolved = resolved;
    return resolved;
  }

  private async findPackage(name: string, searchPaths: string[]): Promise<ResolvedDependency | null> {
    for (const nodeModules of searchPaths) {
      const directory = path.join(nodeModules, name);
      const manifestPath = path.join(directory, 'package.json');

      let content: string;
      try {
        content = await fs.readFile(manifestPath, 'utf-8');
      } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === 'ENOENT' || err.code === 'ENOTDIR') {
          continue;
        }
        throw error;
      }

      let manifest: z.infer<typeof PackageManifestSchema>;
      try {
        manifest = PackageManifestSchema.parse(JSON.parse(content));
      } catch (error) {
        throw new LoadError(
          `Dependency "${name}" at ${directory} has an unreadable package.json: ${errorMessage(error)}`,
          this.config.modulePath,
          name
        );
      }

      return { name, version: manifest.version, directory };
    }

    return null;
  }

  /**
   * Resolves dependencies, imports the module and catalogs its exported classes
   */
  async load(): Promise<TypeCatalog> {
    const { modulePath } = this.config;

    try {
      await fs.access(modulePath);
    } catch {
      throw new LoadError(`Module not found: ${modulePath}`, modulePath);
    }

    const dependencies = await this.resolveDependencies();

    let namespace: Record<string, unknown>;
    try {
      namespace = await import(pathToFileURL(modulePath).href);
    } catch (error) {
      throw new LoadError(`Failed to load ${modulePath}: ${errorMessage(error)}`, modulePath);
    }

    return createCatalog(path.basename(modulePath), namespace, dependencies);
  }
}

/**
 * One-shot load of a module
 */
export function loadModule(config: LoaderConfig): Promise<TypeCatalog> {
  return new ModuleLoader(config).load();
}
