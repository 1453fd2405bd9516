// Definition contract shared by the discoverer, the orchestrator and definition classes

/**
 * Static marker carrying a contract's qualified name.
 *
 * Registered with `Symbol.for` so that two copies of this library loaded side by side
 * (one next to the CLI, one next to the user's compiled module) agree on the key.
 */
export const DEFINITION_CONTRACT: unique symbol = Symbol.for('pipeline-kit.contract');

/**
 * Static marker for classes that must never be instantiated by discovery.
 * Only an own property counts; subclasses do not inherit abstractness.
 */
export const ABSTRACT_DEFINITION: unique symbol = Symbol.for('pipeline-kit.abstract');

/**
 * Capability surface every discovered definition exposes
 */
export interface DefinitionDescriptor {
  getTargetPath(): string | Promise<string>;
  validate(): void | Promise<void>;
  publish(): void | Promise<void>;
}

/**
 * A class that can act as a discovery contract
 */
export interface DefinitionContract {
  readonly name: string;
  readonly [DEFINITION_CONTRACT]?: string;
}

/**
 * A type identity found in a module's catalog
 */
export interface DefinitionType {
  /** Class name */
  name: string;
  /** `<module file>#<export name>` */
  qualifiedName: string;
  isConcrete: boolean;
  /** Names of every ancestor class, nearest first */
  ancestors: string[];
}

export function isDefinitionDescriptor(value: unknown): value is DefinitionDescriptor {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'getTargetPath' in value && typeof value.getTargetPath === 'function' &&
    'validate' in value && typeof value.validate === 'function' &&
    'publish' in value && typeof value.publish === 'function'
  );
}
