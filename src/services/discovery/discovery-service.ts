/**
 * Discovery Service
 *
 * Finds the concrete classes in a catalog that derive from a definition contract
 * and instantiates one of each.
 */

import { DiscoveryError, errorMessage } from '../../core/errors.js';
import { DefinitionBase } from '../../definitions/definition-base.js';
import {
  ABSTRACT_DEFINITION,
  DEFINITION_CONTRACT,
  DefinitionContract,
  DefinitionType
} from '../../models/definition.js';
import { CatalogEntry, TypeCatalog } from '../loader/module-loader.js';

/**
 * A definition type together with its freshly constructed instance.
 * The instance is unchecked; callers test it against the descriptor contract.
 */
export interface DiscoveredDefinition {
  type: DefinitionType;
  instance: unknown;
}

/**
 * Discovery Service Interface
 */
export interface IDiscoveryService {
  describe(catalog: TypeCatalog): DefinitionType[];
  discover(catalog: TypeCatalog): DiscoveredDefinition[];
}

function ownStatic(target: object, key: symbol): unknown {
  return Object.getOwnPropertyDescriptor(target, key)?.value;
}

/**
 * True when `candidate` is the contract class, compared structurally.
 *
 * A tagged contract matches any class that owns the same contract tag, so a copy of
 * the base class loaded from another node_modules still matches, even when a bundler
 * renamed it. Untagged contracts fall back to reference identity.
 */
export function matchesContract(candidate: Function, contract: DefinitionContract): boolean {
  const expected = ownStatic(contract, DEFINITION_CONTRACT);
  if (typeof expected !== 'string') {
    return candidate === contract;
  }
  return ownStatic(candidate, DEFINITION_CONTRACT) === expected;
}

export function isAbstractDefinition(type: Function): boolean {
  return ownStatic(type, ABSTRACT_DEFINITION) === true;
}

/**
 * Every class up the constructor chain, nearest first
 */
export function ancestorsOf(type: Function): Function[] {
  const ancestors: Function[] = [];
  let current: unknown = Object.getPrototypeOf(type);

  while (typeof current === 'function' && current !== Function.prototype) {
    ancestors.push(current);
    current = Object.getPrototypeOf(current);
  }

  return ancestors;
}

/**
 * Definition discoverer for a given contract (DefinitionBase by default)
 */
export class DiscoveryService implements IDiscoveryService {
  constructor(private readonly contract: DefinitionContract = DefinitionBase) {}

  /**
   * Lists the catalog's definition types, abstract ones included, without instantiating anything
   */
  describe(catalog: TypeCatalog): DefinitionType[] {
    return this.match(catalog).map(({ type }) => type);
  }

  /**
   * Instantiates every concrete definition type, in catalog order
   *
   * @throws DiscoveryError when a definition cannot be constructed without arguments
   */
  discover(catalog: TypeCatalog): DiscoveredDefinition[] {
    return this.match(catalog)
      .filter(({ type }) => type.isConcrete)
      .map(({ entry, type }) => ({ type, instance: this.instantiate(entry) }));
  }

  private match(catalog: TypeCatalog): Array<{ entry: CatalogEntry; type: DefinitionType }> {
    const matches: Array<{ entry: CatalogEntry; type: DefinitionType }> = [];

    for (const entry of catalog) {
      const ancestors = ancestorsOf(entry.type);
      if (!ancestors.some(ancestor => matchesContract(ancestor, this.contract))) {
        continue;
      }

      matches.push({
        entry,
        type: {
          name: entry.type.name,
          qualifiedName: entry.qualifiedName,
          isConcrete: !isAbstractDefinition(entry.type),
          ancestors: ancestors.map(a => a.name)
        }
      });
    }

    return matches;
  }

  private instantiate(entry: CatalogEntry): unknown {
    const { type, qualifiedName } = entry;

    if (type.length > 0) {
      throw new DiscoveryError(
        `Failed to instantiate ${qualifiedName}: its constructor requires ${type.length} argument(s), definitions need a parameterless constructor`,
        type.name
      );
    }

    try {
      return new type();
    } catch (error) {
      throw new DiscoveryError(`Failed to instantiate ${qualifiedName}: ${errorMessage(error)}`, type.name);
    }
  }
}

/**
 * Finds and instantiates every concrete definition in the catalog
 */
export function discoverDefinitions(
  catalog: TypeCatalog,
  contract: DefinitionContract = DefinitionBase
): DiscoveredDefinition[] {
  return new DiscoveryService(contract).discover(catalog);
}

/**
 * Lists every definition type in the catalog, abstract ones included, without instantiating
 */
export function describeDefinitionTypes(
  catalog: TypeCatalog,
  contract: DefinitionContract = DefinitionBase
): DefinitionType[] {
  return new DiscoveryService(contract).describe(catalog);
}
