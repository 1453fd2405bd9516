/**
 * Discovery Service Module
 *
 * Finds definition classes in a module catalog.
 *
 * @module services/discovery
 */

export * from './discovery-service.js';
