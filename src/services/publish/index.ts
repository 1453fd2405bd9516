/**
 * Publish Module
 *
 * Orchestrates validation, publishing and drift classification of definitions.
 *
 * @module services/publish
 */

export * from './publish-service.js';
export * from './publish-cycle.js';
export * from './publish-watcher.js';
