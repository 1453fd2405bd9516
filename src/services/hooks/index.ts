/**
 * Git Hooks Service Module
 * 
 * Provides git hooks installation and management
 * with Husky integration support.
 * 
 * @module services/hooks
 */

export * from './hooks-service.js';
