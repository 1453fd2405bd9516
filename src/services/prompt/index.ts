/**
 * Prompt Service Module
 *
 * Interactive prompts for the init command.
 *
 * @module services/prompt
 */

export * from './prompt-service.js';
