// Export all domain models

export * from './types.js';
export * from './definition.js';
export * from './pipeline.js';
