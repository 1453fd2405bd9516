export * from './definition-base.js';
export * from './pipeline-definition.js';
export * from './bash.js';
export * from './target-path.js';
