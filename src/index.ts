/**
 * pipeline-kit
 *
 * Write CI pipelines as TypeScript classes, then publish them as YAML files.
 *
 * @module pipeline-kit
 */

export * from './definitions/index.js';
export * from './models/index.js';
export * from './core/errors.js';
export { Logger, LogLevel, logger, parseLogLevel } from './core/logger.js';
export type { LogLevelName } from './core/logger.js';
export * from './services/loader/index.js';
export * from './services/discovery/index.js';
export * from './services/drift/index.js';
export * from './services/publish/index.js';
export { PipelineValidator } from './services/validation/validator.js';
export type { PipelineIssue, ValidationResult } from './services/validation/validator.js';
export { serializePipeline, serializeStep } from './services/serialization/index.js';
