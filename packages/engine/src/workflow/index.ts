/**
 * Workflow Module
 *
 * Graph schemas, DAG validation, shape planning, available-data resolution,
 * document parsing and the workflow repository.
 *
 * @module @nodeflow/engine/workflow
 */

export * from './schema.js';
export * from './graph.js';
export * from './shape.js';
export * from './validation.js';
export * from './plan.js';
export * from './available.js';
export * from './parser.js';
export * from './repository.js';
