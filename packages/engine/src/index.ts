/**
 * Nodeflow Engine
 *
 * Workflow graphs of typed nodes: validation, shape planning, node
 * services, run execution and event streaming.
 *
 * @module @nodeflow/engine
 */

export * from './errors.js';
export * from './config.js';

// JSONata expressions and prompt templates
export * from './expression/index.js';

// Graph model, validation, planning and storage
export * from './workflow/index.js';

// One service per node type
export * from './nodes/index.js';

// Run registry, streaming and execution
export * from './run/index.js';
