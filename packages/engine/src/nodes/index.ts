/**
 * Node Services
 *
 * @module @nodeflow/engine/nodes
 */

export * from './types.js';
export * from './metadata.js';
export * from './base.js';
export * from './http-client.js';
export * from './ai.js';
export * from './resources.js';
export * from './transform.js';
export * from './control.js';
export * from './registry.js';
