/**
 * Run Module
 *
 * Run lifecycle, the ephemeral run registry, event streaming and the
 * workflow executor.
 *
 * @module @nodeflow/engine/run
 */

export * from './types.js';
export * from './state-machine.js';
export * from './cancellation.js';
export * from './event-channel.js';
export * from './registry.js';
export * from './run-logger.js';
export * from './stream.js';
export * from './executor.js';
