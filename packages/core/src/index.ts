/**
 * @nodeflow/core - Shared primitives for the Nodeflow workflow engine
 *
 * - Reliability: error taxonomy, structured logging, trace context, metrics, retry
 * - Scheduler: cron expression parsing and matching for workflow triggers
 */

// Reliability exports
export * from './reliability/index.js';

// Scheduler exports
export * from './scheduler/index.js';
