/**
 * Run Logger
 *
 * Appends events to a run the way a logger writes lines, so code outside
 * the executor (an expert run, a transport) can report progress into the
 * same stream.
 *
 * @module @nodeflow/engine/run/run-logger
 */

import type { RunRegistry } from './registry.js';
import type { RunEvent } from './types.js';

export interface RunLogger {
  readonly runId: string;
  info(message: string, data?: Record<string, unknown>): RunEvent;
  warn(message: string, data?: Record<string, unknown>): RunEvent;
  /** Adds `exception: {type, message}` when an error is given */
  error(message: string, error?: unknown, data?: Record<string, unknown>): RunEvent;
}

/**
 * @example
 * ```typescript
 * const log = createRunLogger(registry, runId, { workflowId });
 * log.info('node_start', { nodeId: 'classify', nodeType: 'job' });
 * ```
 */
export function createRunLogger(
  registry: RunRegistry,
  runId: string,
  context: Record<string, unknown> = {}
): RunLogger {
  return {
    runId,

    info(message, data) {
      return registry.append(runId, { level: 'info', message, data: { ...context, ...data } });
    },

    warn(message, data) {
      return registry.append(runId, { level: 'warn', message, data: { ...context, ...data } });
    },

    error(message, error, data) {
      const exception =
        error === undefined
          ? undefined
          : error instanceof Error
            ? { type: error.name, message: error.message }
            : { type: typeof error, message: String(error) };
      return registry.append(runId, {
        level: 'error',
        message,
        data: exception ? { ...context, ...data, exception } : { ...context, ...data },
      });
    },
  };
}
