/**
 * Engine Configuration
 *
 * Reads engine configuration from environment variables.
 *
 * Environment Variables:
 * - NODEFLOW_RUN_TTL_MS: How long a run stays in the registry (default: 900000)
 * - NODEFLOW_RUN_GC_INTERVAL_MS: Eviction pass interval (default: 60000)
 * - NODEFLOW_RUN_CHANNEL_CAPACITY: Per-run stream buffer size (default: 1000)
 * - NODEFLOW_EXPRESSION_TIMEOUT_MS: Expression evaluation bound (default: 100)
 * - NODEFLOW_STREAM_HEARTBEAT_MS: Idle time before a stream heartbeat (default: 20000)
 * - NODEFLOW_MAX_WORKFLOW_DEPTH: Sub-workflow nesting limit (default: 8)
 * - NODEFLOW_NODE_RETRY_DELAY_MS: First backoff delay for node retries (default: 1000)
 *
 * @module @nodeflow/engine/config
 */

import { z } from 'zod';
import { ConfigurationError } from '@nodeflow/core';

/**
 * Engine configuration
 */
export const EngineConfig = z.object({
  runTtlMs: z.number().int().positive(),
  runGcIntervalMs: z.number().int().positive(),
  runChannelCapacity: z.number().int().positive(),
  expressionTimeoutMs: z.number().int().positive(),
  streamHeartbeatMs: z.number().int().positive(),
  maxWorkflowDepth: z.number().int().min(1),
  nodeRetryDelayMs: z.number().int().min(0),
});

export type EngineConfig = z.infer<typeof EngineConfig>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  runTtlMs: 900_000,
  runGcIntervalMs: 60_000,
  runChannelCapacity: 1000,
  expressionTimeoutMs: 100,
  streamHeartbeatMs: 20_000,
  maxWorkflowDepth: 8,
  nodeRetryDelayMs: 1000,
};

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isInteger(value) ? value : Number.NaN;
}

/**
 * Read engine configuration from environment variables
 *
 * @throws ConfigurationError when a variable is set to something unusable
 */
export function readEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const candidate = {
    runTtlMs: readInt(env, 'NODEFLOW_RUN_TTL_MS', DEFAULT_ENGINE_CONFIG.runTtlMs),
    runGcIntervalMs: readInt(env, 'NODEFLOW_RUN_GC_INTERVAL_MS', DEFAULT_ENGINE_CONFIG.runGcIntervalMs),
    runChannelCapacity: readInt(env, 'NODEFLOW_RUN_CHANNEL_CAPACITY', DEFAULT_ENGINE_CONFIG.runChannelCapacity),
    expressionTimeoutMs: readInt(env, 'NODEFLOW_EXPRESSION_TIMEOUT_MS', DEFAULT_ENGINE_CONFIG.expressionTimeoutMs),
    streamHeartbeatMs: readInt(env, 'NODEFLOW_STREAM_HEARTBEAT_MS', DEFAULT_ENGINE_CONFIG.streamHeartbeatMs),
    maxWorkflowDepth: readInt(env, 'NODEFLOW_MAX_WORKFLOW_DEPTH', DEFAULT_ENGINE_CONFIG.maxWorkflowDepth),
    nodeRetryDelayMs: readInt(env, 'NODEFLOW_NODE_RETRY_DELAY_MS', DEFAULT_ENGINE_CONFIG.nodeRetryDelayMs),
  };

  const parsed = EngineConfig.safeParse(candidate);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigurationError(`Invalid engine configuration: ${fields}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}
