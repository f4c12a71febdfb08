/**
 * Run Event Stream
 *
 * Turns a run's channel into an ordered feed a transport can frame (SSE,
 * websocket, CLI): buffered events first, then live ones, a heartbeat after
 * each idle interval, and `done` once the run has finished and drained.
 *
 * @module @nodeflow/engine/run/stream
 */

import { DEFAULT_ENGINE_CONFIG } from '../config.js';
import { RunNotFoundError } from '../errors.js';
import { isDrained, type RunRegistry } from './registry.js';
import type { RunEvent, RunStatus } from './types.js';

export type StreamItem =
  | { type: 'event'; event: RunEvent }
  | { type: 'heartbeat' }
  | { type: 'done'; status: RunStatus }
  | { type: 'not_found'; runId: string };

export interface StreamOptions {
  /** Idle time before a heartbeat (default: 20000) */
  heartbeatMs?: number;
  /** Stops the stream without touching the run */
  signal?: AbortSignal;
}

/**
 * @example
 * ```typescript
 * for await (const item of streamRunEvents(registry, runId)) {
 *   if (item.type === 'event') res.write(`data: ${JSON.stringify(item.event)}\n\n`);
 *   if (item.type === 'heartbeat') res.write(': keep-alive\n\n');
 * }
 * ```
 */
export async function* streamRunEvents(
  registry: RunRegistry,
  runId: string,
  options: StreamOptions = {}
): AsyncGenerator<StreamItem, void, undefined> {
  const heartbeatMs = options.heartbeatMs ?? DEFAULT_ENGINE_CONFIG.streamHeartbeatMs;

  if (!registry.get(runId)) {
    yield { type: 'not_found', runId };
    return;
  }

  while (!options.signal?.aborted) {
    const state = registry.get(runId);
    if (!state) {
      yield { type: 'done', status: 'evicted' };
      return;
    }
    if (isDrained(state)) {
      yield { type: 'done', status: state.status };
      return;
    }

    let event: RunEvent | null;
    try {
      event = await registry.popNext(runId, heartbeatMs, options.signal);
    } catch (error) {
      if (!(error instanceof RunNotFoundError)) throw error;
      yield { type: 'done', status: 'evicted' };
      return;
    }

    if (event) {
      yield { type: 'event', event };
      continue;
    }
    if (options.signal?.aborted) {
      return;
    }
    // null also arrives when the run finishes or is evicted mid-wait
    const current = registry.get(runId);
    if (current && current.finishedAt === undefined) {
      yield { type: 'heartbeat' };
    }
  }
}
