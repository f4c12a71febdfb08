/**
 * Ephemeral Run Registry
 *
 * Process-scoped map of run id to run state. Each run keeps its full event
 * log plus a bounded channel for one streaming consumer. A background pass
 * evicts runs whose TTL has elapsed: finished runs by `finishedAt`,
 * abandoned ones by `startedAt`. Nothing survives a restart.
 *
 * Node's event loop serializes every call, so no lock guards the map.
 *
 * @module @nodeflow/engine/run/registry
 */

import { randomUUID } from 'node:crypto';
import { ConflictError, getLogger, getMetricsRegistry, type Logger, type MetricsRegistry } from '@nodeflow/core';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import { RunNotFoundError } from '../errors.js';
import { EventChannel } from './event-channel.js';
import { isFinishedStatus, validateRunTransition } from './state-machine.js';
import type { FinishedStatus, RunEvent, RunEventInput, RunKind, RunState, RunStatus } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface RunRegistryOptions {
  /** How long a run is kept after finishing, or after starting if it never finishes */
  ttlMs?: number;
  gcIntervalMs?: number;
  /** Per-run stream buffer size */
  channelCapacity?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

interface RunRecord {
  runId: string;
  kind: RunKind;
  status: RunStatus;
  startedAt: Date;
  finishedAt?: Date;
  events: RunEvent[];
  channel: EventChannel<RunEvent>;
}

// =============================================================================
// Registry
// =============================================================================

export class RunRegistry {
  private readonly runs = new Map<string, RunRecord>();
  private readonly ttlMs: number;
  private readonly gcIntervalMs: number;
  private readonly channelCapacity: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private gcTimer: NodeJS.Timeout | undefined;

  constructor(options: RunRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_ENGINE_CONFIG.runTtlMs;
    this.gcIntervalMs = options.gcIntervalMs ?? DEFAULT_ENGINE_CONFIG.runGcIntervalMs;
    this.channelCapacity = options.channelCapacity ?? DEFAULT_ENGINE_CONFIG.runChannelCapacity;
    this.logger = options.logger ?? getLogger('run-registry');
    this.metrics = options.metrics ?? getMetricsRegistry();
  }

  /** Number of runs currently held */
  get size(): number {
    return this.runs.size;
  }

  /**
   * Register a new run in the `created` status
   */
  create(kind: RunKind = 'workflow'): RunState {
    const record: RunRecord = {
      runId: randomUUID(),
      kind,
      status: 'created',
      startedAt: new Date(),
      events: [],
      channel: new EventChannel<RunEvent>(this.channelCapacity),
    };
    this.runs.set(record.runId, record);
    this.metrics.gauge('nodeflow_runs_active', this.runs.size);
    this.logger.debug('Run created', { runId: record.runId, kind });
    return snapshot(record);
  }

  /**
   * Move a created run to `running`
   */
  markRunning(runId: string): void {
    const record = this.require(runId);
    validateRunTransition(record.status, 'running', runId);
    record.status = 'running';
  }

  /**
   * Append an event to the log and the stream channel
   *
   * @throws RunNotFoundError for unknown runs
   * @throws ConflictError once the run has finished
   */
  append(runId: string, input: RunEventInput): RunEvent {
    const record = this.require(runId);
    if (record.finishedAt !== undefined) {
      throw new ConflictError(`Run ${runId} is finished; no further events accepted`, { runId });
    }

    const event: RunEvent = Object.freeze({
      timestamp: new Date().toISOString(),
      level: input.level,
      message: input.message,
      data: Object.freeze({ ...input.data }),
    });
    record.events.push(event);
    if (!record.channel.push(event)) {
      this.metrics.increment('nodeflow_run_events_dropped_total');
    }
    return event;
  }

  /**
   * Mark the run finished; the stream drains what is buffered and ends
   */
  finish(runId: string, status: FinishedStatus): RunState {
    const record = this.require(runId);
    validateRunTransition(record.status, status, runId);
    record.status = status;
    record.finishedAt = new Date();
    record.channel.close();
    this.logger.debug('Run finished', { runId, status });
    return snapshot(record);
  }

  get(runId: string): RunState | undefined {
    const record = this.runs.get(runId);
    return record ? snapshot(record) : undefined;
  }

  /**
   * Next unread event, waiting up to `timeoutMs`. Resolves null on timeout
   * (the consumer sends a heartbeat), when `signal` aborts, and once a
   * finished run is drained.
   *
   * @throws RunNotFoundError for unknown runs
   */
  popNext(runId: string, timeoutMs: number, signal?: AbortSignal): Promise<RunEvent | null> {
    return this.require(runId).channel.next(timeoutMs, signal);
  }

  /**
   * Evict runs whose TTL has elapsed; returns the evicted ids
   */
  gc(now: number = Date.now()): string[] {
    const evicted: string[] = [];

    for (const record of this.runs.values()) {
      const finishedAge = record.finishedAt ? now - record.finishedAt.getTime() : undefined;
      const abandoned = finishedAge === undefined && now - record.startedAt.getTime() > this.ttlMs;

      if ((finishedAge !== undefined && finishedAge > this.ttlMs) || abandoned) {
        validateRunTransition(record.status, 'evicted', record.runId);
        record.status = 'evicted';
        record.channel.close();
        this.runs.delete(record.runId);
        evicted.push(record.runId);

        if (abandoned) {
          this.logger.warn('Evicted abandoned run', { runId: record.runId, startedAt: record.startedAt.toISOString() });
        }
      }
    }

    if (evicted.length > 0) {
      this.metrics.increment('nodeflow_runs_evicted_total', undefined, evicted.length);
      this.metrics.gauge('nodeflow_runs_active', this.runs.size);
      this.logger.debug('Eviction pass', { evicted: evicted.length, remaining: this.runs.size });
    }
    return evicted;
  }

  /**
   * Start the background eviction interval. The timer does not keep the
   * process alive.
   */
  start(): void {
    if (this.gcTimer) return;
    this.gcTimer = setInterval(() => {
      this.gc();
    }, this.gcIntervalMs);
    this.gcTimer.unref();
  }

  stop(): void {
    if (this.gcTimer) {
      clearInterval(this.gcTimer);
      this.gcTimer = undefined;
    }
  }

  private require(runId: string): RunRecord {
    const record = this.runs.get(runId);
    if (!record) {
      throw new RunNotFoundError(runId);
    }
    return record;
  }
}

function snapshot(record: RunRecord): RunState {
  const state: RunState = {
    runId: record.runId,
    kind: record.kind,
    status: record.status,
    startedAt: record.startedAt,
    events: [...record.events],
    pendingEvents: record.channel.size,
    droppedEvents: record.channel.droppedCount,
  };
  if (record.finishedAt) state.finishedAt = record.finishedAt;
  return state;
}

/**
 * Whether a snapshot has finished and nothing is left to stream
 */
export function isDrained(state: RunState): boolean {
  return isFinishedStatus(state.status) && state.pendingEvents === 0;
}

// =============================================================================
// Process Registry
// =============================================================================

let globalRunRegistry: RunRegistry | null = null;

/**
 * Get the process run registry, creating one with default settings
 */
export function getRunRegistry(): RunRegistry {
  if (!globalRunRegistry) {
    globalRunRegistry = new RunRegistry();
  }
  return globalRunRegistry;
}

/**
 * Replace the process run registry (tests, custom wiring)
 */
export function setRunRegistry(registry: RunRegistry): void {
  globalRunRegistry?.stop();
  globalRunRegistry = registry;
}

/**
 * Create the process run registry from configuration and start eviction
 */
export function initRunRegistry(config: Partial<EngineConfig> = {}): RunRegistry {
  const registry = new RunRegistry({
    ttlMs: config.runTtlMs,
    gcIntervalMs: config.runGcIntervalMs,
    channelCapacity: config.runChannelCapacity,
  });
  setRunRegistry(registry);
  registry.start();
  return registry;
}

/**
 * Stop eviction and drop the process run registry
 */
export function shutdownRunRegistry(): void {
  globalRunRegistry?.stop();
  globalRunRegistry = null;
}
