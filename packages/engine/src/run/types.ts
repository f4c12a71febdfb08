/**
 * Run Types
 *
 * Process-memory run state and the events a run emits while it executes.
 *
 * @module @nodeflow/engine/run/types
 */

// =============================================================================
// Run State
// =============================================================================

/**
 * What started the run
 */
export type RunKind = 'expert' | 'workflow';

/**
 * Run lifecycle status (see state-machine.ts)
 */
export type RunStatus = 'created' | 'running' | 'succeeded' | 'failed' | 'evicted';

/**
 * Statuses a run can finish with
 */
export type FinishedStatus = Extract<RunStatus, 'succeeded' | 'failed'>;

/**
 * Snapshot of one run, as returned by the registry
 */
export interface RunState {
  runId: string;
  kind: RunKind;
  status: RunStatus;
  startedAt: Date;
  /** Set once the run succeeded or failed */
  finishedAt?: Date;
  /** Every event appended so far, in order */
  events: readonly RunEvent[];
  /** Events buffered for the stream consumer and not yet popped */
  pendingEvents: number;
  /** Events dropped from the stream buffer on overflow (still in `events`) */
  droppedEvents: number;
}

// =============================================================================
// Events
// =============================================================================

export type RunEventLevel = 'info' | 'warn' | 'error';

/**
 * One entry in a run's event log. Frozen once appended.
 */
export interface RunEvent {
  readonly timestamp: string;
  readonly level: RunEventLevel;
  readonly message: string;
  readonly data: Readonly<Record<string, unknown>>;
}

/**
 * Messages the executor emits
 */
export type RunEventType =
  | 'node_start'
  | 'node_output'
  | 'node_error'
  | 'node_warning'
  | 'node_skipped'
  | 'branch_skipped'
  | 'run_succeeded'
  | 'run_failed';

/**
 * What callers hand to `append`; the registry stamps the time
 */
export interface RunEventInput {
  level: RunEventLevel;
  message: string;
  data?: Record<string, unknown>;
}
