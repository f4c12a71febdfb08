/**
 * Run State Machine
 *
 * Validates run status changes.
 *
 * ```
 *   created ──> running ──> succeeded ──> evicted
 *      │           │
 *      │           └──────> failed ─────> evicted
 *      └──────────────────> failed
 * ```
 *
 * - created: registered, executor not yet started
 * - running: executor is appending events
 * - succeeded / failed: finished; kept until the TTL elapses
 * - evicted: removed from the registry (terminal)
 *
 * Runs that never finish are evicted from created or running once their
 * start is older than the TTL.
 *
 * @module @nodeflow/engine/run/state-machine
 */

import { NodeflowError } from '@nodeflow/core';
import type { FinishedStatus, RunStatus } from './types.js';

// =============================================================================
// State Machine Configuration
// =============================================================================

const STATE_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  created: ['running', 'failed', 'evicted'],
  running: ['succeeded', 'failed', 'evicted'],
  succeeded: ['evicted'],
  failed: ['evicted'],
  evicted: [],
};

const FINISHED_STATES: ReadonlySet<RunStatus> = new Set(['succeeded', 'failed']);

// =============================================================================
// State Machine Functions
// =============================================================================

/**
 * @example
 * ```typescript
 * isValidRunTransition('created', 'running')   // => true
 * isValidRunTransition('succeeded', 'running') // => false
 * ```
 */
export function isValidRunTransition(from: RunStatus, to: RunStatus): boolean {
  return STATE_TRANSITIONS[from].includes(to);
}

/**
 * @throws InvalidRunTransitionError
 */
export function validateRunTransition(from: RunStatus, to: RunStatus, runId?: string): void {
  if (!isValidRunTransition(from, to)) {
    throw new InvalidRunTransitionError(from, to, runId);
  }
}

export function getNextRunStates(current: RunStatus): RunStatus[] {
  return [...STATE_TRANSITIONS[current]];
}

export function isFinishedStatus(status: RunStatus): status is FinishedStatus {
  return FINISHED_STATES.has(status);
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error thrown when an invalid status change is attempted
 */
export class InvalidRunTransitionError extends NodeflowError {
  readonly from: RunStatus;
  readonly to: RunStatus;

  constructor(from: RunStatus, to: RunStatus, runId?: string) {
    const allowed = STATE_TRANSITIONS[from];
    const valid = allowed.length > 0 ? allowed.join(', ') : '(none - terminal state)';
    const suffix = runId ? ` [runId: ${runId}]` : '';

    super(`Invalid run transition: ${from} -> ${to}. Valid transitions from ${from}: ${valid}${suffix}`, {
      code: 'INVALID_STATE',
      retryable: false,
      context: { from, to, runId },
    });
    this.name = 'InvalidRunTransitionError';
    this.from = from;
    this.to = to;
  }
}
