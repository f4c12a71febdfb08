/**
 * Run Cancellation
 *
 * Cooperative cancellation: the executor checks its token between nodes and
 * between for_each items, never in the middle of a node.
 *
 * @module @nodeflow/engine/run/cancellation
 */

import { NodeflowError } from '@nodeflow/core';

// =============================================================================
// Cancellation Token
// =============================================================================

/**
 * Reason for cancellation
 */
export interface CancellationReason {
  /** Who initiated cancellation */
  initiator: 'user' | 'system' | 'timeout';
  /** Human-readable reason */
  reason: string;
  requestedAt: Date;
}

/**
 * Cancellation token for cooperative cancellation
 *
 * @example
 * ```typescript
 * for (const nodeId of order) {
 *   token.throwIfCancelled();
 *   await runNode(nodeId);
 * }
 * ```
 */
export class CancellationToken {
  private _reason: CancellationReason | undefined;

  get isCancelled(): boolean {
    return this._reason !== undefined;
  }

  get reason(): CancellationReason | undefined {
    return this._reason;
  }

  /**
   * Request cancellation; later requests keep the first reason
   */
  cancel(reason: CancellationReason): void {
    if (this._reason !== undefined) {
      return;
    }
    this._reason = reason;
  }

  /**
   * @throws CancelledError once cancellation has been requested
   */
  throwIfCancelled(): void {
    if (this._reason !== undefined) {
      throw new CancelledError(this._reason);
    }
  }
}

/**
 * Error thrown at the checkpoint that observes a cancellation
 */
export class CancelledError extends NodeflowError {
  readonly reason: CancellationReason;

  constructor(reason: CancellationReason) {
    super(`Run cancelled: ${reason.reason}`, {
      code: 'CANCELLED',
      retryable: false,
      context: { initiator: reason.initiator, requestedAt: reason.requestedAt.toISOString() },
    });
    this.name = 'CancelledError';
    this.reason = reason;
  }
}
