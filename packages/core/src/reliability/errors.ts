/**
 * Error Taxonomy
 *
 * Standard error types with clear semantics for retry and audit.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error knows if it's retryable
 * - Every error can become an audit event
 *
 * @module @nodeflow/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard Nodeflow error codes
 */
export type NodeflowErrorCode =
  // Retryable errors (5xx-like, transient)
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'UPSTREAM_ERROR'

  // Non-retryable errors (4xx-like, permanent)
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INVALID_STATE'
  | 'CANCELLED'

  // Workflow errors
  | 'EXPRESSION_SYNTAX'
  | 'EXPRESSION_EVALUATION'
  | 'NODE_EXECUTION'
  | 'INVALID_GRAPH'

  // Internal errors
  | 'INTERNAL_ERROR'
  | 'CONFIGURATION_ERROR';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Nodeflow error options
 */
export interface NodeflowErrorOptions {
  /** Error code */
  code: NodeflowErrorCode;

  /** Whether the error is retryable */
  retryable?: boolean;

  /** Suggested retry delay in ms */
  retryAfterMs?: number;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base Nodeflow error class
 *
 * All Nodeflow errors extend this for consistent handling.
 */
export class NodeflowError extends Error {
  readonly code: NodeflowErrorCode;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;
  readonly timestamp: Date;

  constructor(message: string, options: NodeflowErrorOptions) {
    super(message);
    this.name = 'NodeflowError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging/audit
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

// =============================================================================
// Retryable Errors
// =============================================================================

/**
 * Retryable error - transient failure, safe to retry
 */
export class RetryableError extends NodeflowError {
  constructor(
    message: string,
    code: NodeflowErrorCode = 'UPSTREAM_ERROR',
    options?: Partial<NodeflowErrorOptions>
  ) {
    super(message, {
      retryAfterMs: 1000,
      ...options,
      code,
      retryable: true,
    });
    this.name = 'RetryableError';
  }
}

/**
 * Timeout error - operation exceeded time limit
 */
export class TimeoutError extends NodeflowError {
  readonly timeoutMs: number;
  readonly operation?: string;

  constructor(
    message: string,
    timeoutMs: number,
    options?: {
      operation?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'TIMEOUT',
      retryable: true,
      context: options?.context,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.operation = options?.operation;
  }
}

// =============================================================================
// Permanent Errors
// =============================================================================

/**
 * Validation error - input failed validation
 *
 * `fieldErrors` maps a dotted field path to the problem found there.
 */
export class ValidationError extends NodeflowError {
  readonly fieldErrors?: Record<string, string>;

  constructor(
    message: string,
    options?: {
      fieldErrors?: Record<string, string>;
      context?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      retryable: false,
      context: options?.context,
      cause: options?.cause,
    });
    this.name = 'ValidationError';
    this.fieldErrors = options?.fieldErrors;
  }
}

/**
 * Not found error - referenced entity does not exist
 */
export class NotFoundError extends NodeflowError {
  readonly resource: string;
  readonly resourceId: string;

  constructor(resource: string, resourceId: string, context?: Record<string, unknown>) {
    super(`${resource} ${resourceId} not found`, {
      code: 'NOT_FOUND',
      retryable: false,
      context,
    });
    this.name = 'NotFoundError';
    this.resource = resource;
    this.resourceId = resourceId;
  }
}

/**
 * Conflict error - the change would violate a uniqueness or integrity rule
 */
export class ConflictError extends NodeflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: 'CONFLICT',
      retryable: false,
      context,
    });
    this.name = 'ConflictError';
  }
}

/**
 * Configuration error - the process is wired incorrectly
 */
export class ConfigurationError extends NodeflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      retryable: false,
      context,
    });
    this.name = 'ConfigurationError';
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Check if an error is retryable
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof NodeflowError) {
    return error.retryable;
  }

  // Check for common retryable error patterns
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('rate limit') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('503') ||
      message.includes('429')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
