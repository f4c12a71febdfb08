/**
 * Engine Errors
 *
 * Errors raised by node services, the expression evaluator, the planner and
 * the run registry. All extend the Nodeflow taxonomy so callers can switch on
 * `code` and `retryable` without knowing the engine's classes.
 *
 * DAG rule violations are not errors: they are reported as issues in the
 * validation result.
 *
 * @module @nodeflow/engine/errors
 */

import { NodeflowError, NotFoundError, ValidationError } from '@nodeflow/core';

// =============================================================================
// Node Errors
// =============================================================================

/**
 * Node metadata or structured output failed validation.
 *
 * `fieldPath` is dotted (`metadata.query_map.q`) so a UI can highlight the
 * configured field.
 */
export class NodeValidationError extends ValidationError {
  readonly fieldPath: string;
  readonly problem: string;

  constructor(fieldPath: string, problem: string, options?: { nodeType?: string; cause?: Error }) {
    const prefix = options?.nodeType ? `Invalid ${options.nodeType} node` : 'Invalid node';
    super(`${prefix}: ${fieldPath}: ${problem}`, {
      fieldErrors: { [fieldPath]: problem },
      context: options?.nodeType ? { nodeType: options.nodeType } : undefined,
      cause: options?.cause,
    });
    this.name = 'NodeValidationError';
    this.fieldPath = fieldPath;
    this.problem = problem;
  }
}

/**
 * A node service failed while executing.
 */
export class NodeExecutionError extends NodeflowError {
  readonly nodeId?: string;
  readonly nodeType?: string;

  constructor(
    message: string,
    options?: { nodeId?: string; nodeType?: string; cause?: Error; retryable?: boolean }
  ) {
    super(message, {
      code: 'NODE_EXECUTION',
      retryable: options?.retryable ?? false,
      cause: options?.cause,
      context: { nodeId: options?.nodeId, nodeType: options?.nodeType },
    });
    this.name = 'NodeExecutionError';
    this.nodeId = options?.nodeId;
    this.nodeType = options?.nodeType;
  }
}

// =============================================================================
// Expression Errors
// =============================================================================

function formatExpressionMessage(detail: string, expression: string, path?: string): string {
  return path
    ? `Expression error at '${path}': ${detail} (expression: ${expression})`
    : `Expression error: ${detail} (expression: ${expression})`;
}

/**
 * Expression text does not parse. Raised at validate time.
 */
export class ExpressionSyntaxError extends NodeflowError {
  readonly expression: string;
  readonly path?: string;
  readonly detail: string;

  constructor(expression: string, path: string | undefined, detail: string, cause?: Error) {
    super(formatExpressionMessage(detail, expression, path), {
      code: 'EXPRESSION_SYNTAX',
      retryable: false,
      cause,
      context: { expression, path },
    });
    this.name = 'ExpressionSyntaxError';
    this.expression = expression;
    this.path = path;
    this.detail = detail;
  }
}

/**
 * Expression parsed but failed while evaluating.
 */
export class ExpressionEvaluationError extends NodeflowError {
  readonly expression: string;
  readonly path?: string;
  readonly detail: string;

  constructor(
    expression: string,
    path: string | undefined,
    cause: Error,
    detail: string = `Evaluation failed: ${cause.message}`
  ) {
    super(formatExpressionMessage(detail, expression, path), {
      code: 'EXPRESSION_EVALUATION',
      retryable: false,
      cause,
      context: { expression, path },
    });
    this.name = 'ExpressionEvaluationError';
    this.expression = expression;
    this.path = path;
    this.detail = detail;
  }
}

/**
 * Expression evaluation exceeded its time bound.
 */
export class ExpressionTimeoutError extends ExpressionEvaluationError {
  readonly timeoutMs: number;

  constructor(expression: string, path: string | undefined, timeoutMs: number) {
    const detail = `Evaluation timed out after ${timeoutMs}ms`;
    super(expression, path, new Error(detail), detail);
    this.name = 'ExpressionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// Graph and Run Errors
// =============================================================================

/**
 * An operation that needs a valid DAG was handed one with errors.
 */
export class InvalidGraphError extends NodeflowError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Graph failed validation: ${errors.join('; ')}`, {
      code: 'INVALID_GRAPH',
      retryable: false,
      context: { errors },
    });
    this.name = 'InvalidGraphError';
    this.errors = errors;
  }
}

/**
 * Run id is not (or no longer) held by the registry.
 */
export class RunNotFoundError extends NotFoundError {
  readonly runId: string;

  constructor(runId: string) {
    super('Run', runId);
    this.name = 'RunNotFoundError';
    this.runId = runId;
  }
}
