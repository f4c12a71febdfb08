/**
 * Expression Evaluator
 *
 * JSONata expressions evaluated against two named roots:
 * - `base`: environment values (current time, date, timezone, ...)
 * - `input`: caller data, plus `item`/`index` inside iteration
 *
 * Evaluation is bounded. A deadline is checked on every evaluation step
 * through the evaluator's entry hook, and a timer races the result.
 *
 * @module @nodeflow/engine/expression/evaluator
 */

import jsonata from 'jsonata';
import { isRecord, setOwn } from '../workflow/shape.js';
import {
  ExpressionEvaluationError,
  ExpressionSyntaxError,
  ExpressionTimeoutError,
} from '../errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Data an expression can reference
 */
export interface ExpressionContext {
  /** Environment values; defaults to {@link getBaseDefaults} */
  base?: Record<string, unknown>;
  /** Caller data */
  input?: unknown;
}

export interface EvaluateOptions {
  /** Evaluation bound in milliseconds (default: 100) */
  timeoutMs?: number;
  /** Dotted field path of the configured expression, for error reporting */
  path?: string;
}

export const DEFAULT_EXPRESSION_TIMEOUT_MS = 100;

const EVALUATE_ENTRY = Symbol.for('jsonata.__evaluate_entry');

class DeadlineExceeded extends Error {
  constructor() {
    super('deadline exceeded');
    this.name = 'DeadlineExceeded';
  }
}

// =============================================================================
// Base Values
// =============================================================================

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Environment values exposed under `base`
 */
export function getBaseDefaults(now: Date = new Date()): Record<string, unknown> {
  return {
    timestamp: now.toISOString(),
    date: `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`,
    time: `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`,
    timezone: Intl.DateTimeFormat().resolvedOptions().timeZone,
    unix_timestamp: Math.floor(now.getTime() / 1000),
    day_of_week: now.toLocaleDateString('en-US', { weekday: 'long' }),
    month: now.toLocaleDateString('en-US', { month: 'long' }),
    year: now.getFullYear(),
  };
}

// =============================================================================
// Error Normalization
// =============================================================================

/**
 * JSONata throws plain objects carrying `message`, `code` and `position`.
 */
function describeFailure(error: unknown): Error {
  if (error instanceof Error) return error;
  if (isRecord(error) && typeof error.message === 'string') {
    const code = typeof error.code === 'string' ? ` [${error.code}]` : '';
    return new Error(`${error.message}${code}`);
  }
  return new Error(String(error));
}

function requireText(expression: unknown, path: string | undefined): string {
  if (typeof expression !== 'string') {
    throw new ExpressionSyntaxError(String(expression), path, 'Expression must be a string');
  }
  if (expression.trim() === '') {
    throw new ExpressionSyntaxError(expression, path, 'Expression cannot be empty');
  }
  return expression;
}

// =============================================================================
// Syntax Check
// =============================================================================

/**
 * Parse an expression without evaluating it.
 *
 * @throws ExpressionSyntaxError
 */
export function checkExpressionSyntax(expression: unknown, path?: string): void {
  const text = requireText(expression, path);
  try {
    jsonata(text);
  } catch (error) {
    const cause = describeFailure(error);
    throw new ExpressionSyntaxError(text, path, `Syntax error: ${cause.message}`, cause);
  }
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Evaluate an expression against `{base, input}`.
 *
 * `undefined` means the expression selected nothing.
 *
 * @throws ExpressionEvaluationError (ExpressionTimeoutError when the bound is hit)
 */
export async function evaluateExpression(
  expression: string,
  context: ExpressionContext,
  options: EvaluateOptions = {}
): Promise<unknown> {
  const path = options.path;
  const timeoutMs = options.timeoutMs ?? DEFAULT_EXPRESSION_TIMEOUT_MS;

  let compiled: jsonata.Expression;
  try {
    compiled = jsonata(requireText(expression, path));
  } catch (error) {
    if (error instanceof ExpressionSyntaxError) {
      throw new ExpressionEvaluationError(expression, path, error, error.detail);
    }
    const cause = describeFailure(error);
    throw new ExpressionEvaluationError(expression, path, cause, `Syntax error: ${cause.message}`);
  }

  const deadline = Date.now() + timeoutMs;
  const onEntry = (): void => {
    if (Date.now() > deadline) {
      throw new DeadlineExceeded();
    }
  };
  // The typings only admit string names; the evaluator also looks up this symbol.
  Reflect.apply(compiled.assign, compiled, [EVALUATE_ENTRY, onEntry]);

  const data = { base: context.base ?? getBaseDefaults(), input: context.input ?? {} };

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceeded()), timeoutMs);
  });

  try {
    const result: unknown = await Promise.race([compiled.evaluate(data), timeout]);
    return normalize(result);
  } catch (error) {
    if (error instanceof DeadlineExceeded) {
      throw new ExpressionTimeoutError(expression, path, timeoutMs);
    }
    throw new ExpressionEvaluationError(expression, path, describeFailure(error));
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Evaluate and coerce to a boolean the way predicates read
 */
export async function evaluatePredicate(
  expression: string,
  context: ExpressionContext,
  options: EvaluateOptions = {}
): Promise<boolean> {
  const value = await evaluateExpression(expression, context, options);
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

/**
 * Strip evaluator-specific decorations (sequence flags) from results
 */
function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => normalize(item));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      setOwn(out, key, normalize(entry));
    }
    return out;
  }
  return value;
}
