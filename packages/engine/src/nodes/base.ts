/**
 * Node Service Base
 *
 * `defineNodeService` turns a typed definition (closed metadata schema,
 * expression and template fields, plan and execute) into the erased
 * {@link NodeService} the registry holds. Validation, metadata parsing and
 * structured-output checks live here once for all fifteen types.
 *
 * @module @nodeflow/engine/nodes/base
 */

import { z } from 'zod';
import { ConfigurationError } from '@nodeflow/core';
import type { NodeType, Shape } from '../workflow/schema.js';
import { isRecord, setOwn } from '../workflow/shape.js';
import { checkExpressionSyntax, evaluateExpression } from '../expression/evaluator.js';
import { validateTemplate } from '../expression/template.js';
import { ExpressionSyntaxError, NodeValidationError } from '../errors.js';
import { structuredOutputSchema } from './metadata.js';
import type { NodeExecutionContext, NodeInput, NodeService } from './types.js';

// =============================================================================
// Definition
// =============================================================================

/**
 * A configured field holding an expression or template, by dotted path
 */
export type ConfiguredField = [path: string, text: string];

export interface NodeServiceDefinition<S extends z.ZodTypeAny> {
  nodeType: NodeType;
  schema: S;
  /** Fields holding JSONata expressions; syntax-checked on validate */
  expressions?: (metadata: z.infer<S>) => ConfiguredField[];
  /** Fields holding `{{ }}` templates; placeholder-checked on validate */
  templates?: (metadata: z.infer<S>) => ConfiguredField[];
  plan(metadata: z.infer<S>, inputShape: Shape, structuredOutput: Record<string, unknown>): Shape;
  execute(
    input: NodeInput,
    metadata: z.infer<S>,
    context: NodeExecutionContext
  ): Promise<Record<string, unknown>>;
}

/**
 * Build a node service from its definition
 */
export function defineNodeService<S extends z.ZodTypeAny>(definition: NodeServiceDefinition<S>): NodeService {
  const { nodeType, schema } = definition;

  return {
    nodeType,

    validate(metadata, structuredOutput) {
      const parsed = parseMetadata(nodeType, schema, metadata);

      for (const [path, expression] of definition.expressions?.(parsed) ?? []) {
        try {
          checkExpressionSyntax(expression, path);
        } catch (error) {
          if (!(error instanceof ExpressionSyntaxError)) throw error;
          throw new NodeValidationError(path, error.detail, { nodeType, cause: error });
        }
      }

      for (const [path, template] of definition.templates?.(parsed) ?? []) {
        const { errors } = validateTemplate(template);
        if (errors.length > 0) {
          throw new NodeValidationError(path, errors[0], { nodeType });
        }
      }

      checkStructuredOutput(nodeType, structuredOutput);
    },

    plan(metadata, inputShape, structuredOutput) {
      return definition.plan(parseMetadata(nodeType, schema, metadata), inputShape, structuredOutput);
    },

    async execute(input, metadata, context) {
      return definition.execute(input, parseMetadata(nodeType, schema, metadata), context);
    },
  };
}

// =============================================================================
// Validation Helpers
// =============================================================================

function parseMetadata<S extends z.ZodTypeAny>(nodeType: NodeType, schema: S, metadata: unknown): z.infer<S> {
  if (!isRecord(metadata)) {
    throw new NodeValidationError('metadata', 'must be an object', { nodeType });
  }
  const result = schema.safeParse(metadata);
  if (!result.success) {
    throw fromZodError(nodeType, 'metadata', result.error);
  }
  const parsed: z.infer<S> = result.data;
  return parsed;
}

function checkStructuredOutput(nodeType: NodeType, structuredOutput: unknown): void {
  if (!isRecord(structuredOutput)) {
    throw new NodeValidationError('structured_output', 'must be an object', { nodeType });
  }
  if (Object.keys(structuredOutput).length === 0) return;

  const result = structuredOutputSchema(structuredOutput).safeParse(structuredOutput);
  if (!result.success) {
    throw fromZodError(nodeType, 'structured_output', result.error);
  }
}

/**
 * Convert the first zod issue into a field-addressed validation error
 */
export function fromZodError(nodeType: NodeType, root: string, error: z.ZodError): NodeValidationError {
  const issue = error.issues[0];
  if (issue === undefined) {
    return new NodeValidationError(root, 'is invalid', { nodeType, cause: error });
  }

  const path = [root, ...issue.path.map(String)].join('.');
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return new NodeValidationError(`${path}.${issue.keys[0]}`, 'unknown key', { nodeType, cause: error });
  }
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return new NodeValidationError(path, 'is required', { nodeType, cause: error });
  }
  return new NodeValidationError(path, issue.message, { nodeType, cause: error });
}

// =============================================================================
// Execution Helpers
// =============================================================================

/**
 * Evaluate a configured expression against the node's input, with optional
 * extra keys (`item`, `index`) layered over it.
 */
export function evaluateField(
  expression: string,
  path: string,
  input: Record<string, unknown>,
  context: NodeExecutionContext,
  extra?: Record<string, unknown>
): Promise<unknown> {
  return evaluateExpression(
    expression,
    { base: context.base, input: extra ? { ...input, ...extra } : input },
    { timeoutMs: context.expressionTimeoutMs, path }
  );
}

/**
 * Read a selector result as a list: nothing is empty, a single value is a
 * list of one.
 */
export function asItems(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

export function requireCollaborator<T>(value: T | undefined, name: string, nodeType: NodeType): T {
  if (value === undefined) {
    throw new ConfigurationError(`${nodeType} node requires a ${name}, but none is configured`, { nodeType });
  }
  return value;
}

/**
 * Dotted paths of every expression leaf in a nested map
 */
export function expressionLeaves(value: Record<string, unknown>, path: string): ConfiguredField[] {
  const leaves: ConfiguredField[] = [];
  for (const [key, entry] of Object.entries(value)) {
    const entryPath = `${path}.${key}`;
    if (typeof entry === 'string') {
      leaves.push([entryPath, entry]);
    } else if (isRecord(entry)) {
      leaves.push(...expressionLeaves(entry, entryPath));
    }
  }
  return leaves;
}

/**
 * Evaluate every string leaf of a nested map as an expression; other
 * leaves pass through as literals.
 */
export async function evaluateMap(
  value: Record<string, unknown>,
  path: string,
  input: Record<string, unknown>,
  context: NodeExecutionContext
): Promise<Record<string, unknown>> {
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const entryPath = `${path}.${key}`;
    if (typeof entry === 'string') {
      setOwn(out, key, await evaluateField(entry, entryPath, input, context));
    } else if (isRecord(entry)) {
      setOwn(out, key, await evaluateMap(entry, entryPath, input, context));
    } else {
      setOwn(out, key, entry);
    }
  }
  return out;
}
