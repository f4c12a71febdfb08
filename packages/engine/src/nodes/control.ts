/**
 * Control-Flow Nodes
 *
 * if_else and for_each compute what the executor needs to branch or
 * iterate; return shapes the run's response; workflow runs another workflow
 * inside the current run.
 *
 * @module @nodeflow/engine/nodes/control
 */

import { ConfigurationError } from '@nodeflow/core';
import { evaluatePredicate } from '../expression/evaluator.js';
import { ForEachMetadata, IfElseMetadata, ReturnMetadata, WorkflowCallMetadata } from './metadata.js';
import { asItems, defineNodeService, evaluateField, evaluateMap, expressionLeaves } from './base.js';
import type { NodeService } from './types.js';

export const ifElseService: NodeService = defineNodeService({
  nodeType: 'if_else',
  schema: IfElseMetadata,
  expressions: (metadata) => [['metadata.predicate', metadata.predicate]],

  plan: (_metadata, inputShape) => ({ ...inputShape, condition_result: 'boolean' }),

  async execute(input, metadata, context) {
    const conditionResult = await evaluatePredicate(
      metadata.predicate,
      { base: context.base, input: input.data },
      { timeoutMs: context.expressionTimeoutMs, path: 'metadata.predicate' }
    );
    return { ...input.data, condition_result: conditionResult };
  },
});

/**
 * Evaluates the item selector. The executor reads `items` and runs the
 * node's descendants once per item with `item` and `index` in scope.
 */
export const forEachService: NodeService = defineNodeService({
  nodeType: 'for_each',
  schema: ForEachMetadata,
  expressions: (metadata) => [['metadata.items_selector', metadata.items_selector]],

  plan: (_metadata, inputShape) => ({
    ...inputShape,
    item: 'unknown',
    index: 'number',
    items_processed: 'number',
    results: 'array',
  }),

  async execute(input, metadata, context) {
    const items = asItems(
      await evaluateField(metadata.items_selector, 'metadata.items_selector', input.data, context)
    );
    return { ...input.data, items };
  },
});

export const returnService: NodeService = defineNodeService({
  nodeType: 'return',
  schema: ReturnMetadata,
  expressions: (metadata) => [['metadata.payload_selector', metadata.payload_selector]],

  plan: () => ({ payload: 'unknown', content_type: 'string', status_code: 'number' }),

  async execute(input, metadata, context) {
    const payload = await evaluateField(metadata.payload_selector, 'metadata.payload_selector', input.data, context);
    return {
      payload: payload ?? null,
      content_type: metadata.content_type,
      status_code: metadata.status_code,
    };
  },
});

export const workflowService: NodeService = defineNodeService({
  nodeType: 'workflow',
  schema: WorkflowCallMetadata,
  expressions: (metadata) => expressionLeaves(metadata.input_mapping ?? {}, 'metadata.input_mapping'),

  plan: () => ({ result: 'unknown' }),

  async execute(input, metadata, context) {
    if (!context.runSubWorkflow) {
      throw new ConfigurationError('workflow nodes can only run inside a workflow executor', {
        nodeId: context.nodeId,
      });
    }

    const inputs =
      metadata.input_mapping === undefined
        ? input.data
        : await evaluateMap(metadata.input_mapping, 'metadata.input_mapping', input.data, context);

    const result = await context.runSubWorkflow(metadata.workflow_id, inputs, {
      propagateIdentity: metadata.propagate_identity,
    });
    return { result };
  },
});
