/**
 * Data-Shaping Nodes
 *
 * filter, map, merge, split and advanced operate on the merged node input
 * only; none of them call out of the process.
 *
 * @module @nodeflow/engine/nodes/transform
 */

import { evaluatePredicate } from '../expression/evaluator.js';
import { isRecord, setOwn, typeName } from '../workflow/shape.js';
import type { Shape } from '../workflow/schema.js';
import { NodeValidationError } from '../errors.js';
import { AdvancedMetadata, FilterMetadata, MapMetadata, MergeMetadata, SplitMetadata } from './metadata.js';
import type { MergeStrategy } from './metadata.js';
import { asItems, defineNodeService, evaluateField, type ConfiguredField } from './base.js';
import type { NodeService, ParentOutput } from './types.js';

// =============================================================================
// Filter
// =============================================================================

export const filterService: NodeService = defineNodeService({
  nodeType: 'filter',
  schema: FilterMetadata,
  expressions: (metadata) => {
    const fields: ConfiguredField[] = [['metadata.where', metadata.where]];
    if (metadata.items_selector !== undefined) {
      fields.push(['metadata.items_selector', metadata.items_selector]);
    }
    return fields;
  },

  plan: (_metadata, inputShape) => ({ ...inputShape, items: 'array' }),

  async execute(input, metadata, context) {
    const source =
      metadata.items_selector === undefined
        ? input.data.items
        : await evaluateField(metadata.items_selector, 'metadata.items_selector', input.data, context);

    const kept: unknown[] = [];
    for (const [index, item] of asItems(source).entries()) {
      const keep = await evaluatePredicate(
        metadata.where,
        { base: context.base, input: { ...input.data, item, index } },
        { timeoutMs: context.expressionTimeoutMs, path: 'metadata.where' }
      );
      if (keep) kept.push(item);
    }
    return { ...input.data, items: kept };
  },
});

// =============================================================================
// Map
// =============================================================================

export const mapService: NodeService = defineNodeService({
  nodeType: 'map',
  schema: MapMetadata,
  expressions: (metadata) =>
    Object.entries(metadata.mapping).flatMap(([key, value]): ConfiguredField[] =>
      typeof value === 'string' ? [[`metadata.mapping.${key}`, value]] : []
    ),

  plan(metadata) {
    const shape: Shape = {};
    for (const [key, value] of Object.entries(metadata.mapping)) {
      setOwn(shape, key, typeof value === 'string' ? 'unknown' : typeName(value));
    }
    return shape;
  },

  async execute(input, metadata, context) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata.mapping)) {
      out[key] =
        typeof value === 'string'
          ? await evaluateField(value, `metadata.mapping.${key}`, input.data, context)
          : value;
    }
    return out;
  },
});

// =============================================================================
// Merge
// =============================================================================

/**
 * Combine parent outputs.
 *
 * - union: shallow merge, later parent in topological order wins
 * - concat: arrays concatenated and objects unioned, in topological order
 * - prefer_left: first non-null value per key, in edge declaration order
 */
export function mergeOutputs(parents: readonly ParentOutput[], strategy: MergeStrategy): Record<string, unknown> {
  const byTopo = [...parents].sort((a, b) => a.topoIndex - b.topoIndex);
  const merged: Record<string, unknown> = {};

  switch (strategy) {
    case 'union':
      for (const parent of byTopo) {
        for (const [key, value] of Object.entries(parent.output)) setOwn(merged, key, value);
      }
      break;

    case 'concat':
      for (const parent of byTopo) {
        for (const [key, value] of Object.entries(parent.output)) {
          const existing = Object.hasOwn(merged, key) ? merged[key] : undefined;
          if (Array.isArray(existing) && Array.isArray(value)) {
            setOwn(merged, key, [...existing, ...value]);
          } else if (isRecord(existing) && isRecord(value)) {
            setOwn(merged, key, { ...existing, ...value });
          } else {
            setOwn(merged, key, value);
          }
        }
      }
      break;

    case 'prefer_left':
      for (const parent of parents) {
        for (const [key, value] of Object.entries(parent.output)) {
          const present = Object.hasOwn(merged, key);
          const existing = present ? merged[key] : undefined;
          if (!present || ((existing === null || existing === undefined) && value !== null)) {
            setOwn(merged, key, value);
          }
        }
      }
      break;
  }

  return merged;
}

export const mergeService: NodeService = defineNodeService({
  nodeType: 'merge',
  schema: MergeMetadata,

  plan: (_metadata, inputShape) => ({ ...inputShape, merged_data: 'object' }),

  async execute(input, metadata, context) {
    if (metadata.expected_parents !== undefined && metadata.expected_parents !== input.parents.length) {
      context.warn(`Merge node expected ${metadata.expected_parents} parents, received ${input.parents.length}`, {
        expected: metadata.expected_parents,
        received: input.parents.length,
      });
    }

    const parents: ParentOutput[] =
      input.parents.length > 0 ? input.parents : [{ nodeId: context.nodeId, topoIndex: 0, output: input.data }];
    const merged = mergeOutputs(parents, metadata.strategy);
    return { ...merged, merged_data: merged };
  },
});

// =============================================================================
// Split
// =============================================================================

function groupKey(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? 'null';
}

export const splitService: NodeService = defineNodeService({
  nodeType: 'split',
  schema: SplitMetadata,
  expressions: (metadata) => {
    const fields: ConfiguredField[] = [['metadata.items_selector', metadata.items_selector]];
    if (metadata.mode === 'group_by' && metadata.by !== undefined) {
      fields.push(['metadata.by', metadata.by]);
    }
    return fields;
  },

  plan: (metadata): Shape => (metadata.mode === 'chunk' ? { chunks: 'array' } : { groups: 'object' }),

  async execute(input, metadata, context) {
    const items = asItems(
      await evaluateField(metadata.items_selector, 'metadata.items_selector', input.data, context)
    );

    if (metadata.mode === 'chunk') {
      const size = metadata.chunk_size;
      if (size === undefined) {
        throw new NodeValidationError('metadata.chunk_size', 'is required when mode is chunk', { nodeType: 'split' });
      }
      const chunks: unknown[][] = [];
      for (let start = 0; start < items.length; start += size) {
        chunks.push(items.slice(start, start + size));
      }
      return { chunks };
    }

    const by = metadata.by;
    if (by === undefined) {
      throw new NodeValidationError('metadata.by', 'is required when mode is group_by', { nodeType: 'split' });
    }
    const groups = new Map<string, unknown[]>();
    for (const [index, item] of items.entries()) {
      const key = groupKey(await evaluateField(by, 'metadata.by', input.data, context, { item, index }));
      const group = groups.get(key);
      if (group) {
        group.push(item);
      } else {
        groups.set(key, [item]);
      }
    }
    return { groups: Object.fromEntries(groups) };
  },
});

// =============================================================================
// Advanced
// =============================================================================

export const advancedService: NodeService = defineNodeService({
  nodeType: 'advanced',
  schema: AdvancedMetadata,
  expressions: (metadata) => [['metadata.expression', metadata.expression]],

  plan: () => ({ result: 'unknown' }),

  async execute(input, metadata, context) {
    const value = await evaluateField(metadata.expression, 'metadata.expression', input.data, context);
    return isRecord(value) ? value : { result: value };
  },
});
