/**
 * Available-Data Resolver
 *
 * What a node can reference: the union merge of the outputs of every
 * transitive ancestor. The executor resolves real outputs; configuration
 * tooling resolves planned shapes.
 *
 * @module @nodeflow/engine/workflow/available
 */

import type { Shape, WorkflowEdge, WorkflowNode } from './schema.js';
import { buildGraph, getAncestors, topologicalSort, type WorkflowGraph } from './graph.js';
import { sameType, sameValue, setOwn, unionMerge, type MergeResult } from './shape.js';
import { planWorkflow, type PlanOptions } from './plan.js';

export interface ResolveOptions<V> {
  /** Topological order to merge in; computed from the graph when absent */
  order?: readonly string[];
  /** Collision test; defaults to comparing type names */
  same?: (a: V, b: V) => boolean;
}

/**
 * Merge the outputs of every ancestor of `targetId` present in
 * `outputsByNode`, earlier topological position first, so the ancestor
 * latest in topological order wins a collision.
 */
export function resolveAvailableData<V>(
  targetId: string,
  graph: WorkflowGraph,
  outputsByNode: ReadonlyMap<string, Record<string, V>>,
  options: ResolveOptions<V> = {}
): MergeResult<V> {
  const ancestors = getAncestors(graph, targetId);
  const order = options.order ?? topologicalSort(graph).order;

  const sources = order
    .filter((id) => ancestors.has(id))
    .flatMap((id) => {
      const value = outputsByNode.get(id);
      return value === undefined ? [] : [{ nodeId: id, value }];
    });

  return unionMerge(sources, options.same ?? sameType);
}

/**
 * Fields a node can reference, as a shape, with collision notes
 */
export interface AvailableData {
  shape: Shape;
  notes: string[];
}

export interface AvailableDataOptions extends PlanOptions {
  startingInputs?: Record<string, unknown>;
}

/**
 * Per node, the merge of its ancestors' planned output shapes. Entry nodes
 * see the shape of the starting inputs.
 *
 * @throws InvalidGraphError when the graph fails validation
 */
export function availableDataMap(
  nodes: readonly WorkflowNode[],
  edges: readonly WorkflowEdge[],
  options: AvailableDataOptions = {}
): Record<string, AvailableData> {
  const planned = planWorkflow(nodes, edges, options.startingInputs ?? {}, options);
  const graph = buildGraph(nodes, edges);
  const order = planned.map((node) => node.nodeId);
  const shapes = new Map(planned.map((node): [string, Shape] => [node.nodeId, node.outputShape]));

  const available: Record<string, AvailableData> = {};
  for (const node of planned) {
    if (getAncestors(graph, node.nodeId).size === 0) {
      setOwn(available, node.nodeId, { shape: node.inputShape, notes: [] });
      continue;
    }
    const { merged, notes } = resolveAvailableData(node.nodeId, graph, shapes, { order, same: sameValue });
    setOwn(available, node.nodeId, { shape: merged, notes });
  }
  return available;
}
