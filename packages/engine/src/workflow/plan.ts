/**
 * Shape Planner
 *
 * Propagates mock data shapes through a validated graph in topological
 * order, so configuration tooling can reason about what each node will see
 * before anything runs.
 *
 * @module @nodeflow/engine/workflow/plan
 */

import type { NodeServiceRegistry } from '../nodes/types.js';
import { createNodeServiceRegistry, getNodeService } from '../nodes/registry.js';
import { InvalidGraphError, NodeValidationError } from '../errors.js';
import type { PlannedNode, Shape, WorkflowEdge, WorkflowNode, WorkflowTriggers } from './schema.js';
import { buildGraph, getParents, type WorkflowGraph } from './graph.js';
import { extractShapeFromStructuredOutput, shapeOfValue, unionMerge } from './shape.js';
import { validateDag } from './validation.js';

export interface PlanOptions {
  /** Defaults to a registry without collaborators */
  registry?: NodeServiceRegistry;
  triggers?: WorkflowTriggers;
}

/**
 * Plan a workflow.
 *
 * @throws InvalidGraphError when the graph fails validation
 */
export function planWorkflow(
  nodes: readonly WorkflowNode[],
  edges: readonly WorkflowEdge[],
  startingInputs: Record<string, unknown> = {},
  options: PlanOptions = {}
): PlannedNode[] {
  const validation = validateDag(nodes, edges, options.triggers);
  if (validation.errors.length > 0) {
    throw new InvalidGraphError(validation.errors);
  }

  const registry = options.registry ?? createNodeServiceRegistry();
  const graph = buildGraph(nodes, edges);
  const order = validation.topoOrder;
  const startingShape = shapeOfValue(startingInputs);
  const outputs = new Map<string, Shape>();
  const planned: PlannedNode[] = [];

  for (const nodeId of order) {
    const node = graph.nodes.get(nodeId);
    if (!node) continue;

    const { shape: inputShape, notes } = mergeParentShapes(graph, nodeId, order, outputs, startingShape);
    let outputShape: Shape;

    if (Object.keys(node.structuredOutput).length > 0) {
      outputShape = extractShapeFromStructuredOutput(node.structuredOutput);
    } else {
      try {
        outputShape = getNodeService(registry, node.nodeType).plan(node.metadata, inputShape, node.structuredOutput);
      } catch (error) {
        if (!(error instanceof NodeValidationError)) throw error;
        outputShape = {};
        notes.push(`Metadata failed validation: ${error.message}`);
      }
    }

    outputs.set(nodeId, outputShape);
    planned.push({ nodeId, nodeType: node.nodeType, inputShape, outputShape, notes });
  }

  return planned;
}

/**
 * Union of the parents' output shapes in topological order; entry nodes see
 * the starting inputs.
 */
function mergeParentShapes(
  graph: WorkflowGraph,
  nodeId: string,
  order: readonly string[],
  outputs: ReadonlyMap<string, Shape>,
  startingShape: Shape
): { shape: Shape; notes: string[] } {
  const parents = getParents(graph, nodeId);
  if (parents.length === 0) {
    return { shape: { ...startingShape }, notes: [] };
  }

  const sources = [...parents]
    .sort((a, b) => order.indexOf(a) - order.indexOf(b))
    .map((parentId) => ({ nodeId: parentId, value: outputs.get(parentId) ?? {} }));

  const { merged, notes } = unionMerge(sources);
  return { shape: merged, notes };
}
