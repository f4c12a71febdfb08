/**
 * Workflow Graph Operations
 *
 * Adjacency, degree and reachability derived from a node/edge set, plus the
 * deterministic topological sort shared by the validator, planner and
 * executor. Graphs are computed per call and never persisted.
 *
 * @module @nodeflow/engine/workflow/graph
 */

import type { WorkflowEdge, WorkflowNode } from './schema.js';

// =============================================================================
// Graph Types
// =============================================================================

/**
 * Derived view over one workflow's nodes and edges
 */
export interface WorkflowGraph {
  /** Nodes indexed by id (first occurrence wins for duplicate ids) */
  nodes: Map<string, WorkflowNode>;
  /** Node ids in input order, duplicates removed */
  nodeIds: string[];
  /** Edges in input order whose endpoints both exist */
  edges: WorkflowEdge[];
  /** Parent ids per node, in edge declaration order */
  parents: Map<string, string[]>;
  /** Child ids per node, in edge declaration order */
  children: Map<string, string[]>;
  /** Outgoing edges per node, in edge declaration order */
  outgoing: Map<string, WorkflowEdge[]>;
  /** Incoming edges per node, in edge declaration order */
  incoming: Map<string, WorkflowEdge[]>;
}

/**
 * Result of a topological sort
 */
export interface TopologicalSortResult {
  /** Processed node ids; complete only when `remaining` is empty */
  order: string[];
  /** Node ids left with positive indegree (cycle members and their descendants) */
  remaining: string[];
}

// =============================================================================
// Id Ordering
// =============================================================================

const DIGITS = /^\d+$/;

/**
 * Compare node ids: all-digit ids compare numerically and sort before other
 * ids, which compare lexically.
 */
export function compareIds(a: string, b: string): number {
  const aNumeric = DIGITS.test(a);
  const bNumeric = DIGITS.test(b);

  if (aNumeric && bNumeric) {
    const diff = BigInt(a) - BigInt(b);
    if (diff !== 0n) return diff < 0n ? -1 : 1;
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

// =============================================================================
// Graph Construction
// =============================================================================

/**
 * Build the derived graph view.
 *
 * Edges referencing unknown nodes are left out of the adjacency maps; the
 * validator reports them separately.
 */
export function buildGraph(nodes: readonly WorkflowNode[], edges: readonly WorkflowEdge[]): WorkflowGraph {
  const nodeMap = new Map<string, WorkflowNode>();
  const nodeIds: string[] = [];

  for (const node of nodes) {
    if (!nodeMap.has(node.id)) {
      nodeMap.set(node.id, node);
      nodeIds.push(node.id);
    }
  }

  const parents = new Map<string, string[]>();
  const children = new Map<string, string[]>();
  const outgoing = new Map<string, WorkflowEdge[]>();
  const incoming = new Map<string, WorkflowEdge[]>();
  for (const id of nodeIds) {
    parents.set(id, []);
    children.set(id, []);
    outgoing.set(id, []);
    incoming.set(id, []);
  }

  const kept: WorkflowEdge[] = [];
  for (const edge of edges) {
    if (!nodeMap.has(edge.parentId) || !nodeMap.has(edge.childId)) {
      continue;
    }
    kept.push(edge);
    parents.get(edge.childId)?.push(edge.parentId);
    children.get(edge.parentId)?.push(edge.childId);
    outgoing.get(edge.parentId)?.push(edge);
    incoming.get(edge.childId)?.push(edge);
  }

  return { nodes: nodeMap, nodeIds, edges: kept, parents, children, outgoing, incoming };
}

export function getParents(graph: WorkflowGraph, nodeId: string): string[] {
  return graph.parents.get(nodeId) ?? [];
}

export function getChildren(graph: WorkflowGraph, nodeId: string): string[] {
  return graph.children.get(nodeId) ?? [];
}

export function indegree(graph: WorkflowGraph, nodeId: string): number {
  return getParents(graph, nodeId).length;
}

export function outdegree(graph: WorkflowGraph, nodeId: string): number {
  return getChildren(graph, nodeId).length;
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Kahn's algorithm. When several nodes are ready at once the lowest id
 * (see {@link compareIds}) goes first, so identical graphs always sort
 * identically.
 */
export function topologicalSort(graph: WorkflowGraph): TopologicalSortResult {
  const remainingDegree = new Map<string, number>();
  const ready: string[] = [];

  for (const id of graph.nodeIds) {
    const degree = indegree(graph, id);
    remainingDegree.set(id, degree);
    if (degree === 0) ready.push(id);
  }
  ready.sort(compareIds);

  const order: string[] = [];
  while (ready.length > 0) {
    const current = ready.shift();
    if (current === undefined) break;
    order.push(current);

    let added = false;
    for (const childId of getChildren(graph, current)) {
      const next = (remainingDegree.get(childId) ?? 0) - 1;
      remainingDegree.set(childId, next);
      if (next === 0) {
        ready.push(childId);
        added = true;
      }
    }
    if (added) ready.sort(compareIds);
  }

  const processed = new Set(order);
  const remaining = graph.nodeIds.filter((id) => !processed.has(id)).sort(compareIds);
  return { order, remaining };
}

/**
 * Find one cycle among the given candidate nodes, as a closed path
 * (`[a, b, c, a]`). Children are explored lowest id first.
 */
export function findCyclePath(graph: WorkflowGraph, candidates: readonly string[]): string[] {
  const visited = new Set<string>();
  const onStack = new Set<string>();
  const path: string[] = [];

  const visit = (nodeId: string): string[] | null => {
    if (onStack.has(nodeId)) {
      return [...path.slice(path.indexOf(nodeId)), nodeId];
    }
    if (visited.has(nodeId)) return null;

    visited.add(nodeId);
    onStack.add(nodeId);
    path.push(nodeId);

    for (const childId of [...getChildren(graph, nodeId)].sort(compareIds)) {
      const found = visit(childId);
      if (found) return found;
    }

    onStack.delete(nodeId);
    path.pop();
    return null;
  };

  for (const nodeId of [...candidates].sort(compareIds)) {
    const found = visit(nodeId);
    if (found) return found;
  }
  return [];
}

// =============================================================================
// Reachability
// =============================================================================

/**
 * All transitive parents of a node (edges followed backwards)
 */
export function getAncestors(graph: WorkflowGraph, nodeId: string): Set<string> {
  return walk(graph.parents, nodeId);
}

/**
 * All transitive children of a node
 */
export function getDescendants(graph: WorkflowGraph, nodeId: string): Set<string> {
  return walk(graph.children, nodeId);
}

function walk(adjacency: Map<string, string[]>, start: string): Set<string> {
  const seen = new Set<string>();
  const queue = [start];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of adjacency.get(current) ?? []) {
      if (next !== start && !seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }

  return seen;
}
