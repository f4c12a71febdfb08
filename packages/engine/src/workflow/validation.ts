/**
 * Workflow DAG Validation
 *
 * Structural checks over a node/edge set. Validation never throws: every
 * finding lands in the result as an error or warning so a UI can render a
 * graph that fails only some rules.
 *
 * Rules, in order:
 * 0. Structural integrity (duplicate ids, dangling, self and duplicate edges)
 * 1. Acyclicity (Kahn's algorithm, one representative cycle reported)
 * 2. Fan-in: only merge nodes may have more than one parent
 * 3. Return placement: indegree >= 1, outdegree 0, no for_each ancestor
 *    Loop boundaries: a for_each body node may only have parents inside the
 *    body, the for_each itself, or the for_each's ancestors
 * 4. Branch labels: "true"/"false" on if_else edges, none elsewhere
 * 5. Isolated nodes are allowed
 * 6. Trigger sanity (warnings only; no triggers given means none configured)
 *
 * @module @nodeflow/engine/workflow/validation
 */

import { isValidCron } from '@nodeflow/core';
import type {
  DagIssue,
  DagIssueCode,
  DagValidationResult,
  WorkflowEdge,
  WorkflowNode,
  WorkflowTriggers,
} from './schema.js';
import {
  buildGraph,
  compareIds,
  findCyclePath,
  getAncestors,
  getDescendants,
  indegree,
  outdegree,
  topologicalSort,
  type WorkflowGraph,
} from './graph.js';

// =============================================================================
// Issue Collection
// =============================================================================

class IssueCollector {
  readonly issues: DagIssue[] = [];

  error(code: DagIssueCode, message: string, nodeId?: string, relatedIds?: string[]): void {
    this.issues.push(clean({ code, severity: 'error', message, nodeId, relatedIds }));
  }

  warn(code: DagIssueCode, message: string, nodeId?: string, relatedIds?: string[]): void {
    this.issues.push(clean({ code, severity: 'warning', message, nodeId, relatedIds }));
  }

  result(topoOrder: string[]): DagValidationResult {
    const errors = this.issues.filter((i) => i.severity === 'error').map((i) => i.message);
    const warnings = this.issues.filter((i) => i.severity === 'warning').map((i) => i.message);
    return {
      errors,
      warnings,
      topoOrder: errors.length === 0 ? topoOrder : [],
      issues: this.issues,
    };
  }
}

function clean(issue: DagIssue): DagIssue {
  const out: DagIssue = { code: issue.code, severity: issue.severity, message: issue.message };
  if (issue.nodeId !== undefined) out.nodeId = issue.nodeId;
  if (issue.relatedIds !== undefined) out.relatedIds = issue.relatedIds;
  return out;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a workflow graph.
 *
 * @example
 * ```typescript
 * const result = validateDag(nodes, edges, { isApi: true });
 * if (result.errors.length === 0) {
 *   console.log('Execution order:', result.topoOrder);
 * }
 * ```
 */
export function validateDag(
  nodes: readonly WorkflowNode[],
  edges: readonly WorkflowEdge[],
  triggers?: WorkflowTriggers
): DagValidationResult {
  const collector = new IssueCollector();
  const graph = buildGraph(nodes, edges);

  checkStructure(nodes, edges, graph, collector);
  const topoOrder = checkCycles(graph, collector);
  checkFanIn(graph, collector);
  checkReturnPlacement(graph, collector);
  if (topoOrder.length > 0) {
    checkLoopBoundaries(graph, collector);
  }
  checkBranchLabels(graph, collector);
  checkTriggers(triggers ?? {}, collector);

  return collector.result(topoOrder);
}

function checkStructure(
  nodes: readonly WorkflowNode[],
  edges: readonly WorkflowEdge[],
  graph: WorkflowGraph,
  collector: IssueCollector
): void {
  const seenNodes = new Set<string>();
  const reported = new Set<string>();
  for (const node of nodes) {
    if (seenNodes.has(node.id) && !reported.has(node.id)) {
      collector.error('DUPLICATE_NODE', `Duplicate node id: ${node.id}`, node.id);
      reported.add(node.id);
    }
    seenNodes.add(node.id);
  }

  const seenPairs = new Set<string>();
  for (const edge of edges) {
    for (const endpoint of [edge.parentId, edge.childId]) {
      if (!graph.nodes.has(endpoint)) {
        collector.error(
          'UNKNOWN_ENDPOINT',
          `Edge ${edge.id} references unknown node ${endpoint}`,
          endpoint,
          [edge.parentId, edge.childId]
        );
      }
    }

    if (edge.parentId === edge.childId) {
      collector.error('SELF_EDGE', `Edge ${edge.id} connects node ${edge.parentId} to itself`, edge.parentId);
    }

    const pair = JSON.stringify([edge.parentId, edge.childId]);
    if (seenPairs.has(pair)) {
      collector.error(
        'DUPLICATE_EDGE',
        `Duplicate edge from ${edge.parentId} to ${edge.childId}`,
        edge.childId,
        [edge.parentId]
      );
    }
    seenPairs.add(pair);
  }
}

function checkCycles(graph: WorkflowGraph, collector: IssueCollector): string[] {
  const { order, remaining } = topologicalSort(graph);
  if (remaining.length === 0) {
    return order;
  }

  const cycle = findCyclePath(graph, remaining);
  const path = cycle.length > 0 ? cycle : remaining.slice(0, 3);
  collector.error('CYCLE', `Cycle detected in graph: ${path.join(' -> ')}`, path[0], path);
  return [];
}

function checkFanIn(graph: WorkflowGraph, collector: IssueCollector): void {
  for (const id of graph.nodeIds) {
    const node = graph.nodes.get(id);
    const count = indegree(graph, id);
    if (node && count > 1 && node.nodeType !== 'merge') {
      collector.error(
        'FAN_IN',
        `Node ${id} (type: ${node.nodeType}) has ${count} parents but is not a merge node`,
        id,
        graph.parents.get(id)
      );
    }
  }
}

function checkReturnPlacement(graph: WorkflowGraph, collector: IssueCollector): void {
  for (const id of graph.nodeIds) {
    if (graph.nodes.get(id)?.nodeType !== 'return') continue;

    if (indegree(graph, id) === 0) {
      collector.error('RETURN_PLACEMENT', `Return node ${id} has no incoming edges`, id);
    }
    if (outdegree(graph, id) > 0) {
      collector.error('RETURN_PLACEMENT', `Return node ${id} has outgoing edges`, id, graph.children.get(id));
    }

    const forEachAncestor = [...getAncestors(graph, id)]
      .sort(compareIds)
      .find((ancestorId) => graph.nodes.get(ancestorId)?.nodeType === 'for_each');
    if (forEachAncestor !== undefined) {
      collector.error(
        'RETURN_PLACEMENT',
        `Return node ${id} is nested under for_each node ${forEachAncestor}`,
        id,
        [forEachAncestor]
      );
    }
  }
}

function checkLoopBoundaries(graph: WorkflowGraph, collector: IssueCollector): void {
  const reported = new Set<string>();
  for (const loopId of graph.nodeIds) {
    if (graph.nodes.get(loopId)?.nodeType !== 'for_each') continue;

    const body = getDescendants(graph, loopId);
    const upstream = getAncestors(graph, loopId);
    for (const id of [...body].sort(compareIds)) {
      for (const parentId of graph.parents.get(id) ?? []) {
        if (parentId === loopId || body.has(parentId) || upstream.has(parentId)) continue;
        const pair = JSON.stringify([parentId, id]);
        if (reported.has(pair)) continue;
        reported.add(pair);
        collector.error(
          'LOOP_BOUNDARY',
          `Node ${id} in the loop body of for_each node ${loopId} has parent ${parentId} outside the loop`,
          id,
          [loopId, parentId]
        );
      }
    }
  }
}

function checkBranchLabels(graph: WorkflowGraph, collector: IssueCollector): void {
  for (const id of graph.nodeIds) {
    const node = graph.nodes.get(id);
    if (!node) continue;
    const outgoing = graph.outgoing.get(id) ?? [];

    if (node.nodeType === 'if_else') {
      let trueCount = 0;
      let falseCount = 0;
      for (const edge of outgoing) {
        if (edge.branchLabel === 'true') {
          trueCount++;
        } else if (edge.branchLabel === 'false') {
          falseCount++;
        } else {
          const found = edge.branchLabel == null ? 'no branch_label' : `branch_label '${edge.branchLabel}'`;
          collector.error(
            'BRANCH_LABEL',
            `If-else node ${id} has edge to ${edge.childId} with ${found}; expected 'true' or 'false'`,
            id,
            [edge.childId]
          );
        }
      }
      if (trueCount !== 1 || falseCount !== 1) {
        collector.warn(
          'BRANCH_COVERAGE',
          `If-else node ${id} should have exactly one 'true' and one 'false' edge (found ${trueCount} true, ${falseCount} false)`,
          id
        );
      }
      continue;
    }

    for (const edge of outgoing) {
      if (edge.branchLabel != null) {
        collector.error(
          'BRANCH_LABEL',
          `Node ${id} (type: ${node.nodeType}) has edge to ${edge.childId} with branch_label '${edge.branchLabel}', but only if_else nodes can have branch labels`,
          id,
          [edge.childId]
        );
      }
    }
  }
}

function checkTriggers(triggers: WorkflowTriggers, collector: IssueCollector): void {
  const cron = triggers.cronSchedule?.trim();

  if (cron && !isValidCron(cron)) {
    collector.warn('INVALID_CRON', `invalid cron schedule: ${cron}`);
  }
  if (!cron && !triggers.isApi) {
    collector.warn('NO_TRIGGER', 'no trigger configured');
  }
}
