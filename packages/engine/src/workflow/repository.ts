/**
 * Workflow Repository
 *
 * CRUD over nodes, edges and triggers, keyed by id and listed by workflow.
 * Edge invariants (no self edges, known endpoints in the same workflow, one
 * edge per parent/child pair) are enforced on write; deleting a node removes
 * every edge touching it.
 *
 * The in-memory implementation doubles as the {@link WorkflowGraphSource}
 * the executor loads sub-workflows from.
 *
 * @module @nodeflow/engine/workflow/repository
 */

import { ConflictError, NotFoundError, ValidationError } from '@nodeflow/core';
import type { WorkflowGraphSource } from '../nodes/types.js';
import { WorkflowEdge, WorkflowNode, type WorkflowGraphInput, type WorkflowTriggers } from './schema.js';

// =============================================================================
// Interface
// =============================================================================

export type NodeUpdate = Partial<Pick<WorkflowNode, 'nodeType' | 'metadata' | 'structuredOutput'>>;

export interface WorkflowRepository extends WorkflowGraphSource {
  createNode(node: WorkflowNode): Promise<WorkflowNode>;
  getNode(nodeId: string): Promise<WorkflowNode | null>;
  updateNode(nodeId: string, update: NodeUpdate): Promise<WorkflowNode>;
  /** Removes the node and every edge touching it; false when absent */
  deleteNode(nodeId: string): Promise<boolean>;

  createEdge(edge: WorkflowEdge): Promise<WorkflowEdge>;
  getEdge(edgeId: string): Promise<WorkflowEdge | null>;
  updateEdgeLabel(edgeId: string, branchLabel: string | null): Promise<WorkflowEdge>;
  deleteEdge(edgeId: string): Promise<boolean>;

  getTriggers(workflowId: string): Promise<WorkflowTriggers>;
  setTriggers(workflowId: string, triggers: WorkflowTriggers): Promise<void>;

  /** Replace a workflow's nodes, edges and triggers */
  saveWorkflow(workflowId: string, graph: WorkflowGraphInput): Promise<void>;
  /** Remove a workflow's nodes, edges and triggers */
  deleteWorkflow(workflowId: string): Promise<void>;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

/**
 * Map-backed repository. Stored entities are copies; callers cannot mutate
 * them in place.
 */
export class MemoryWorkflowRepository implements WorkflowRepository {
  private nodes = new Map<string, WorkflowNode>();
  private edges = new Map<string, WorkflowEdge>();
  private triggers = new Map<string, WorkflowTriggers>();

  async createNode(node: WorkflowNode): Promise<WorkflowNode> {
    const parsed = WorkflowNode.parse(node);
    if (this.nodes.has(parsed.id)) {
      throw new ConflictError(`Node ${parsed.id} already exists`, { nodeId: parsed.id });
    }
    this.nodes.set(parsed.id, structuredClone(parsed));
    return structuredClone(parsed);
  }

  async getNode(nodeId: string): Promise<WorkflowNode | null> {
    const node = this.nodes.get(nodeId);
    return node ? structuredClone(node) : null;
  }

  async updateNode(nodeId: string, update: NodeUpdate): Promise<WorkflowNode> {
    const existing = this.nodes.get(nodeId);
    if (!existing) {
      throw new NotFoundError('Node', nodeId);
    }
    const updated = WorkflowNode.parse({ ...existing, ...update });
    this.nodes.set(nodeId, structuredClone(updated));
    return structuredClone(updated);
  }

  async deleteNode(nodeId: string): Promise<boolean> {
    if (!this.nodes.delete(nodeId)) return false;
    for (const [edgeId, edge] of this.edges) {
      if (edge.parentId === nodeId || edge.childId === nodeId) {
        this.edges.delete(edgeId);
      }
    }
    return true;
  }

  async listNodes(workflowId: string): Promise<WorkflowNode[]> {
    return [...this.nodes.values()]
      .filter((node) => node.workflowId === workflowId)
      .map((node) => structuredClone(node));
  }

  async createEdge(edge: WorkflowEdge): Promise<WorkflowEdge> {
    const parsed = WorkflowEdge.parse(edge);
    if (this.edges.has(parsed.id)) {
      throw new ConflictError(`Edge ${parsed.id} already exists`, { edgeId: parsed.id });
    }
    if (parsed.parentId === parsed.childId) {
      throw new ValidationError(`Edge ${parsed.id} connects node ${parsed.parentId} to itself`, {
        fieldErrors: { childId: 'must differ from parentId' },
      });
    }

    const parent = this.nodes.get(parsed.parentId);
    if (!parent) throw new NotFoundError('Node', parsed.parentId);
    const child = this.nodes.get(parsed.childId);
    if (!child) throw new NotFoundError('Node', parsed.childId);
    if (parent.workflowId !== child.workflowId) {
      throw new ValidationError(`Edge ${parsed.id} crosses workflows`, {
        context: { parentWorkflowId: parent.workflowId, childWorkflowId: child.workflowId },
      });
    }

    for (const existing of this.edges.values()) {
      if (existing.parentId === parsed.parentId && existing.childId === parsed.childId) {
        throw new ConflictError(`Duplicate edge from ${parsed.parentId} to ${parsed.childId}`, {
          edgeId: existing.id,
        });
      }
    }

    this.edges.set(parsed.id, structuredClone(parsed));
    return structuredClone(parsed);
  }

  async getEdge(edgeId: string): Promise<WorkflowEdge | null> {
    const edge = this.edges.get(edgeId);
    return edge ? structuredClone(edge) : null;
  }

  async updateEdgeLabel(edgeId: string, branchLabel: string | null): Promise<WorkflowEdge> {
    const existing = this.edges.get(edgeId);
    if (!existing) {
      throw new NotFoundError('Edge', edgeId);
    }
    const updated: WorkflowEdge = { ...existing, branchLabel };
    this.edges.set(edgeId, updated);
    return structuredClone(updated);
  }

  async deleteEdge(edgeId: string): Promise<boolean> {
    return this.edges.delete(edgeId);
  }

  /**
   * Edges whose parent belongs to the workflow, in insertion order
   */
  async listEdges(workflowId: string): Promise<WorkflowEdge[]> {
    return [...this.edges.values()]
      .filter((edge) => this.nodes.get(edge.parentId)?.workflowId === workflowId)
      .map((edge) => structuredClone(edge));
  }

  async getTriggers(workflowId: string): Promise<WorkflowTriggers> {
    return { ...this.triggers.get(workflowId) };
  }

  async setTriggers(workflowId: string, triggers: WorkflowTriggers): Promise<void> {
    this.triggers.set(workflowId, { ...triggers });
  }

  async saveWorkflow(workflowId: string, graph: WorkflowGraphInput): Promise<void> {
    await this.deleteWorkflow(workflowId);
    for (const node of graph.nodes) {
      await this.createNode({ ...node, workflowId });
    }
    for (const edge of graph.edges) {
      await this.createEdge(edge);
    }
    if (graph.triggers) {
      await this.setTriggers(workflowId, graph.triggers);
    }
  }

  async deleteWorkflow(workflowId: string): Promise<void> {
    for (const node of await this.listNodes(workflowId)) {
      await this.deleteNode(node.id);
    }
    this.triggers.delete(workflowId);
  }
}
