/**
 * Workflow Schema
 *
 * Zod schemas for the workflow graph (nodes, edges, triggers), for the
 * results the validator and planner hand back, and for workflow documents.
 * Each schema doubles as the TypeScript type of the same name.
 *
 * @module @nodeflow/engine/workflow/schema
 */

import { z } from 'zod';

// =============================================================================
// Node Types
// =============================================================================

/**
 * The closed set of node types a workflow may contain.
 *
 * - AI: job, embed
 * - Resources: guru, get_api, post_api, vector_query
 * - Actions: filter, map, if_else, for_each, merge, split, advanced, return, workflow
 */
export const NodeType = z.enum([
  'job',
  'embed',
  'guru',
  'get_api',
  'post_api',
  'vector_query',
  'filter',
  'map',
  'if_else',
  'for_each',
  'merge',
  'split',
  'advanced',
  'return',
  'workflow',
]);

export type NodeType = z.infer<typeof NodeType>;

export const NODE_TYPES: readonly NodeType[] = NodeType.options;

/**
 * Branch labels carried by edges leaving an if_else node
 */
export const BranchLabel = z.enum(['true', 'false']);

export type BranchLabel = z.infer<typeof BranchLabel>;

// =============================================================================
// Shapes
// =============================================================================

/**
 * A shape value is a type name ("string", "number", ...) or a nested shape.
 */
export type ShapeValue = string | { [key: string]: ShapeValue };

/**
 * Keys of an object mapped to their type names, without concrete values.
 */
export type Shape = { [key: string]: ShapeValue };

export const ShapeValue: z.ZodType<ShapeValue> = z.lazy(() =>
  z.union([z.string(), z.record(z.string(), ShapeValue)])
);

export const Shape: z.ZodType<Shape> = z.record(z.string(), ShapeValue);

// =============================================================================
// Graph Entities
// =============================================================================

/**
 * A typed step in a workflow.
 *
 * `metadata` is type-specific configuration, opaque here and validated by
 * the node's service. `structuredOutput` is a JSON-schema-like declaration
 * of the node's output, empty when undeclared.
 */
export const WorkflowNode = z.object({
  id: z.string().min(1),
  workflowId: z.string().min(1),
  nodeType: NodeType,
  metadata: z.record(z.string(), z.unknown()).default({}),
  structuredOutput: z.record(z.string(), z.unknown()).default({}),
});

export type WorkflowNode = z.infer<typeof WorkflowNode>;

/**
 * A parent -> child dependency. Only edges leaving an if_else carry a label.
 */
export const WorkflowEdge = z.object({
  id: z.string().min(1),
  parentId: z.string().min(1),
  childId: z.string().min(1),
  branchLabel: z.string().nullable().optional(),
});

export type WorkflowEdge = z.infer<typeof WorkflowEdge>;

/**
 * How a workflow may be started
 */
export const WorkflowTriggers = z.object({
  /** 5-field cron expression */
  cronSchedule: z.string().nullable().optional(),

  /** Whether the workflow can be invoked through the API */
  isApi: z.boolean().optional(),
});

export type WorkflowTriggers = z.infer<typeof WorkflowTriggers>;

// =============================================================================
// Validation Result
// =============================================================================

/**
 * Structured issue codes for DAG rule findings
 */
export const DagIssueCode = z.enum([
  'DUPLICATE_NODE',
  'UNKNOWN_ENDPOINT',
  'SELF_EDGE',
  'DUPLICATE_EDGE',
  'CYCLE',
  'FAN_IN',
  'RETURN_PLACEMENT',
  'LOOP_BOUNDARY',
  'BRANCH_LABEL',
  'BRANCH_COVERAGE',
  'NO_TRIGGER',
  'INVALID_CRON',
]);

export type DagIssueCode = z.infer<typeof DagIssueCode>;

export const DagIssue = z.object({
  code: DagIssueCode,
  severity: z.enum(['error', 'warning']),
  message: z.string(),
  /** Node the finding is about */
  nodeId: z.string().optional(),
  /** Other nodes involved (cycle members, conflicting parents) */
  relatedIds: z.array(z.string()).optional(),
});

export type DagIssue = z.infer<typeof DagIssue>;

/**
 * Outcome of validating a graph. `topoOrder` is meaningful only when
 * `errors` is empty.
 */
export const DagValidationResult = z.object({
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  topoOrder: z.array(z.string()),
  issues: z.array(DagIssue),
});

export type DagValidationResult = z.infer<typeof DagValidationResult>;

// =============================================================================
// Plan
// =============================================================================

/**
 * Advisory per-node input and output shapes computed before execution
 */
export const PlannedNode = z.object({
  nodeId: z.string(),
  nodeType: NodeType,
  inputShape: Shape,
  outputShape: Shape,
  notes: z.array(z.string()),
});

export type PlannedNode = z.infer<typeof PlannedNode>;

// =============================================================================
// Workflow Document
// =============================================================================

/**
 * A whole workflow as authored in a JSON or YAML file
 *
 * @example
 * ```yaml
 * id: triage
 * triggers:
 *   isApi: true
 * nodes:
 *   - id: classify
 *     nodeType: job
 *     metadata:
 *       prompt: "Classify {{ input.ticket }}"
 *       model_name: small
 *   - id: done
 *     nodeType: return
 *     metadata:
 *       payload_selector: input.text
 * edges:
 *   - parentId: classify
 *     childId: done
 * ```
 */
export const WorkflowDocument = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  description: z.string().optional(),
  triggers: WorkflowTriggers.default({}),
  nodes: z.array(
    WorkflowNode.omit({ workflowId: true }).extend({ workflowId: z.string().min(1).optional() })
  ),
  edges: z
    .array(WorkflowEdge.extend({ id: z.string().min(1).optional() }))
    .default([]),
});

export type WorkflowDocument = z.infer<typeof WorkflowDocument>;

/**
 * The pieces validation, planning and execution consume
 */
export interface WorkflowGraphInput {
  nodes: WorkflowNode[];
  edges: WorkflowEdge[];
  triggers?: WorkflowTriggers;
}
