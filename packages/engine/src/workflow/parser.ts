/**
 * Workflow Parser
 *
 * Reads workflow documents from JSON or YAML text and files, checks them
 * against the document schema and normalizes them into the node/edge lists
 * the validator, planner and executor consume.
 *
 * @module @nodeflow/engine/workflow/parser
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError } from '@nodeflow/core';
import {
  WorkflowDocument,
  type DagValidationResult,
  type WorkflowEdge,
  type WorkflowGraphInput,
  type WorkflowNode,
} from './schema.js';
import { validateDag } from './validation.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Error thrown when a document cannot be read or does not match the schema
 */
export class WorkflowParseError extends ValidationError {
  readonly source?: string;

  constructor(message: string, options?: { source?: string; cause?: Error; fieldErrors?: Record<string, string> }) {
    super(message, {
      cause: options?.cause,
      fieldErrors: options?.fieldErrors,
      context: options?.source ? { source: options.source } : undefined,
    });
    this.name = 'WorkflowParseError';
    this.source = options?.source;
  }
}

export type DocumentFormat = 'json' | 'yaml';

export interface ParseOptions {
  /** Run the DAG validator over the parsed graph (default: true) */
  validate?: boolean;
  /** Source identifier for error messages */
  source?: string;
}

/**
 * A parsed document and the graph it describes
 */
export interface ParsedWorkflow {
  document: WorkflowDocument;
  workflowId: string;
  graph: Required<WorkflowGraphInput>;
  /** Present when validation was requested */
  validation?: DagValidationResult;
  format: DocumentFormat;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a workflow document from JSON or YAML text
 *
 * @throws WorkflowParseError
 *
 * @example
 * ```typescript
 * const { graph, validation } = parseWorkflowDocument(`
 * id: greet
 * triggers: { isApi: true }
 * nodes:
 *   - id: hello
 *     nodeType: map
 *     metadata: { mapping: { greeting: "'hi ' & input.name" } }
 * `);
 * ```
 */
export function parseWorkflowDocument(input: string, options: ParseOptions = {}): ParsedWorkflow {
  const { validate = true, source } = options;
  const trimmed = input.trim();
  if (trimmed === '') {
    throw new WorkflowParseError('Workflow document is empty', { source });
  }

  const format = detectFormat(trimmed);
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(trimmed) : parseYaml(trimmed);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new WorkflowParseError(`Failed to parse ${format}: ${cause.message}`, { source, cause });
  }

  const result = WorkflowDocument.safeParse(raw);
  if (!result.success) {
    throw fromSchemaError(result.error, source);
  }

  const document = result.data;
  const graph = toGraphInput(document);
  return {
    document,
    workflowId: document.id,
    graph,
    validation: validate ? validateDag(graph.nodes, graph.edges, graph.triggers) : undefined,
    format,
  };
}

/**
 * Parse a workflow document from a `.json`, `.yaml` or `.yml` file
 */
export async function parseWorkflowFile(filePath: string, options: ParseOptions = {}): Promise<ParsedWorkflow> {
  const content = await readFile(filePath, 'utf-8');
  return parseWorkflowDocument(content, { ...options, source: filePath });
}

/**
 * Nodes inherit the document id as their workflow id; edges without an id
 * get `parent->child`.
 */
export function toGraphInput(document: WorkflowDocument): Required<WorkflowGraphInput> {
  const nodes: WorkflowNode[] = document.nodes.map((node) => ({
    ...node,
    workflowId: node.workflowId ?? document.id,
  }));
  const edges: WorkflowEdge[] = document.edges.map((edge) => ({
    ...edge,
    id: edge.id ?? `${edge.parentId}->${edge.childId}`,
  }));
  return { nodes, edges, triggers: document.triggers };
}

// =============================================================================
// Serialization
// =============================================================================

export function serializeWorkflowDocument(document: WorkflowDocument, format: DocumentFormat = 'yaml'): string {
  return format === 'json' ? JSON.stringify(document, null, 2) : stringifyYaml(document);
}

// =============================================================================
// Utility Functions
// =============================================================================

function detectFormat(input: string): DocumentFormat {
  return input.startsWith('{') || input.startsWith('[') ? 'json' : 'yaml';
}

function fromSchemaError(error: z.ZodError, source: string | undefined): WorkflowParseError {
  const fieldErrors: Record<string, string> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || '(root)';
    fieldErrors[path] ??= issue.message;
  }
  const summary = Object.entries(fieldErrors)
    .map(([path, message]) => `${path}: ${message}`)
    .join('; ');
  return new WorkflowParseError(`Invalid workflow document: ${summary}`, { source, cause: error, fieldErrors });
}
