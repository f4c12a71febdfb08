/**
 * Node Service Types
 *
 * The contract every node type implements, the context the executor hands
 * to `execute()`, and the leaf collaborators (model, embeddings, vector
 * store, knowledge search, HTTP) that services call out to.
 *
 * @module @nodeflow/engine/nodes/types
 */

import type { Logger } from '@nodeflow/core';
import type { NodeType, Shape, WorkflowEdge, WorkflowNode } from '../workflow/schema.js';

// =============================================================================
// Leaf Collaborators
// =============================================================================

export interface CompletionRequest {
  model: string;
  prompt: string;
  system?: string;
  temperature?: number;
  maxTokens?: number;
  stop?: string[];
  signal?: AbortSignal;
}

/**
 * Text generation, used by job nodes
 */
export interface ModelClient {
  complete(request: CompletionRequest): Promise<{ text: string }>;
}

/**
 * Text embedding, used by embed nodes
 */
export interface EmbeddingClient {
  embed(request: { texts: string[]; model?: string; signal?: AbortSignal }): Promise<number[][]>;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  text: string;
  metadata: Record<string, unknown>;
}

export interface VectorMatch {
  id: string;
  score: number;
  text?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Vector storage, used by embed (upsert) and vector_query (search) nodes
 */
export interface VectorStore {
  upsert(request: { storeId: string; namespace?: string; records: VectorRecord[] }): Promise<void>;
  query(request: {
    storeId: string;
    namespace?: string;
    query: string;
    topK: number;
    filters?: Record<string, unknown>;
    signal?: AbortSignal;
  }): Promise<VectorMatch[]>;
}

/**
 * Knowledge-base search, used by guru nodes
 */
export interface KnowledgeClient {
  search(request: {
    space: string;
    query: string;
    topK: number;
    filters?: Record<string, unknown>;
    signal?: AbortSignal;
  }): Promise<unknown[]>;
}

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  params?: Record<string, unknown>;
  data?: unknown;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Outbound HTTP, used by get_api and post_api nodes.
 *
 * Implementations resolve for every status code; nodes decide what counts
 * as a failure.
 */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Node/edge read model for one workflow, used to load sub-workflows
 */
export interface WorkflowGraphSource {
  listNodes(workflowId: string): Promise<WorkflowNode[]>;
  listEdges(workflowId: string): Promise<WorkflowEdge[]>;
}

/**
 * Everything services may call out to. Missing collaborators fail the node
 * that needs them with a ConfigurationError.
 */
export interface NodeCollaborators {
  model?: ModelClient;
  embeddings?: EmbeddingClient;
  vectorStore?: VectorStore;
  knowledge?: KnowledgeClient;
  /** Defaults to the axios-backed client */
  http?: HttpClient;
  /** Named header sets referenced by `auth_preset` */
  authPresets?: Record<string, Record<string, string>>;
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Output of one parent, as handed to a node with several parents
 */
export interface ParentOutput {
  nodeId: string;
  /** Position of the parent in the run's topological order */
  topoIndex: number;
  output: Record<string, unknown>;
}

/**
 * Real input of a node
 */
export interface NodeInput {
  /** Union merge of every executed ancestor's output */
  data: Record<string, unknown>;
  /** Direct parents, in edge declaration order */
  parents: ParentOutput[];
}

export interface SubWorkflowOptions {
  propagateIdentity: boolean;
}

/**
 * Per-call context supplied by the executor
 */
export interface NodeExecutionContext {
  runId: string;
  workflowId: string;
  nodeId: string;
  /** Values exposed to expressions under `base` */
  base: Record<string, unknown>;
  structuredOutput: Record<string, unknown>;
  expressionTimeoutMs: number;
  signal?: AbortSignal;
  logger: Logger;
  /** Caller identity, forwarded to sub-workflows when asked to */
  identity?: Record<string, unknown>;
  /** Surface a non-fatal finding as a run event */
  warn(message: string, data?: Record<string, unknown>): void;
  /**
   * Run another workflow inside the current run and resolve with its
   * result; absent outside the executor
   */
  runSubWorkflow?: (
    workflowId: string,
    inputs: Record<string, unknown>,
    options: SubWorkflowOptions
  ) => Promise<unknown>;
}

// =============================================================================
// Service Contract
// =============================================================================

/**
 * Per-type behavior
 */
export interface NodeService {
  readonly nodeType: NodeType;

  /**
   * @throws NodeValidationError naming the offending field
   */
  validate(metadata: unknown, structuredOutput: unknown): void;

  /**
   * Indicative output shape, computed without running anything.
   *
   * @throws NodeValidationError when the metadata does not parse
   */
  plan(metadata: unknown, inputShape: Shape, structuredOutput: Record<string, unknown>): Shape;

  execute(
    input: NodeInput,
    metadata: unknown,
    context: NodeExecutionContext
  ): Promise<Record<string, unknown>>;
}

/**
 * One service per node type; a missing type is a compile error
 */
export type NodeServiceRegistry = { readonly [K in NodeType]: NodeService };
