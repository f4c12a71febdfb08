/**
 * Workflow Executor
 *
 * Drives one run through a validated graph in topological order, one node
 * at a time:
 *
 * 1. Resolve the node input from the actual outputs of executed ancestors
 *    (entry nodes receive the starting inputs)
 * 2. Emit `node_start`
 * 3. Call the node service with the node's retry and timeout settings
 * 4. On success emit `node_output`; on failure apply `on_error`
 * 5. After the last node emit `run_succeeded` or `run_failed` and finish
 *
 * if_else deactivates the edges of the untaken branch; nodes left without
 * an active parent edge are skipped with `branch_skipped`. for_each runs its
 * descendants once per item, sequentially. workflow nodes run the child
 * graph inside the same run, with `depth` and `parentNodeId` on its events.
 *
 * Cancellation is checked between nodes and between for_each items.
 *
 * @module @nodeflow/engine/run/executor
 */

import {
  ConfigurationError,
  NotFoundError,
  TimeoutError,
  ValidationError,
  createTraceContext,
  getLogger,
  getMetricsRegistry,
  retry,
  setTraceContext,
  toError,
  withChildSpan,
  type Logger,
  type MetricsRegistry,
} from '@nodeflow/core';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import { getBaseDefaults } from '../expression/evaluator.js';
import { InvalidGraphError, NodeExecutionError, RunNotFoundError } from '../errors.js';
import { asItems } from '../nodes/base.js';
import { CommonMetadata, ForEachMetadata, type OnErrorPolicy } from '../nodes/metadata.js';
import { createNodeServiceRegistry, getNodeService } from '../nodes/registry.js';
import type {
  NodeExecutionContext,
  NodeInput,
  NodeServiceRegistry,
  ParentOutput,
  SubWorkflowOptions,
  WorkflowGraphSource,
} from '../nodes/types.js';
import { resolveAvailableData } from '../workflow/available.js';
import { buildGraph, getDescendants, getParents, outdegree, type WorkflowGraph } from '../workflow/graph.js';
import type { WorkflowEdge, WorkflowGraphInput, WorkflowNode } from '../workflow/schema.js';
import { setOwn, unionMerge } from '../workflow/shape.js';
import { validateDag } from '../workflow/validation.js';
import { CancellationToken, CancelledError } from './cancellation.js';
import { getRunRegistry, type RunRegistry } from './registry.js';
import { createRunLogger, type RunLogger } from './run-logger.js';
import type { FinishedStatus, RunKind } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface WorkflowExecutorOptions {
  /** Defaults to a registry without collaborators */
  services?: NodeServiceRegistry;
  /** Defaults to the process run registry */
  runs?: RunRegistry;
  /** Where workflow nodes load their child graphs from */
  graphSource?: WorkflowGraphSource;
  config?: Partial<EngineConfig>;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export interface ExecuteOptions {
  /** Defaults to the workflow id of the first node */
  workflowId?: string;
  kind?: RunKind;
  /** Caller identity, forwarded to sub-workflows that propagate it */
  identity?: Record<string, unknown>;
  /** Values layered over the default `base` expression root */
  base?: Record<string, unknown>;
}

export interface RunCounts {
  executed: number;
  failed: number;
  skipped: number;
}

export interface RunOutcome {
  runId: string;
  status: FinishedStatus;
  /** Output per executed top-level node */
  outputs: Record<string, Record<string, unknown>>;
  /** Output of the return node, when one ran */
  returnValue?: Record<string, unknown>;
  errors: string[];
  counts: RunCounts;
  durationMs: number;
}

/**
 * One graph being walked: the top-level workflow or a sub-workflow
 */
interface GraphRun {
  graph: WorkflowGraph;
  order: string[];
  startingInputs: Record<string, unknown>;
}

/**
 * Per-pass execution settings; for_each items and sub-workflows derive
 * their own frame
 */
interface Frame {
  runId: string;
  workflowId: string;
  depth: number;
  /** Stamped on every event of this frame */
  scope: Record<string, unknown>;
  events: RunLogger;
  token: CancellationToken;
  base: Record<string, unknown>;
  identity?: Record<string, unknown>;
  counts: RunCounts;
  logger: Logger;
}

interface PassResult {
  outputs: Map<string, Record<string, unknown>>;
  /** Nodes executed by this pass (seeded outputs excluded) */
  executed: Set<string>;
  failure?: { nodeId: string; error: Error };
  returnValue?: Record<string, unknown>;
}

interface NodePolicy {
  onError: OnErrorPolicy;
  retries: number;
  timeoutMs?: number;
}

type SkipEvent = 'branch_skipped' | 'node_skipped';

type Invocation = { ok: true; output: Record<string, unknown> } | { ok: false; error: Error };

// =============================================================================
// Executor
// =============================================================================

export class WorkflowExecutor {
  private readonly services: NodeServiceRegistry;
  private readonly runs: RunRegistry;
  private readonly graphSource?: WorkflowGraphSource;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly tokens = new Map<string, CancellationToken>();
  private readonly outcomes = new Map<string, Promise<RunOutcome>>();

  constructor(options: WorkflowExecutorOptions = {}) {
    this.services = options.services ?? createNodeServiceRegistry();
    this.runs = options.runs ?? getRunRegistry();
    this.graphSource = options.graphSource;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
    this.logger = options.logger ?? getLogger('workflow-executor');
    this.metrics = options.metrics ?? getMetricsRegistry();
  }

  /**
   * Register a run and start driving it; returns the run id at once.
   * Progress is observable through the run registry.
   */
  execute(graph: WorkflowGraphInput, startingInputs: Record<string, unknown> = {}, options: ExecuteOptions = {}): string {
    this.pruneOutcomes();

    const { runId } = this.runs.create(options.kind ?? 'workflow');
    const token = new CancellationToken();
    this.tokens.set(runId, token);
    this.outcomes.set(runId, this.drive(runId, graph, startingInputs, options, token));
    return runId;
  }

  /**
   * Resolve once the run has finished
   *
   * @throws RunNotFoundError for runs this executor did not start
   */
  async waitForRun(runId: string): Promise<RunOutcome> {
    const outcome = this.outcomes.get(runId);
    if (!outcome) {
      throw new RunNotFoundError(runId);
    }
    return outcome;
  }

  /**
   * Execute and wait
   */
  async runWorkflow(
    graph: WorkflowGraphInput,
    startingInputs: Record<string, unknown> = {},
    options: ExecuteOptions = {}
  ): Promise<RunOutcome> {
    return this.waitForRun(this.execute(graph, startingInputs, options));
  }

  /**
   * Request cancellation; takes effect before the next node starts.
   * Returns false when the run is not in progress.
   */
  cancel(runId: string, reason = 'Cancelled by request'): boolean {
    const token = this.tokens.get(runId);
    if (!token) return false;
    token.cancel({ initiator: 'user', reason, requestedAt: new Date() });
    return true;
  }

  // ===========================================================================
  // Run Lifecycle
  // ===========================================================================

  private async drive(
    runId: string,
    input: WorkflowGraphInput,
    startingInputs: Record<string, unknown>,
    options: ExecuteOptions,
    token: CancellationToken
  ): Promise<RunOutcome> {
    const startedAt = Date.now();
    const workflowId = options.workflowId ?? input.nodes[0]?.workflowId ?? 'inline';
    const logger = this.logger.child({ runId, workflowId });
    const counts: RunCounts = { executed: 0, failed: 0, skipped: 0 };
    const finish = (status: FinishedStatus, errors: string[], pass?: PassResult): RunOutcome =>
      this.complete({ runId, startedAt, counts, logger, status, errors, pass });

    try {
      this.runs.markRunning(runId);
      this.metrics.increment('nodeflow_runs_started_total', { kind: options.kind ?? 'workflow' });
      logger.info('Run started', { nodeCount: input.nodes.length, edgeCount: input.edges.length });

      return await setTraceContext(createTraceContext(runId, { workflowId }), async () => {
        const validation = validateDag(input.nodes, input.edges, input.triggers);
        if (validation.errors.length > 0) {
          return finish('failed', validation.errors);
        }

        const frame: Frame = {
          runId,
          workflowId,
          depth: 0,
          scope: {},
          events: createRunLogger(this.runs, runId),
          token,
          base: { ...getBaseDefaults(), ...options.base },
          identity: options.identity,
          counts,
          logger,
        };
        const run = prepareRun(input.nodes, input.edges, validation.topoOrder, startingInputs);
        const pass = await this.runPass(frame, run, undefined, new Map());

        if (pass.failure) {
          return finish('failed', [`Node ${pass.failure.nodeId} failed: ${pass.failure.error.message}`], pass);
        }
        return finish('succeeded', [], pass);
      });
    } catch (error) {
      const cause = toError(error);
      const message = cause instanceof CancelledError ? cause.message : `Run aborted: ${cause.message}`;
      try {
        return finish('failed', [message]);
      } catch (recordError) {
        logger.error('Could not record run failure', recordError, { failure: message });
        return {
          runId,
          status: 'failed',
          outputs: {},
          errors: [message],
          counts,
          durationMs: Date.now() - startedAt,
        };
      }
    } finally {
      this.tokens.delete(runId);
    }
  }

  private complete(details: {
    runId: string;
    startedAt: number;
    counts: RunCounts;
    logger: Logger;
    status: FinishedStatus;
    errors: string[];
    pass?: PassResult;
  }): RunOutcome {
    const { runId, counts, logger, status, errors, pass } = details;
    const durationMs = Date.now() - details.startedAt;
    const summary = {
      status,
      counts: { ...counts },
      durationMs,
      returnValue: pass?.returnValue ?? null,
      errors,
    };

    if (status === 'succeeded') {
      this.runs.append(runId, { level: 'info', message: 'run_succeeded', data: summary });
      logger.info('Run succeeded', { durationMs, ...counts });
    } else {
      this.runs.append(runId, { level: 'error', message: 'run_failed', data: summary });
      logger.warn('Run failed', { durationMs, errors, ...counts });
    }
    this.runs.finish(runId, status);

    this.metrics.increment('nodeflow_runs_total', { status });
    this.metrics.timer('nodeflow_run_duration_ms', durationMs, { status });

    const outputs: Record<string, Record<string, unknown>> = {};
    for (const nodeId of pass?.executed ?? []) {
      const output = pass?.outputs.get(nodeId);
      if (output) setOwn(outputs, nodeId, output);
    }

    const outcome: RunOutcome = { runId, status, outputs, errors, counts: { ...counts }, durationMs };
    if (pass?.returnValue) outcome.returnValue = pass.returnValue;
    return outcome;
  }

  /**
   * Forget outcomes of runs the registry has evicted
   */
  private pruneOutcomes(): void {
    for (const runId of this.outcomes.keys()) {
      if (!this.tokens.has(runId) && !this.runs.get(runId)) {
        this.outcomes.delete(runId);
      }
    }
  }

  // ===========================================================================
  // Graph Walk
  // ===========================================================================

  /**
   * Execute the nodes of `run` (restricted to `scope` when given) in
   * topological order. `seed` holds outputs already available, such as the
   * enclosing for_each item.
   */
  private async runPass(
    frame: Frame,
    run: GraphRun,
    scope: ReadonlySet<string> | undefined,
    seed: ReadonlyMap<string, Record<string, unknown>>
  ): Promise<PassResult> {
    const outputs = new Map(seed);
    const executed = new Set<string>();
    const inactiveEdges = new Set<string>();
    const dependencySkipped = new Set<string>();
    const loopOwners = loopBodies(run, scope);
    // for_each nodes whose loop never ran, with the event their body reports
    const haltedLoops = new Map<string, SkipEvent>();
    let returnValue: Record<string, unknown> | undefined;

    for (const nodeId of run.order) {
      if (scope && !scope.has(nodeId)) continue;
      const node = run.graph.nodes.get(nodeId);
      if (!node) continue;

      frame.token.throwIfCancelled();

      const owner = loopOwners.get(nodeId);
      if (owner !== undefined) {
        const halted = haltedLoops.get(owner);
        if (halted === undefined) continue;
        frame.counts.skipped++;
        frame.events.info(
          halted,
          halted === 'node_skipped'
            ? { nodeId, nodeType: node.nodeType, reason: `Loop ${owner} did not run` }
            : { nodeId, nodeType: node.nodeType }
        );
        continue;
      }
      const halt = (event: SkipEvent): void => {
        if (node.nodeType === 'for_each') haltedLoops.set(nodeId, event);
      };

      const incoming = run.graph.incoming.get(nodeId) ?? [];
      const blockedBy = incoming.find((edge) => dependencySkipped.has(edge.parentId));
      if (blockedBy) {
        dependencySkipped.add(nodeId);
        halt('node_skipped');
        frame.counts.skipped++;
        frame.events.info('node_skipped', {
          nodeId,
          nodeType: node.nodeType,
          reason: `Depends on skipped node ${blockedBy.parentId}`,
        });
        continue;
      }

      const active = incoming.filter((edge) => outputs.has(edge.parentId) && !inactiveEdges.has(edge.id));
      if (incoming.length > 0 && active.length === 0) {
        halt('branch_skipped');
        frame.counts.skipped++;
        frame.events.info('branch_skipped', { nodeId, nodeType: node.nodeType });
        continue;
      }

      const input = this.resolveInput(frame, run, nodeId, active, outputs);
      const policy = readPolicy(node);
      frame.events.info('node_start', { nodeId, nodeType: node.nodeType });

      const invocation = await this.invoke(frame, node, input, policy);
      if (!invocation.ok) {
        frame.counts.failed++;
        const errorData = { nodeId, nodeType: node.nodeType, policy: policy.onError };

        if (policy.onError === 'continue') {
          frame.events.warn('node_error', {
            ...errorData,
            exception: { type: invocation.error.name, message: invocation.error.message },
          });
          // A failed if_else has no condition: neither branch runs
          if (node.nodeType === 'if_else') {
            for (const edge of run.graph.outgoing.get(nodeId) ?? []) inactiveEdges.add(edge.id);
          }
          halt('node_skipped');
          outputs.set(nodeId, {});
          executed.add(nodeId);
          continue;
        }

        frame.events.error('node_error', invocation.error, errorData);
        if (policy.onError === 'skip') {
          dependencySkipped.add(nodeId);
          halt('node_skipped');
          continue;
        }
        return { outputs, executed, failure: { nodeId, error: invocation.error }, returnValue };
      }

      let output = invocation.output;

      if (node.nodeType === 'if_else') {
        const branch = String(Boolean(output.condition_result));
        for (const edge of run.graph.outgoing.get(nodeId) ?? []) {
          if (edge.branchLabel !== branch) inactiveEdges.add(edge.id);
        }
      }

      if (node.nodeType === 'for_each') {
        const loop = await this.runLoop(frame, run, node, output, outputs, scope);
        if ('failure' in loop) {
          return { outputs, executed, failure: loop.failure, returnValue };
        }
        output = loop.output;
      }

      if (node.nodeType === 'return') {
        returnValue = output;
      }

      outputs.set(nodeId, output);
      executed.add(nodeId);
      frame.counts.executed++;
      frame.events.info('node_output', { nodeId, nodeType: node.nodeType, output });
    }

    return { outputs, executed, returnValue };
  }

  private resolveInput(
    frame: Frame,
    run: GraphRun,
    nodeId: string,
    activeEdges: readonly WorkflowEdge[],
    outputs: ReadonlyMap<string, Record<string, unknown>>
  ): NodeInput {
    if (getParents(run.graph, nodeId).length === 0) {
      return { data: { ...run.startingInputs }, parents: [] };
    }

    const parents: ParentOutput[] = activeEdges.map((edge) => ({
      nodeId: edge.parentId,
      topoIndex: run.order.indexOf(edge.parentId),
      output: outputs.get(edge.parentId) ?? {},
    }));

    const { merged, notes } = resolveAvailableData(nodeId, run.graph, outputs, { order: run.order });
    for (const note of notes) {
      frame.events.warn('node_warning', { nodeId, warning: note });
    }
    return { data: merged, parents };
  }

  /**
   * Run a for_each node's descendants once per item. Each item contributes
   * the outputs of the body's sink nodes.
   */
  private async runLoop(
    frame: Frame,
    run: GraphRun,
    node: WorkflowNode,
    output: Record<string, unknown>,
    outputs: ReadonlyMap<string, Record<string, unknown>>,
    scope: ReadonlySet<string> | undefined
  ): Promise<{ output: Record<string, unknown> } | { failure: { nodeId: string; error: Error } }> {
    const metadata = ForEachMetadata.safeParse(node.metadata);
    const flatten = metadata.success ? metadata.data.flatten : true;
    const items = asItems(output.items);

    const body = new Set([...getDescendants(run.graph, node.id)].filter((id) => !scope || scope.has(id)));
    const sinks = run.order.filter((id) => body.has(id) && outdegree(run.graph, id) === 0);
    const results: unknown[] = [];

    for (const [index, item] of items.entries()) {
      frame.token.throwIfCancelled();

      const seed = new Map(outputs);
      seed.set(node.id, { ...output, item, index });
      const itemScope = { ...frame.scope, forEachNodeId: node.id, iteration: index };
      const itemFrame: Frame = {
        ...frame,
        scope: itemScope,
        events: createRunLogger(this.runs, frame.runId, itemScope),
      };

      const pass = await this.runPass(itemFrame, run, body, seed);
      if (pass.failure) {
        return { failure: pass.failure };
      }

      const itemResults = sinks.filter((id) => pass.executed.has(id)).map((id) => pass.outputs.get(id) ?? {});
      if (flatten) {
        results.push(...itemResults);
      } else {
        results.push(itemResults);
      }
    }

    return { output: { ...output, items_processed: items.length, results } };
  }

  // ===========================================================================
  // Node Invocation
  // ===========================================================================

  private async invoke(frame: Frame, node: WorkflowNode, input: NodeInput, policy: NodePolicy): Promise<Invocation> {
    const service = getNodeService(this.services, node.nodeType);
    const labels = { nodeType: node.nodeType };
    const stopTimer = this.metrics.startTimer('nodeflow_node_duration_ms', labels);
    const logger = frame.logger.child({ nodeId: node.id, nodeType: node.nodeType });

    const context = (signal: AbortSignal | undefined): NodeExecutionContext => ({
      runId: frame.runId,
      workflowId: frame.workflowId,
      nodeId: node.id,
      base: frame.base,
      structuredOutput: node.structuredOutput,
      expressionTimeoutMs: this.config.expressionTimeoutMs,
      signal,
      logger,
      identity: frame.identity,
      warn: (message, data) => {
        frame.events.warn('node_warning', { nodeId: node.id, nodeType: node.nodeType, warning: message, ...data });
      },
      runSubWorkflow: (workflowId, inputs, options) =>
        this.runSubWorkflow(frame, node.id, workflowId, inputs, options),
    });

    try {
      const output = await withChildSpan({ nodeId: node.id }, () =>
        retry(
          () => withTimeout((signal) => service.execute(input, node.metadata, context(signal)), policy.timeoutMs, node.id),
          {
            maxAttempts: policy.retries + 1,
            initialDelayMs: this.config.nodeRetryDelayMs,
            isRetryable: isNodeRetryable,
            onRetry: (attempt, error, delayMs) => {
              logger.warn('Retrying node', { attempt, delayMs, error: toError(error).message });
            },
          }
        )
      );
      this.metrics.increment('nodeflow_node_executions_total', { ...labels, outcome: 'success' });
      return { ok: true, output };
    } catch (error) {
      const cause = toError(error);
      // cancellation raised inside a sub-workflow ends the whole run
      if (cause instanceof CancelledError) throw cause;
      this.metrics.increment('nodeflow_node_executions_total', { ...labels, outcome: 'failure' });
      logger.error('Node failed', cause, { policy: policy.onError });
      return { ok: false, error: cause };
    } finally {
      stopTimer();
    }
  }

  /**
   * Load, validate and run a child workflow inside the current run.
   * Resolves with the return node's payload, or the merged outputs of the
   * child's sink nodes when it has no return node.
   */
  private async runSubWorkflow(
    frame: Frame,
    parentNodeId: string,
    workflowId: string,
    inputs: Record<string, unknown>,
    options: SubWorkflowOptions
  ): Promise<unknown> {
    const depth = frame.depth + 1;
    if (depth > this.config.maxWorkflowDepth) {
      throw new NodeExecutionError(
        `Sub-workflow ${workflowId} exceeds the maximum nesting depth of ${this.config.maxWorkflowDepth}`,
        { nodeId: parentNodeId, nodeType: 'workflow' }
      );
    }
    if (!this.graphSource) {
      throw new ConfigurationError('Sub-workflows require a workflow graph source', { workflowId });
    }

    const [nodes, edges] = await Promise.all([
      this.graphSource.listNodes(workflowId),
      this.graphSource.listEdges(workflowId),
    ]);
    if (nodes.length === 0) {
      throw new NotFoundError('Workflow', workflowId);
    }
    const validation = validateDag(nodes, edges, { isApi: true });
    if (validation.errors.length > 0) {
      throw new InvalidGraphError(validation.errors);
    }

    const scope = { depth, parentNodeId, workflowId };
    const child: Frame = {
      ...frame,
      workflowId,
      depth,
      scope,
      events: createRunLogger(this.runs, frame.runId, scope),
      identity: options.propagateIdentity ? frame.identity : undefined,
      logger: frame.logger.child({ workflowId, depth, parentNodeId }),
    };

    const run = prepareRun(nodes, edges, validation.topoOrder, inputs);
    const pass = await this.runPass(child, run, undefined, new Map());
    if (pass.failure) {
      throw new NodeExecutionError(
        `Sub-workflow ${workflowId} failed at node ${pass.failure.nodeId}: ${pass.failure.error.message}`,
        { nodeId: parentNodeId, nodeType: 'workflow', cause: pass.failure.error }
      );
    }

    if (pass.returnValue) {
      return pass.returnValue.payload;
    }
    const sinks = run.order
      .filter((id) => pass.executed.has(id) && outdegree(run.graph, id) === 0)
      .map((id) => ({ nodeId: id, value: pass.outputs.get(id) ?? {} }));
    return unionMerge(sinks).merged;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function prepareRun(
  nodes: readonly WorkflowNode[],
  edges: readonly WorkflowEdge[],
  order: string[],
  startingInputs: Record<string, unknown>
): GraphRun {
  return { graph: buildGraph(nodes, edges), order, startingInputs };
}

/**
 * Nodes driven by a for_each inside the given scope, mapped to that for_each.
 * The outermost for_each owns its whole descendant set; nested loops are
 * driven by their own item passes.
 */
function loopBodies(run: GraphRun, scope: ReadonlySet<string> | undefined): Map<string, string> {
  const owners = new Map<string, string>();
  for (const id of run.order) {
    if ((scope && !scope.has(id)) || owners.has(id)) continue;
    if (run.graph.nodes.get(id)?.nodeType !== 'for_each') continue;
    for (const descendant of getDescendants(run.graph, id)) {
      if ((!scope || scope.has(descendant)) && !owners.has(descendant)) owners.set(descendant, id);
    }
  }
  return owners;
}

/**
 * Common settings, read leniently: a node whose metadata fails validation
 * still fails through its service, under the default policy.
 */
function readPolicy(node: WorkflowNode): NodePolicy {
  const parsed = CommonMetadata.safeParse(node.metadata);
  if (!parsed.success) {
    return { onError: 'fail', retries: 0 };
  }
  return {
    onError: parsed.data.on_error ?? 'fail',
    retries: parsed.data.retry ?? 0,
    timeoutMs: parsed.data.timeout_ms,
  };
}

/**
 * Configuration problems fail the same way on every attempt
 */
function isNodeRetryable(error: unknown): boolean {
  return !(
    error instanceof ValidationError ||
    error instanceof ConfigurationError ||
    error instanceof InvalidGraphError ||
    error instanceof NotFoundError ||
    error instanceof CancelledError
  );
}

async function withTimeout<T>(
  fn: (signal: AbortSignal | undefined) => Promise<T>,
  timeoutMs: number | undefined,
  nodeId: string
): Promise<T> {
  if (timeoutMs === undefined) {
    return fn(undefined);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`Node ${nodeId} timed out after ${timeoutMs}ms`, timeoutMs, { operation: 'node_execute' }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
