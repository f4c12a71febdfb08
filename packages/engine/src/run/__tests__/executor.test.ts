/**
 * Tests for the workflow executor
 *
 * Graphs run against in-process fakes for the model client and the
 * workflow repository.
 *
 * @module @nodeflow/engine/run/__tests__/executor
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { DefaultMetricsRegistry } from '@nodeflow/core';
import { RunNotFoundError } from '../../errors.js';
import { createNodeServiceRegistry } from '../../nodes/registry.js';
import type { ModelClient } from '../../nodes/types.js';
import { MemoryWorkflowRepository } from '../../workflow/repository.js';
import type { WorkflowEdge, WorkflowGraphInput, WorkflowNode } from '../../workflow/schema.js';
import { WorkflowExecutor, type WorkflowExecutorOptions } from '../executor.js';
import { RunRegistry } from '../registry.js';
import type { RunEvent } from '../types.js';

// =============================================================================
// Fixtures
// =============================================================================

function node(
  id: string,
  nodeType: WorkflowNode['nodeType'],
  metadata: Record<string, unknown>,
  workflowId = 'wf-main'
): WorkflowNode {
  return { id, workflowId, nodeType, metadata, structuredOutput: {} };
}

function edge(parentId: string, childId: string, branchLabel?: string): WorkflowEdge {
  return { id: `${parentId}->${childId}`, parentId, childId, branchLabel };
}

function graph(nodes: WorkflowNode[], edges: WorkflowEdge[] = []): WorkflowGraphInput {
  return { nodes, edges, triggers: { isApi: true } };
}

function messages(events: readonly RunEvent[]): string[] {
  return events.map((event) => `${event.message}:${String(event.data.nodeId ?? '')}`);
}

function failing(id: string, onError?: string): WorkflowNode {
  const metadata: Record<string, unknown> = { expression: "$error('boom')" };
  if (onError) metadata.on_error = onError;
  return node(id, 'advanced', metadata);
}

// =============================================================================
// Tests
// =============================================================================

describe('WorkflowExecutor', () => {
  let runs: RunRegistry;
  let metrics: DefaultMetricsRegistry;
  let model: ModelClient;
  let complete: Mock<ModelClient['complete']>;

  function createExecutor(options: WorkflowExecutorOptions = {}): WorkflowExecutor {
    return new WorkflowExecutor({
      services: createNodeServiceRegistry({ model }),
      runs,
      metrics,
      config: { nodeRetryDelayMs: 0 },
      ...options,
    });
  }

  beforeEach(() => {
    metrics = new DefaultMetricsRegistry();
    runs = new RunRegistry({ metrics });
    complete = vi.fn<ModelClient['complete']>(async () => ({ text: 'done' }));
    model = { complete };
  });

  describe('linear run', () => {
    const linear = graph(
      [
        node('A', 'map', { mapping: { items: 'input.numbers', topic: 'input.topic' } }),
        node('B', 'filter', { where: 'input.item > 1' }),
        node('C', 'job', { prompt: 'Write about {{ input.topic }}', model_name: 'test-model' }),
        node('D', 'merge', {}),
      ],
      [edge('A', 'B'), edge('B', 'C'), edge('C', 'D')]
    );

    it('should emit start/output pairs in topological order and one summary', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(linear, { numbers: [1, 2, 3], topic: 'cats' });

      const state = runs.get(outcome.runId);
      expect(state?.status).toBe('succeeded');
      expect(state?.finishedAt).toBeInstanceOf(Date);
      expect(messages(state?.events ?? [])).toEqual([
        'node_start:A',
        'node_output:A',
        'node_start:B',
        'node_output:B',
        'node_start:C',
        'node_output:C',
        'node_start:D',
        'node_output:D',
        'run_succeeded:',
      ]);
    });

    it('should feed each node the outputs of its ancestors', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(linear, { numbers: [1, 2, 3], topic: 'cats' });

      expect(outcome.status).toBe('succeeded');
      expect(outcome.outputs.A).toEqual({ items: [1, 2, 3], topic: 'cats' });
      expect(outcome.outputs.B).toEqual({ items: [2, 3], topic: 'cats' });
      expect(outcome.outputs.C).toEqual({ text: 'done' });
      expect(outcome.outputs.D).toEqual({ text: 'done', merged_data: { text: 'done' } });
      expect(complete).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'test-model', prompt: 'Write about cats' })
      );
    });

    it('should summarize counts on the final event', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(linear, { numbers: [1, 2, 3], topic: 'cats' });

      const summary = runs.get(outcome.runId)?.events.at(-1);
      expect(summary?.level).toBe('info');
      expect(summary?.data.status).toBe('succeeded');
      expect(summary?.data.counts).toEqual({ executed: 4, failed: 0, skipped: 0 });
      expect(summary?.data.returnValue).toBeNull();
      expect(metrics.getCounter('nodeflow_runs_total', { status: 'succeeded' })).toBe(1);
    });

    it('should return the run id before the run finishes', async () => {
      const executor = createExecutor();
      const runId = executor.execute(linear, { numbers: [1], topic: 'dogs' });

      expect(runs.get(runId)?.finishedAt).toBeUndefined();
      const outcome = await executor.waitForRun(runId);
      expect(outcome.runId).toBe(runId);
      expect(runs.get(runId)?.status).toBe('succeeded');
    });
  });

  describe('diamond run', () => {
    const diamond = graph(
      [
        node('A', 'job', { prompt: 'Summarize {{ input.text }}', model_name: 'test-model' }),
        node('B', 'filter', { where: 'input.item > 1' }),
        node('C', 'map', { mapping: { summary: 'input.text', limit: 10 } }),
        node('D', 'merge', {}),
      ],
      [edge('A', 'B'), edge('A', 'C'), edge('B', 'D'), edge('C', 'D')]
    );

    it('should run each node once and merge both branches', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(diamond, { text: 'hello world' });

      const state = runs.get(outcome.runId);
      expect(state?.finishedAt).toBeInstanceOf(Date);
      expect(messages(state?.events ?? [])).toEqual([
        'node_start:A',
        'node_output:A',
        'node_start:B',
        'node_output:B',
        'node_start:C',
        'node_output:C',
        'node_start:D',
        'node_output:D',
        'run_succeeded:',
      ]);

      const merged = { text: 'done', items: [], summary: 'done', limit: 10 };
      expect(outcome.outputs.D).toEqual({ ...merged, merged_data: merged });
      expect(complete).toHaveBeenCalledWith(expect.objectContaining({ prompt: 'Summarize hello world' }));
    });
  });

  describe('invalid graphs', () => {
    it('should fail without executing any node', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph([node('A', 'map', { mapping: { x: 1 } }), node('B', 'map', { mapping: { y: 2 } })], [
          edge('A', 'B'),
          edge('B', 'A'),
        ])
      );

      expect(outcome.status).toBe('failed');
      expect(outcome.errors[0]).toContain('Cycle detected in graph');
      expect(messages(runs.get(outcome.runId)?.events ?? [])).toEqual(['run_failed:']);
    });
  });

  describe('on_error policies', () => {
    it('should stop the run on fail', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph([failing('A'), node('B', 'map', { mapping: { x: 1 } })], [edge('A', 'B')])
      );

      expect(outcome.status).toBe('failed');
      expect(outcome.errors).toHaveLength(1);
      expect(outcome.errors[0]).toMatch(/^Node A failed: /);
      expect(messages(runs.get(outcome.runId)?.events ?? [])).toEqual([
        'node_start:A',
        'node_error:A',
        'run_failed:',
      ]);
    });

    it('should skip dependents on skip and keep running', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph(
          [failing('A', 'skip'), node('B', 'map', { mapping: { x: 1 } }), node('C', 'map', { mapping: { y: 2 } })],
          [edge('A', 'B')]
        )
      );

      const events = runs.get(outcome.runId)?.events ?? [];
      expect(outcome.status).toBe('succeeded');
      expect(messages(events)).toEqual([
        'node_start:A',
        'node_error:A',
        'node_skipped:B',
        'node_start:C',
        'node_output:C',
        'run_succeeded:',
      ]);
      expect(events[1]?.level).toBe('error');
      expect(events[2]?.data.reason).toBe('Depends on skipped node A');
      expect(outcome.counts).toEqual({ executed: 1, failed: 1, skipped: 1 });
      expect(outcome.outputs.B).toBeUndefined();
    });

    it('should record an empty output on continue', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph([failing('A', 'continue'), node('B', 'map', { mapping: { x: 1 } })], [edge('A', 'B')])
      );

      const events = runs.get(outcome.runId)?.events ?? [];
      expect(outcome.status).toBe('succeeded');
      expect(events[1]?.message).toBe('node_error');
      expect(events[1]?.level).toBe('warn');
      expect(outcome.outputs.A).toEqual({});
      expect(outcome.outputs.B).toEqual({ x: 1 });
    });
  });

  describe('retry and timeout', () => {
    it('should retry a failing node up to its retry count', async () => {
      complete
        .mockRejectedValueOnce(new Error('flaky'))
        .mockRejectedValueOnce(new Error('flaky'))
        .mockResolvedValueOnce({ text: 'third time' });
      const executor = createExecutor();

      const outcome = await executor.runWorkflow(
        graph([node('A', 'job', { prompt: 'hi', model_name: 'test-model', retry: 2 })])
      );

      expect(outcome.status).toBe('succeeded');
      expect(outcome.outputs.A).toEqual({ text: 'third time' });
      expect(complete).toHaveBeenCalledTimes(3);
    });

    it('should not retry configuration errors', async () => {
      const executor = createExecutor({ services: createNodeServiceRegistry() });

      const outcome = await executor.runWorkflow(
        graph([node('A', 'job', { prompt: 'hi', model_name: 'test-model', retry: 3 })])
      );

      expect(outcome.status).toBe('failed');
      expect(outcome.errors).toEqual(['Node A failed: job node requires a model client, but none is configured']);
    });

    it('should fail a node that exceeds timeout_ms', async () => {
      complete.mockImplementation(() => new Promise<{ text: string }>(() => undefined));
      const executor = createExecutor();

      const outcome = await executor.runWorkflow(
        graph([node('A', 'job', { prompt: 'hi', model_name: 'test-model', timeout_ms: 20 })])
      );

      expect(outcome.status).toBe('failed');
      expect(outcome.errors).toEqual(['Node A failed: Node A timed out after 20ms']);
    });
  });

  describe('if_else', () => {
    const branching = graph(
      [
        node('A', 'if_else', { predicate: 'input.score > 5' }),
        node('B', 'map', { mapping: { branch: 1 } }),
        node('C', 'map', { mapping: { branch: 2 } }),
        node('D', 'map', { mapping: { after: 3 } }),
      ],
      [edge('A', 'B', 'true'), edge('A', 'C', 'false'), edge('C', 'D')]
    );

    it('should run the taken branch and skip the other', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(branching, { score: 7 });

      expect(outcome.outputs.A).toEqual({ score: 7, condition_result: true });
      expect(outcome.outputs.B).toEqual({ branch: 1 });
      expect(messages(runs.get(outcome.runId)?.events ?? [])).toEqual([
        'node_start:A',
        'node_output:A',
        'node_start:B',
        'node_output:B',
        'branch_skipped:C',
        'branch_skipped:D',
        'run_succeeded:',
      ]);
      expect(outcome.counts).toEqual({ executed: 2, failed: 0, skipped: 2 });
    });

    it('should follow the false edge', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(branching, { score: 2 });

      expect(outcome.outputs.B).toBeUndefined();
      expect(outcome.outputs.C).toEqual({ branch: 2 });
      expect(outcome.outputs.D).toEqual({ after: 3 });
    });

    it('should skip both branches when a continued if_else fails', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph(
          [
            node('A', 'if_else', { predicate: "$error('boom')", on_error: 'continue' }),
            node('B', 'map', { mapping: { branch: 1 } }),
            node('C', 'map', { mapping: { branch: 2 } }),
          ],
          [edge('A', 'B', 'true'), edge('A', 'C', 'false')]
        )
      );

      expect(outcome.status).toBe('succeeded');
      expect(messages(runs.get(outcome.runId)?.events ?? [])).toEqual([
        'node_start:A',
        'node_error:A',
        'branch_skipped:B',
        'branch_skipped:C',
        'run_succeeded:',
      ]);
      expect(outcome.outputs).toEqual({ A: {} });
      expect(outcome.counts).toEqual({ executed: 0, failed: 1, skipped: 2 });
    });
  });

  describe('for_each', () => {
    function loop(flatten: boolean): WorkflowGraphInput {
      return graph(
        [
          node('F', 'for_each', { items_selector: 'input.numbers', flatten }),
          node('G', 'map', { mapping: { doubled: 'input.item * 2' } }),
        ],
        [edge('F', 'G')]
      );
    }

    it('should run the body once per item and flatten the results', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(loop(true), { numbers: [1, 2, 3] });

      expect(outcome.status).toBe('succeeded');
      expect(outcome.outputs.F).toEqual({
        numbers: [1, 2, 3],
        items: [1, 2, 3],
        items_processed: 3,
        results: [{ doubled: 2 }, { doubled: 4 }, { doubled: 6 }],
      });
      expect(outcome.counts.executed).toBe(4);
    });

    it('should keep per-item results nested without flatten', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(loop(false), { numbers: [1, 2] });

      expect(outcome.outputs.F?.results).toEqual([[{ doubled: 2 }], [{ doubled: 4 }]]);
    });

    it('should tag body events with the iteration', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(loop(true), { numbers: [5, 6] });

      const events = runs.get(outcome.runId)?.events ?? [];
      expect(messages(events)).toEqual([
        'node_start:F',
        'node_start:G',
        'node_output:G',
        'node_start:G',
        'node_output:G',
        'node_output:F',
        'run_succeeded:',
      ]);
      expect(events[2]?.data).toEqual({ forEachNodeId: 'F', iteration: 0, nodeId: 'G', nodeType: 'map', output: { doubled: 10 } });
      expect(events[4]?.data.iteration).toBe(1);
    });

    it('should fail the run when an item fails', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph([node('F', 'for_each', { items_selector: 'input.numbers' }), failing('G')], [edge('F', 'G')]),
        { numbers: [1, 2] }
      );

      expect(outcome.status).toBe('failed');
      expect(outcome.errors[0]).toMatch(/^Node G failed: /);
      const starts = (runs.get(outcome.runId)?.events ?? []).filter((event) => event.message === 'node_start');
      expect(starts).toHaveLength(2);
    });

    it('should report the body as skipped when the loop sits on an untaken branch', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph(
          [
            node('A', 'if_else', { predicate: 'false' }),
            node('B', 'for_each', { items_selector: 'input.numbers' }),
            node('C', 'map', { mapping: { doubled: 'input.item * 2' } }),
            node('D', 'map', { mapping: { other: 1 } }),
          ],
          [edge('A', 'B', 'true'), edge('B', 'C'), edge('A', 'D', 'false')]
        ),
        { numbers: [1, 2] }
      );

      expect(messages(runs.get(outcome.runId)?.events ?? [])).toEqual([
        'node_start:A',
        'node_output:A',
        'branch_skipped:B',
        'branch_skipped:C',
        'node_start:D',
        'node_output:D',
        'run_succeeded:',
      ]);
      expect(outcome.counts).toEqual({ executed: 2, failed: 0, skipped: 2 });
    });

    it.each(['skip', 'continue'])('should skip the body when the loop fails under %s', async (onError) => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph(
          [
            node('B', 'for_each', { items_selector: "$error('boom')", on_error: onError }),
            node('C', 'map', { mapping: { doubled: 'input.item * 2' } }),
            node('D', 'map', { mapping: { later: 'input.item' } }),
          ],
          [edge('B', 'C'), edge('C', 'D')]
        )
      );

      const events = runs.get(outcome.runId)?.events ?? [];
      expect(outcome.status).toBe('succeeded');
      expect(messages(events)).toEqual([
        'node_start:B',
        'node_error:B',
        'node_skipped:C',
        'node_skipped:D',
        'run_succeeded:',
      ]);
      expect(events[2]?.data.reason).toBe('Loop B did not run');
      expect(events[3]?.data.reason).toBe('Loop B did not run');
      expect(outcome.counts).toEqual({ executed: 0, failed: 1, skipped: 2 });
      expect(outcome.outputs.C).toBeUndefined();
    });

    it('should let a body node read from an ancestor of the loop', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph(
          [
            node('A', 'map', { mapping: { items: 'input.numbers', side: "'here'" } }),
            node('B', 'map', { mapping: { b: 'input.item' } }),
            node('F', 'for_each', { items_selector: 'input.items' }),
            node('M', 'merge', {}),
          ],
          [edge('A', 'F'), edge('F', 'B'), edge('B', 'M'), edge('A', 'M')]
        ),
        { numbers: [1, 2] }
      );

      expect(outcome.status).toBe('succeeded');
      expect(outcome.outputs.F?.results).toEqual([
        expect.objectContaining({ b: 1, side: 'here' }),
        expect.objectContaining({ b: 2, side: 'here' }),
      ]);
    });

    it('should reject a body node fed from outside the loop', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph(
          [
            node('A', 'map', { mapping: { items: 'input.numbers' } }),
            node('B', 'map', { mapping: { b: 'input.item' } }),
            node('F', 'for_each', { items_selector: 'input.items' }),
            node('M', 'merge', {}),
            node('X', 'map', { mapping: { x: 1 } }),
          ],
          [edge('A', 'F'), edge('F', 'B'), edge('B', 'M'), edge('A', 'X'), edge('X', 'M')]
        ),
        { numbers: [1, 2] }
      );

      expect(outcome.status).toBe('failed');
      expect(outcome.errors).toEqual(['Node M in the loop body of for_each node F has parent X outside the loop']);
      expect(messages(runs.get(outcome.runId)?.events ?? [])).toEqual(['run_failed:']);
    });
  });

  describe('return', () => {
    it('should expose the return node output', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(
        graph(
          [node('A', 'map', { mapping: { answer: 42 } }), node('R', 'return', { payload_selector: 'input.answer' })],
          [edge('A', 'R')]
        )
      );

      const expected = { payload: 42, content_type: 'application/json', status_code: 200 };
      expect(outcome.returnValue).toEqual(expected);
      expect(runs.get(outcome.runId)?.events.at(-1)?.data.returnValue).toEqual(expected);
    });
  });

  describe('sub-workflows', () => {
    let repository: MemoryWorkflowRepository;

    beforeEach(async () => {
      repository = new MemoryWorkflowRepository();
      await repository.saveWorkflow('wf-child', {
        nodes: [
          node('X', 'map', { mapping: { greeting: "'hello ' & input.name" } }, 'wf-child'),
          node('R', 'return', { payload_selector: 'input.greeting' }, 'wf-child'),
        ],
        edges: [edge('X', 'R')],
      });
    });

    const parent = graph([
      node('W', 'workflow', { workflow_id: 'wf-child', input_mapping: { name: 'input.user' } }),
    ]);

    it('should run the child inside the same run', async () => {
      const executor = createExecutor({ graphSource: repository });
      const outcome = await executor.runWorkflow(parent, { user: 'ada' });

      expect(outcome.status).toBe('succeeded');
      expect(outcome.outputs.W).toEqual({ result: 'hello ada' });

      const events = runs.get(outcome.runId)?.events ?? [];
      expect(messages(events)).toEqual([
        'node_start:W',
        'node_start:X',
        'node_output:X',
        'node_start:R',
        'node_output:R',
        'node_output:W',
        'run_succeeded:',
      ]);
      expect(events[1]?.data).toEqual({ depth: 1, parentNodeId: 'W', workflowId: 'wf-child', nodeId: 'X', nodeType: 'map' });
    });

    it('should fail when no graph source is configured', async () => {
      const executor = createExecutor();
      const outcome = await executor.runWorkflow(parent, { user: 'ada' });

      expect(outcome.errors).toEqual(['Node W failed: Sub-workflows require a workflow graph source']);
    });

    it('should fail for unknown workflows', async () => {
      const executor = createExecutor({ graphSource: repository });
      const outcome = await executor.runWorkflow(
        graph([node('W', 'workflow', { workflow_id: 'wf-missing' })]),
        {}
      );

      expect(outcome.errors).toEqual(['Node W failed: Workflow wf-missing not found']);
    });

    it('should stop at the nesting limit', async () => {
      await repository.saveWorkflow('wf-loop', {
        nodes: [node('L', 'workflow', { workflow_id: 'wf-loop' }, 'wf-loop')],
        edges: [],
      });
      const executor = createExecutor({ graphSource: repository, config: { nodeRetryDelayMs: 0, maxWorkflowDepth: 2 } });

      const outcome = await executor.runWorkflow(graph([node('W', 'workflow', { workflow_id: 'wf-loop' })]));

      expect(outcome.status).toBe('failed');
      expect(outcome.errors[0]).toContain('exceeds the maximum nesting depth of 2');
    });
  });

  describe('cancellation', () => {
    it('should stop before the next node', async () => {
      complete.mockImplementation(
        () => new Promise<{ text: string }>((resolve) => setTimeout(() => resolve({ text: 'slow' }), 20))
      );
      const executor = createExecutor();
      const runId = executor.execute(
        graph(
          [node('A', 'job', { prompt: 'hi', model_name: 'test-model' }), node('B', 'map', { mapping: { x: 1 } })],
          [edge('A', 'B')]
        )
      );

      expect(executor.cancel(runId, 'stop now')).toBe(true);
      const outcome = await executor.waitForRun(runId);

      expect(outcome.status).toBe('failed');
      expect(outcome.errors).toEqual(['Run cancelled: stop now']);
      expect(messages(runs.get(runId)?.events ?? [])).toEqual(['node_start:A', 'node_output:A', 'run_failed:']);
      expect(executor.cancel(runId)).toBe(false);
    });
  });

  describe('waitForRun', () => {
    it('should reject unknown runs', async () => {
      const executor = createExecutor();
      await expect(executor.waitForRun('missing')).rejects.toThrow(RunNotFoundError);
    });
  });
});
