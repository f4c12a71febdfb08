/**
 * Control-Flow Node Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@nodeflow/core';
import { forEachService, ifElseService, returnService, workflowService } from '../control.js';
import type { NodeExecutionContext } from '../types.js';
import { nodeContext, nodeInput } from './context.js';

type RunSubWorkflow = NonNullable<NodeExecutionContext['runSubWorkflow']>;

describe('if_else', () => {
  it('adds the predicate result to its input', async () => {
    const output = await ifElseService.execute(
      nodeInput({ score: 0.9 }),
      { predicate: 'input.score > 0.5' },
      nodeContext()
    );

    expect(output).toEqual({ score: 0.9, condition_result: true });
  });

  it('can read base values', async () => {
    const output = await ifElseService.execute(
      nodeInput({}),
      { predicate: "base.date = '2024-01-06'" },
      nodeContext()
    );

    expect(output.condition_result).toBe(false);
  });
});

describe('for_each', () => {
  it('selects the items to iterate', async () => {
    const output = await forEachService.execute(
      nodeInput({ rows: [1, 2] }),
      { items_selector: 'input.rows' },
      nodeContext()
    );

    expect(output).toEqual({ rows: [1, 2], items: [1, 2] });
  });

  it('treats a single value as one item', async () => {
    const output = await forEachService.execute(
      nodeInput({ one: 'x' }),
      { items_selector: 'input.one' },
      nodeContext()
    );

    expect(output.items).toEqual(['x']);
  });

  it('plans the iteration keys', () => {
    expect(forEachService.plan({ items_selector: 'input.rows' }, { rows: 'array' }, {})).toEqual({
      rows: 'array',
      item: 'unknown',
      index: 'number',
      items_processed: 'number',
      results: 'array',
    });
  });
});

describe('return', () => {
  it('selects the payload with response defaults', async () => {
    const output = await returnService.execute(
      nodeInput({ answer: '42' }),
      { payload_selector: 'input.answer' },
      nodeContext()
    );

    expect(output).toEqual({ payload: '42', content_type: 'application/json', status_code: 200 });
  });

  it('returns a null payload when nothing is selected', async () => {
    const output = await returnService.execute(
      nodeInput({}),
      { payload_selector: 'input.missing', status_code: 404 },
      nodeContext()
    );

    expect(output).toEqual({ payload: null, content_type: 'application/json', status_code: 404 });
  });

  it('rejects status codes outside the HTTP range', () => {
    expect(() => returnService.validate({ payload_selector: 'input.x', status_code: 700 }, {})).toThrow(
      /^Invalid return node: metadata\.status_code: /
    );
  });
});

describe('workflow', () => {
  it('fails outside an executor', async () => {
    await expect(
      workflowService.execute(nodeInput({}), { workflow_id: 'child' }, nodeContext())
    ).rejects.toThrow(ConfigurationError);
  });

  it('runs the child with mapped inputs', async () => {
    const runSubWorkflow = vi.fn<RunSubWorkflow>().mockResolvedValue('done');

    const output = await workflowService.execute(
      nodeInput({ question: 'why', noise: true }),
      { workflow_id: 'child', input_mapping: { q: 'input.question' } },
      nodeContext({ runSubWorkflow })
    );

    expect(output).toEqual({ result: 'done' });
    expect(runSubWorkflow).toHaveBeenCalledWith('child', { q: 'why' }, { propagateIdentity: true });
  });

  it('passes the whole input when no mapping is configured', async () => {
    const runSubWorkflow = vi.fn<RunSubWorkflow>().mockResolvedValue(null);

    await workflowService.execute(
      nodeInput({ question: 'why' }),
      { workflow_id: 'child', propagate_identity: false },
      nodeContext({ runSubWorkflow })
    );

    expect(runSubWorkflow).toHaveBeenCalledWith('child', { question: 'why' }, { propagateIdentity: false });
  });

  it('only waits synchronously', () => {
    expect(() => workflowService.validate({ workflow_id: 'child', wait: 'async' }, {})).toThrow(
      /^Invalid workflow node: metadata\.wait: /
    );
  });
});
