/**
 * Workflow Repository Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictError, NotFoundError, ValidationError } from '@nodeflow/core';
import type { WorkflowNode } from '../schema.js';
import { MemoryWorkflowRepository } from '../repository.js';

function node(id: string, workflowId = 'wf-1'): WorkflowNode {
  return { id, workflowId, nodeType: 'map', metadata: { mapping: { x: 1 } }, structuredOutput: {} };
}

describe('MemoryWorkflowRepository', () => {
  let repository: MemoryWorkflowRepository;

  beforeEach(async () => {
    repository = new MemoryWorkflowRepository();
    await repository.createNode(node('a'));
    await repository.createNode(node('b'));
  });

  describe('nodes', () => {
    it('stores and returns copies', async () => {
      const stored = await repository.getNode('a');
      expect(stored).toEqual(node('a'));

      if (stored) stored.metadata.mapping = 'changed';
      expect((await repository.getNode('a'))?.metadata).toEqual({ mapping: { x: 1 } });
    });

    it('rejects duplicate ids', async () => {
      await expect(repository.createNode(node('a'))).rejects.toThrow(ConflictError);
    });

    it('updates type-specific fields', async () => {
      const updated = await repository.updateNode('a', { metadata: { mapping: { y: 2 } } });
      expect(updated.metadata).toEqual({ mapping: { y: 2 } });
    });

    it('fails to update a missing node', async () => {
      await expect(repository.updateNode('zz', {})).rejects.toThrow('Node zz not found');
    });

    it('lists nodes by workflow', async () => {
      await repository.createNode(node('c', 'wf-2'));
      expect((await repository.listNodes('wf-1')).map((entry) => entry.id)).toEqual(['a', 'b']);
      expect((await repository.listNodes('wf-2')).map((entry) => entry.id)).toEqual(['c']);
    });

    it('deletes edges along with their node', async () => {
      await repository.createEdge({ id: 'e1', parentId: 'a', childId: 'b' });

      expect(await repository.deleteNode('a')).toBe(true);
      expect(await repository.getEdge('e1')).toBeNull();
      expect(await repository.deleteNode('a')).toBe(false);
    });
  });

  describe('edges', () => {
    it('creates and labels edges', async () => {
      await repository.createEdge({ id: 'e1', parentId: 'a', childId: 'b' });
      const labeled = await repository.updateEdgeLabel('e1', 'true');

      expect(labeled).toEqual({ id: 'e1', parentId: 'a', childId: 'b', branchLabel: 'true' });
      expect(await repository.listEdges('wf-1')).toEqual([labeled]);
    });

    it('rejects self edges', async () => {
      await expect(repository.createEdge({ id: 'e1', parentId: 'a', childId: 'a' })).rejects.toThrow(ValidationError);
    });

    it('rejects edges to missing nodes', async () => {
      await expect(repository.createEdge({ id: 'e1', parentId: 'a', childId: 'zz' })).rejects.toThrow(NotFoundError);
    });

    it('rejects edges across workflows', async () => {
      await repository.createNode(node('c', 'wf-2'));
      await expect(repository.createEdge({ id: 'e1', parentId: 'a', childId: 'c' })).rejects.toThrow(
        'Edge e1 crosses workflows'
      );
    });

    it('rejects a second edge between the same nodes', async () => {
      await repository.createEdge({ id: 'e1', parentId: 'a', childId: 'b' });
      await expect(repository.createEdge({ id: 'e2', parentId: 'a', childId: 'b' })).rejects.toThrow(
        'Duplicate edge from a to b'
      );
    });

    it('fails to label a missing edge', async () => {
      await expect(repository.updateEdgeLabel('nope', null)).rejects.toThrow('Edge nope not found');
    });
  });

  describe('workflows', () => {
    it('replaces a whole workflow', async () => {
      await repository.createEdge({ id: 'e1', parentId: 'a', childId: 'b' });

      await repository.saveWorkflow('wf-1', {
        nodes: [node('x'), node('y')],
        edges: [{ id: 'x->y', parentId: 'x', childId: 'y' }],
        triggers: { isApi: true },
      });

      expect((await repository.listNodes('wf-1')).map((entry) => entry.id)).toEqual(['x', 'y']);
      expect((await repository.listEdges('wf-1')).map((entry) => entry.id)).toEqual(['x->y']);
      expect(await repository.getTriggers('wf-1')).toEqual({ isApi: true });
    });

    it('returns empty triggers for an unknown workflow', async () => {
      expect(await repository.getTriggers('wf-9')).toEqual({});
    });

    it('deletes a workflow with its edges and triggers', async () => {
      await repository.createEdge({ id: 'e1', parentId: 'a', childId: 'b' });
      await repository.setTriggers('wf-1', { cronSchedule: '0 * * * *' });

      await repository.deleteWorkflow('wf-1');

      expect(await repository.listNodes('wf-1')).toEqual([]);
      expect(await repository.getEdge('e1')).toBeNull();
      expect(await repository.getTriggers('wf-1')).toEqual({});
    });
  });
});
