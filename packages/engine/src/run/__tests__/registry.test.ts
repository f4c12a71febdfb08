/**
 * Tests for the ephemeral run registry
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConflictError, DefaultMetricsRegistry } from '@nodeflow/core';
import { RunNotFoundError } from '../../errors.js';
import {
  RunRegistry,
  getRunRegistry,
  initRunRegistry,
  isDrained,
  setRunRegistry,
  shutdownRunRegistry,
} from '../registry.js';
import { createRunLogger } from '../run-logger.js';

describe('RunRegistry', () => {
  let metrics: DefaultMetricsRegistry;
  let registry: RunRegistry;

  beforeEach(() => {
    metrics = new DefaultMetricsRegistry();
    registry = new RunRegistry({ ttlMs: 1000, channelCapacity: 3, metrics });
  });

  describe('create', () => {
    it('should register a run in the created status', () => {
      const state = registry.create();

      expect(state.status).toBe('created');
      expect(state.kind).toBe('workflow');
      expect(state.events).toEqual([]);
      expect(state.finishedAt).toBeUndefined();
      expect(registry.get(state.runId)?.runId).toBe(state.runId);
      expect(registry.size).toBe(1);
    });

    it('should give every run a distinct id', () => {
      const first = registry.create('expert');
      const second = registry.create();
      expect(first.runId).not.toBe(second.runId);
      expect(first.kind).toBe('expert');
    });
  });

  describe('append', () => {
    it('should record frozen events with a timestamp', () => {
      const { runId } = registry.create();
      const event = registry.append(runId, { level: 'info', message: 'node_start', data: { nodeId: 'A' } });

      expect(event.message).toBe('node_start');
      expect(event.data).toEqual({ nodeId: 'A' });
      expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
      expect(Object.isFrozen(event)).toBe(true);
      expect(registry.get(runId)?.events).toEqual([event]);
    });

    it('should default data to an empty object', () => {
      const { runId } = registry.create();
      expect(registry.append(runId, { level: 'warn', message: 'note' }).data).toEqual({});
    });

    it('should reject unknown runs', () => {
      expect(() => registry.append('missing', { level: 'info', message: 'x' })).toThrow(RunNotFoundError);
    });

    it('should reject events after finish', () => {
      const { runId } = registry.create();
      registry.markRunning(runId);
      registry.finish(runId, 'succeeded');

      expect(() => registry.append(runId, { level: 'info', message: 'late' })).toThrow(ConflictError);
    });

    it('should keep the full log when the stream buffer overflows', () => {
      const { runId } = registry.create();
      for (let i = 0; i < 5; i++) {
        registry.append(runId, { level: 'info', message: `e${i}` });
      }

      const state = registry.get(runId);
      expect(state?.events).toHaveLength(5);
      expect(state?.pendingEvents).toBe(3);
      expect(state?.droppedEvents).toBe(2);
      expect(metrics.getCounter('nodeflow_run_events_dropped_total')).toBe(2);
    });
  });

  describe('lifecycle', () => {
    it('should set finishedAt on finish', () => {
      const { runId } = registry.create();
      registry.markRunning(runId);
      const state = registry.finish(runId, 'failed');

      expect(state.status).toBe('failed');
      expect(state.finishedAt).toBeInstanceOf(Date);
    });

    it('should refuse to start a run twice', () => {
      const { runId } = registry.create();
      registry.markRunning(runId);
      expect(() => registry.markRunning(runId)).toThrow('Invalid run transition: running -> running');
    });
  });

  describe('popNext', () => {
    it('should return events in order then null once drained', async () => {
      const { runId } = registry.create();
      registry.markRunning(runId);
      registry.append(runId, { level: 'info', message: 'first' });
      registry.append(runId, { level: 'info', message: 'second' });
      registry.finish(runId, 'succeeded');

      expect((await registry.popNext(runId, 10))?.message).toBe('first');
      expect((await registry.popNext(runId, 10))?.message).toBe('second');
      expect(await registry.popNext(runId, 10)).toBeNull();

      const state = registry.get(runId);
      expect(state && isDrained(state)).toBe(true);
    });

    it('should throw for unknown runs', () => {
      expect(() => registry.popNext('missing', 10)).toThrow('Run missing not found');
    });
  });

  describe('gc', () => {
    it('should evict finished runs older than the TTL', () => {
      const { runId } = registry.create();
      registry.markRunning(runId);
      const finishedAt = registry.finish(runId, 'succeeded').finishedAt?.getTime() ?? 0;

      expect(registry.gc(finishedAt + 1000)).toEqual([]);
      expect(registry.gc(finishedAt + 1001)).toEqual([runId]);
      expect(registry.get(runId)).toBeUndefined();
      expect(metrics.getCounter('nodeflow_runs_evicted_total')).toBe(1);
    });

    it('should evict abandoned runs by start time', () => {
      const { runId, startedAt } = registry.create();
      registry.markRunning(runId);

      expect(registry.gc(startedAt.getTime() + 1001)).toEqual([runId]);
      expect(registry.size).toBe(0);
    });

    it('should wake a waiting consumer when its run is evicted', async () => {
      const { runId, startedAt } = registry.create();
      const pending = registry.popNext(runId, 5000);

      registry.gc(startedAt.getTime() + 5000);

      expect(await pending).toBeNull();
    });
  });
});

describe('process run registry', () => {
  afterEach(() => {
    shutdownRunRegistry();
  });

  it('should create the registry lazily and keep it', () => {
    const registry = getRunRegistry();
    expect(getRunRegistry()).toBe(registry);
  });

  it('should be replaceable', () => {
    const custom = new RunRegistry({ ttlMs: 10 });
    setRunRegistry(custom);
    expect(getRunRegistry()).toBe(custom);
  });

  it('should build from configuration', () => {
    const registry = initRunRegistry({ runChannelCapacity: 1 });
    const { runId } = registry.create();
    registry.append(runId, { level: 'info', message: 'a' });
    registry.append(runId, { level: 'info', message: 'b' });

    expect(getRunRegistry()).toBe(registry);
    expect(registry.get(runId)?.droppedEvents).toBe(1);
  });
});

describe('createRunLogger', () => {
  it('should stamp context on every event', () => {
    const registry = new RunRegistry({ metrics: new DefaultMetricsRegistry() });
    const { runId } = registry.create();
    const log = createRunLogger(registry, runId, { depth: 1 });

    expect(log.info('node_start', { nodeId: 'A' }).data).toEqual({ depth: 1, nodeId: 'A' });
    expect(log.warn('node_warning').level).toBe('warn');
  });

  it('should describe the exception on error events', () => {
    const registry = new RunRegistry({ metrics: new DefaultMetricsRegistry() });
    const { runId } = registry.create();
    const log = createRunLogger(registry, runId);

    const event = log.error('node_error', new TypeError('bad input'), { nodeId: 'B' });

    expect(event.level).toBe('error');
    expect(event.data).toEqual({ nodeId: 'B', exception: { type: 'TypeError', message: 'bad input' } });
  });
});
