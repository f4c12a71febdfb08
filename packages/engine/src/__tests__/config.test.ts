/**
 * Engine Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@nodeflow/core';
import { DEFAULT_ENGINE_CONFIG, readEngineConfigFromEnv } from '../config.js';

describe('readEngineConfigFromEnv', () => {
  it('returns defaults for an empty environment', () => {
    expect(readEngineConfigFromEnv({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('reads overrides', () => {
    const config = readEngineConfigFromEnv({
      NODEFLOW_RUN_TTL_MS: '5000',
      NODEFLOW_MAX_WORKFLOW_DEPTH: '3',
      NODEFLOW_NODE_RETRY_DELAY_MS: '0',
    });

    expect(config.runTtlMs).toBe(5000);
    expect(config.maxWorkflowDepth).toBe(3);
    expect(config.nodeRetryDelayMs).toBe(0);
    expect(config.runChannelCapacity).toBe(1000);
  });

  it('leaves debug logging to the logger', () => {
    expect(readEngineConfigFromEnv({ NODEFLOW_DEBUG: 'true' })).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(Object.keys(DEFAULT_ENGINE_CONFIG)).not.toContain('debug');
  });

  it('treats blank values as unset', () => {
    expect(readEngineConfigFromEnv({ NODEFLOW_RUN_TTL_MS: '  ' }).runTtlMs).toBe(900_000);
  });

  it('rejects non-numeric values', () => {
    expect(() => readEngineConfigFromEnv({ NODEFLOW_RUN_TTL_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => readEngineConfigFromEnv({ NODEFLOW_RUN_TTL_MS: 'soon' })).toThrow(
      'Invalid engine configuration: runTtlMs'
    );
  });

  it('rejects values out of range', () => {
    expect(() => readEngineConfigFromEnv({ NODEFLOW_MAX_WORKFLOW_DEPTH: '0' })).toThrow(
      'Invalid engine configuration: maxWorkflowDepth'
    );
  });
});
