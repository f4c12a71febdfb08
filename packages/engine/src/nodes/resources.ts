/**
 * Resource Nodes
 *
 * Calls into external systems: knowledge search (guru), HTTP (get_api,
 * post_api) and vector search (vector_query). Query templates are rendered
 * against the node input; HTTP query and body maps are expressions.
 *
 * @module @nodeflow/engine/nodes/resources
 */

import { ConfigurationError, RetryableError } from '@nodeflow/core';
import { renderTemplate } from '../expression/template.js';
import { NodeExecutionError } from '../errors.js';
import { GetApiMetadata, GuruMetadata, PostApiMetadata, VectorQueryMetadata } from './metadata.js';
import type { PostContentType } from './metadata.js';
import { defineNodeService, evaluateMap, expressionLeaves, requireCollaborator } from './base.js';
import { AxiosHttpClient } from './http-client.js';
import type { HttpClient, HttpResponse, NodeCollaborators, NodeExecutionContext, NodeService } from './types.js';

// =============================================================================
// Shared
// =============================================================================

async function renderQuery(
  template: string,
  data: Record<string, unknown>,
  context: NodeExecutionContext
): Promise<string> {
  const rendered = await renderTemplate(
    template,
    { base: context.base, input: data },
    { timeoutMs: context.expressionTimeoutMs }
  );
  for (const warning of rendered.warnings) {
    context.warn(warning, { field: 'metadata.query_template' });
  }
  return rendered.text;
}

function resolveHeaders(
  collaborators: NodeCollaborators,
  headers: Record<string, string> | undefined,
  authPreset: string | undefined
): Record<string, string> {
  if (authPreset === undefined) {
    return { ...headers };
  }
  const preset = collaborators.authPresets?.[authPreset];
  if (preset === undefined) {
    throw new ConfigurationError(`Unknown auth preset: ${authPreset}`, { authPreset });
  }
  return { ...headers, ...preset };
}

/**
 * 5xx and 429 are worth another attempt; other 4xx are not.
 */
function checkResponse(response: HttpResponse, url: string, context: NodeExecutionContext): void {
  if (response.status < 400) return;

  const message = `HTTP ${response.status} from ${url}`;
  if (response.status >= 500 || response.status === 429) {
    throw new RetryableError(message, response.status === 429 ? 'RATE_LIMITED' : 'UPSTREAM_ERROR', {
      context: { nodeId: context.nodeId, status: response.status },
    });
  }
  throw new NodeExecutionError(message, { nodeId: context.nodeId });
}

function encodeBody(body: Record<string, unknown>, contentType: PostContentType): unknown {
  switch (contentType) {
    case 'application/json':
      return body;
    case 'application/x-www-form-urlencoded': {
      const form = new URLSearchParams();
      for (const [key, value] of Object.entries(body)) {
        if (value === undefined || value === null) continue;
        form.append(key, typeof value === 'string' ? value : JSON.stringify(value));
      }
      return form.toString();
    }
    case 'text/plain':
      return JSON.stringify(body);
  }
}

// =============================================================================
// Guru
// =============================================================================

export function createGuruService(collaborators: NodeCollaborators): NodeService {
  return defineNodeService({
    nodeType: 'guru',
    schema: GuruMetadata,
    templates: (metadata) => [['metadata.query_template', metadata.query_template]],

    plan: () => ({ items: 'array' }),

    async execute(input, metadata, context) {
      const knowledge = requireCollaborator(collaborators.knowledge, 'knowledge client', 'guru');
      const query = await renderQuery(metadata.query_template, input.data, context);
      const items = await knowledge.search({
        space: metadata.space,
        query,
        topK: metadata.top_k,
        filters: metadata.filters,
        signal: context.signal,
      });
      return { items };
    },
  });
}

// =============================================================================
// HTTP
// =============================================================================

export function createGetApiService(collaborators: NodeCollaborators, http: HttpClient): NodeService {
  return defineNodeService({
    nodeType: 'get_api',
    schema: GetApiMetadata,
    expressions: (metadata) => expressionLeaves(metadata.query_map ?? {}, 'metadata.query_map'),

    plan: () => ({ status: 'number', body: 'unknown' }),

    async execute(input, metadata, context) {
      const params = await evaluateMap(metadata.query_map ?? {}, 'metadata.query_map', input.data, context);
      const response = await http.request({
        method: 'GET',
        url: metadata.url,
        headers: resolveHeaders(collaborators, metadata.headers, metadata.auth_preset),
        params,
        timeoutMs: metadata.timeout_ms,
        signal: context.signal,
      });
      checkResponse(response, metadata.url, context);
      return { status: response.status, body: response.body };
    },
  });
}

export function createPostApiService(collaborators: NodeCollaborators, http: HttpClient): NodeService {
  return defineNodeService({
    nodeType: 'post_api',
    schema: PostApiMetadata,
    expressions: (metadata) => expressionLeaves(metadata.body_map ?? {}, 'metadata.body_map'),

    plan: () => ({ status: 'number', body: 'unknown' }),

    async execute(input, metadata, context) {
      const body = await evaluateMap(metadata.body_map ?? {}, 'metadata.body_map', input.data, context);
      const response = await http.request({
        method: 'POST',
        url: metadata.url,
        headers: {
          'Content-Type': metadata.content_type,
          ...resolveHeaders(collaborators, metadata.headers, metadata.auth_preset),
        },
        data: encodeBody(body, metadata.content_type),
        timeoutMs: metadata.timeout_ms,
        signal: context.signal,
      });
      checkResponse(response, metadata.url, context);
      return { status: response.status, body: response.body };
    },
  });
}

/**
 * The configured client, or the axios default
 */
export function resolveHttpClient(collaborators: NodeCollaborators): HttpClient {
  return collaborators.http ?? new AxiosHttpClient();
}

// =============================================================================
// Vector Query
// =============================================================================

export function createVectorQueryService(collaborators: NodeCollaborators): NodeService {
  return defineNodeService({
    nodeType: 'vector_query',
    schema: VectorQueryMetadata,
    templates: (metadata) => [['metadata.query_template', metadata.query_template]],

    plan: () => ({
      results: {
        type: 'array',
        items: { id: 'string', score: 'number', text: 'string', metadata: 'object' },
      },
    }),

    async execute(input, metadata, context) {
      const store = requireCollaborator(collaborators.vectorStore, 'vector store', 'vector_query');
      const query = await renderQuery(metadata.query_template, input.data, context);
      const results = await store.query({
        storeId: metadata.vector_store_id,
        namespace: metadata.namespace,
        query,
        topK: metadata.top_k,
        filters: metadata.filters,
        signal: context.signal,
      });
      return { results };
    },
  });
}
