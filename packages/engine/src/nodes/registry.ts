/**
 * Node Service Registry
 *
 * One service per node type, built once at process start. The registry type
 * is a mapped type over {@link NodeType}, so adding a node type without a
 * service does not compile.
 *
 * @module @nodeflow/engine/nodes/registry
 */

import { ConfigurationError } from '@nodeflow/core';
import type { NodeType } from '../workflow/schema.js';
import { createEmbedService, createJobService } from './ai.js';
import {
  createGetApiService,
  createGuruService,
  createPostApiService,
  createVectorQueryService,
  resolveHttpClient,
} from './resources.js';
import { advancedService, filterService, mapService, mergeService, splitService } from './transform.js';
import { forEachService, ifElseService, returnService, workflowService } from './control.js';
import type { NodeCollaborators, NodeService, NodeServiceRegistry } from './types.js';

/**
 * Build the registry over the given collaborators
 *
 * @example
 * ```typescript
 * const registry = createNodeServiceRegistry({ model: myModelClient });
 * getNodeService(registry, 'job').validate(node.metadata, node.structuredOutput);
 * ```
 */
export function createNodeServiceRegistry(collaborators: NodeCollaborators = {}): NodeServiceRegistry {
  const http = resolveHttpClient(collaborators);

  return {
    job: createJobService(collaborators),
    embed: createEmbedService(collaborators),
    guru: createGuruService(collaborators),
    get_api: createGetApiService(collaborators, http),
    post_api: createPostApiService(collaborators, http),
    vector_query: createVectorQueryService(collaborators),
    filter: filterService,
    map: mapService,
    if_else: ifElseService,
    for_each: forEachService,
    merge: mergeService,
    split: splitService,
    advanced: advancedService,
    return: returnService,
    workflow: workflowService,
  };
}

/**
 * Look up the service for a node type.
 *
 * Registries assembled outside {@link createNodeServiceRegistry} (spread
 * from partial objects, loaded plugins) may still miss a type at runtime.
 *
 * @throws ConfigurationError when no service is registered
 */
export function getNodeService(registry: NodeServiceRegistry, nodeType: NodeType): NodeService {
  const service: NodeService | undefined = Object.hasOwn(registry, nodeType) ? registry[nodeType] : undefined;
  if (service === undefined) {
    throw new ConfigurationError(`No node service registered for type: ${nodeType}`, { nodeType });
  }
  return service;
}
