/**
 * AI Nodes
 *
 * - job: renders a prompt template and sends it to a model
 * - embed: selects texts, embeds them and upserts them into a vector store
 *
 * @module @nodeflow/engine/nodes/ai
 */

import { renderTemplate } from '../expression/template.js';
import { extractShapeFromStructuredOutput, isRecord, setOwn } from '../workflow/shape.js';
import { NodeExecutionError } from '../errors.js';
import { EmbedMetadata, JobMetadata } from './metadata.js';
import { asItems, defineNodeService, evaluateField, requireCollaborator, type ConfiguredField } from './base.js';
import type { NodeCollaborators, NodeService, VectorRecord } from './types.js';

// =============================================================================
// Job
// =============================================================================

export function createJobService(collaborators: NodeCollaborators): NodeService {
  return defineNodeService({
    nodeType: 'job',
    schema: JobMetadata,
    templates: (metadata) => [['metadata.prompt', metadata.prompt]],

    plan(_metadata, _inputShape, structuredOutput) {
      const declared = extractShapeFromStructuredOutput(structuredOutput);
      return Object.keys(declared).length > 0 ? declared : { text: 'string' };
    },

    async execute(input, metadata, context) {
      const model = requireCollaborator(collaborators.model, 'model client', 'job');

      const rendered = await renderTemplate(
        metadata.prompt,
        { base: context.base, input: input.data },
        { timeoutMs: context.expressionTimeoutMs }
      );
      for (const warning of rendered.warnings) {
        context.warn(warning, { field: 'metadata.prompt' });
      }

      const reply = await model.complete({
        model: metadata.model_name,
        prompt: rendered.text,
        system: metadata.system,
        temperature: metadata.temperature,
        maxTokens: metadata.max_tokens,
        stop: metadata.stop,
        signal: context.signal,
      });

      if (Object.keys(context.structuredOutput).length === 0) {
        return { text: reply.text };
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(reply.text);
      } catch (error) {
        throw new NodeExecutionError('Model reply is not valid JSON for the declared structured output', {
          nodeId: context.nodeId,
          nodeType: 'job',
          cause: error instanceof Error ? error : undefined,
        });
      }
      return isRecord(parsed) ? parsed : { value: parsed };
    },
  });
}

// =============================================================================
// Embed
// =============================================================================

function embedExpressions(metadata: EmbedMetadata): ConfiguredField[] {
  const fields: ConfiguredField[] = [['metadata.input_selector', metadata.input_selector]];
  if (metadata.id_selector !== undefined) {
    fields.push(['metadata.id_selector', metadata.id_selector]);
  }
  for (const [key, expression] of Object.entries(metadata.metadata_map ?? {})) {
    fields.push([`metadata.metadata_map.${key}`, expression]);
  }
  return fields;
}

export function createEmbedService(collaborators: NodeCollaborators): NodeService {
  return defineNodeService({
    nodeType: 'embed',
    schema: EmbedMetadata,
    expressions: embedExpressions,

    plan: () => ({ embedded: 'boolean', count: 'number' }),

    async execute(input, metadata, context) {
      const items = asItems(
        await evaluateField(metadata.input_selector, 'metadata.input_selector', input.data, context)
      );
      if (items.length === 0) {
        return { embedded: false, count: 0 };
      }

      const embeddings = requireCollaborator(collaborators.embeddings, 'embedding client', 'embed');
      const texts = items.map((item) => (typeof item === 'string' ? item : JSON.stringify(item)));
      const vectors = await embeddings.embed({ texts, model: metadata.model_name, signal: context.signal });
      if (vectors.length !== texts.length) {
        throw new NodeExecutionError(`Expected ${texts.length} embeddings, received ${vectors.length}`, {
          nodeId: context.nodeId,
          nodeType: 'embed',
        });
      }

      if (!metadata.upsert) {
        return { embedded: false, count: vectors.length };
      }

      const records: VectorRecord[] = [];
      for (const [index, item] of items.entries()) {
        const scope = { item, index };
        const id =
          metadata.id_selector === undefined
            ? `${context.nodeId}-${index}`
            : String(await evaluateField(metadata.id_selector, 'metadata.id_selector', input.data, context, scope));

        const recordMetadata: Record<string, unknown> = {};
        for (const [key, expression] of Object.entries(metadata.metadata_map ?? {})) {
          const value = await evaluateField(expression, `metadata.metadata_map.${key}`, input.data, context, scope);
          setOwn(recordMetadata, key, value);
        }

        records.push({ id, vector: vectors[index], text: texts[index], metadata: recordMetadata });
      }

      const store = requireCollaborator(collaborators.vectorStore, 'vector store', 'embed');
      await store.upsert({ storeId: metadata.vector_store_id, namespace: metadata.namespace, records });
      return { embedded: true, count: records.length };
    },
  });
}
