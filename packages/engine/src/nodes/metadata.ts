/**
 * Node Metadata Schemas
 *
 * Closed zod schemas for the configuration of each node type. Unknown keys
 * are rejected so the configuration contract stays explicit. Field names are
 * snake_case because they are authored in workflow documents.
 *
 * @module @nodeflow/engine/nodes/metadata
 */

import { z } from 'zod';
import { Shape } from '../workflow/schema.js';

// =============================================================================
// Field Helpers
// =============================================================================

const text = () => z.string().regex(/\S/, 'must not be empty');

const httpUrl = () =>
  z
    .string()
    .url('must be a valid URL')
    .refine((value) => /^https?:\/\//i.test(value), 'must use http or https');

const stringMap = () => z.record(z.string(), z.string());

const scalar = z.union([z.string(), z.number(), z.boolean()]);

// =============================================================================
// Common Metadata
// =============================================================================

/**
 * What to do when a node fails after its retries
 */
export const OnErrorPolicy = z.enum(['fail', 'skip', 'continue']);

export type OnErrorPolicy = z.infer<typeof OnErrorPolicy>;

/**
 * Keys every node type accepts
 */
export const CommonMetadata = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  /** Bound on one execution attempt */
  timeout_ms: z.number().int().positive().optional(),
  /** Extra attempts after the first failure */
  retry: z.number().int().min(0).optional(),
  on_error: OnErrorPolicy.optional(),
  tags: z.array(z.string()).optional(),
});

export type CommonMetadata = z.infer<typeof CommonMetadata>;

// =============================================================================
// AI
// =============================================================================

export const JobMetadata = CommonMetadata.extend({
  /** Template with `{{ expression }}` placeholders */
  prompt: text(),
  model_name: text(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  stop: z.array(z.string()).optional(),
  system: z.string().optional(),
}).strict();

export type JobMetadata = z.infer<typeof JobMetadata>;

export const EmbedMetadata = CommonMetadata.extend({
  vector_store_id: text(),
  /** Expression selecting the text (or texts) to embed */
  input_selector: text(),
  namespace: z.string().optional(),
  model_name: z.string().optional(),
  /** Expression computing a record id from `input.item` */
  id_selector: z.string().optional(),
  /** Record metadata key -> expression over `input.item` */
  metadata_map: stringMap().optional(),
  upsert: z.boolean().default(true),
}).strict();

export type EmbedMetadata = z.infer<typeof EmbedMetadata>;

// =============================================================================
// Resources
// =============================================================================

export const GuruMetadata = CommonMetadata.extend({
  space: text(),
  query_template: text(),
  top_k: z.number().int().positive().default(5),
  filters: z.record(z.string(), scalar).optional(),
}).strict();

export type GuruMetadata = z.infer<typeof GuruMetadata>;

export const GetApiMetadata = CommonMetadata.extend({
  url: httpUrl(),
  headers: stringMap().optional(),
  /** Query parameter -> expression */
  query_map: stringMap().optional(),
  auth_preset: z.string().optional(),
}).strict();

export type GetApiMetadata = z.infer<typeof GetApiMetadata>;

export const PostContentType = z.enum([
  'application/json',
  'application/x-www-form-urlencoded',
  'text/plain',
]);

export type PostContentType = z.infer<typeof PostContentType>;

export const PostApiMetadata = CommonMetadata.extend({
  url: httpUrl(),
  headers: stringMap().optional(),
  /** Nested body; string leaves are expressions, other leaves literals */
  body_map: z.record(z.string(), z.unknown()).optional(),
  content_type: PostContentType.default('application/json'),
  auth_preset: z.string().optional(),
}).strict();

export type PostApiMetadata = z.infer<typeof PostApiMetadata>;

export const VectorQueryMetadata = CommonMetadata.extend({
  vector_store_id: text(),
  query_template: text(),
  namespace: z.string().optional(),
  top_k: z.number().int().positive().default(5),
  filters: z.record(z.string(), scalar).optional(),
}).strict();

export type VectorQueryMetadata = z.infer<typeof VectorQueryMetadata>;

// =============================================================================
// Actions
// =============================================================================

export const FilterMetadata = CommonMetadata.extend({
  /** Predicate over `input.item` */
  where: text(),
  /** Expression selecting the collection (default: `input.items`) */
  items_selector: z.string().optional(),
}).strict();

export type FilterMetadata = z.infer<typeof FilterMetadata>;

export const MapMetadata = CommonMetadata.extend({
  /** Output key -> expression (strings) or literal */
  mapping: z
    .record(z.string(), scalar)
    .refine((mapping) => Object.keys(mapping).length > 0, 'must have at least one entry'),
}).strict();

export type MapMetadata = z.infer<typeof MapMetadata>;

export const IfElseMetadata = CommonMetadata.extend({
  predicate: text(),
}).strict();

export type IfElseMetadata = z.infer<typeof IfElseMetadata>;

export const ForEachMetadata = CommonMetadata.extend({
  items_selector: text(),
  /** Stored as a hint; items run one at a time */
  concurrency: z.number().int().positive().default(1),
  flatten: z.boolean().default(true),
}).strict();

export type ForEachMetadata = z.infer<typeof ForEachMetadata>;

export const MergeStrategy = z.enum(['union', 'concat', 'prefer_left']);

export type MergeStrategy = z.infer<typeof MergeStrategy>;

export const MergeMetadata = CommonMetadata.extend({
  strategy: MergeStrategy.default('union'),
  expected_parents: z.number().int().positive().optional(),
}).strict();

export type MergeMetadata = z.infer<typeof MergeMetadata>;

export const SplitMode = z.enum(['group_by', 'chunk']);

export type SplitMode = z.infer<typeof SplitMode>;

export const SplitMetadata = CommonMetadata.extend({
  items_selector: text(),
  mode: SplitMode.default('group_by'),
  /** Group key expression over `input.item` */
  by: z.string().optional(),
  chunk_size: z.number().int().positive().optional(),
})
  .strict()
  .superRefine((metadata, ctx) => {
    if (metadata.mode === 'group_by' && (metadata.by === undefined || metadata.by.trim() === '')) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['by'], message: 'is required when mode is group_by' });
    }
    if (metadata.mode === 'chunk' && metadata.chunk_size === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunk_size'],
        message: 'is required when mode is chunk',
      });
    }
  });

export type SplitMetadata = z.infer<typeof SplitMetadata>;

export const AdvancedMetadata = CommonMetadata.extend({
  expression: text(),
}).strict();

export type AdvancedMetadata = z.infer<typeof AdvancedMetadata>;

export const ReturnMetadata = CommonMetadata.extend({
  payload_selector: text(),
  content_type: z.string().default('application/json'),
  status_code: z.number().int().min(100).max(599).default(200),
}).strict();

export type ReturnMetadata = z.infer<typeof ReturnMetadata>;

export const WorkflowCallMetadata = CommonMetadata.extend({
  workflow_id: text(),
  /** Child input key -> expression; the whole input is passed when absent */
  input_mapping: stringMap().optional(),
  propagate_identity: z.boolean().default(true),
  wait: z.literal('sync').default('sync'),
}).strict();

export type WorkflowCallMetadata = z.infer<typeof WorkflowCallMetadata>;

// =============================================================================
// Structured Output
// =============================================================================

export const JsonSchemaType = z.enum(['string', 'number', 'integer', 'boolean', 'object', 'array', 'null']);

export type JsonSchemaType = z.infer<typeof JsonSchemaType>;

/**
 * The subset of JSON Schema accepted as a declared structured output
 */
export interface JsonSchema {
  type: JsonSchemaType | JsonSchemaType[];
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  required?: string[];
  description?: string;
  enum?: unknown[];
}

export const JsonSchema: z.ZodType<JsonSchema> = z.lazy(() =>
  z.object({
    type: z.union([JsonSchemaType, z.array(JsonSchemaType).nonempty()]),
    properties: z.record(z.string(), JsonSchema).optional(),
    items: JsonSchema.optional(),
    required: z.array(z.string()).optional(),
    description: z.string().optional(),
    enum: z.array(z.unknown()).optional(),
  })
);

/**
 * A declared structured output: a JSON Schema when it names a `type`,
 * otherwise a plain key/type description such as `{text: "string"}`.
 */
export function structuredOutputSchema(structuredOutput: Record<string, unknown>): z.ZodTypeAny {
  return 'type' in structuredOutput ? JsonSchema : Shape;
}
