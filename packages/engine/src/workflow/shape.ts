/**
 * Shapes and Union Merge
 *
 * Shape extraction from declared structured outputs, shape inference from
 * concrete values, and the union merge used for both planned shapes and
 * real outputs.
 *
 * @module @nodeflow/engine/workflow/shape
 */

import type { Shape, ShapeValue } from './schema.js';

// =============================================================================
// Type Guards
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Define `key` as an own enumerable property. Plain assignment sends a
 * `__proto__` key to the prototype setter instead.
 */
export function setOwn<V>(target: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

// =============================================================================
// Shape Extraction
// =============================================================================

function typeOfSchema(schema: unknown): ShapeValue {
  if (!isRecord(schema)) return 'unknown';
  const type = typeof schema.type === 'string' ? schema.type : 'unknown';

  if (type === 'object' && isRecord(schema.properties)) {
    return extractProperties(schema.properties);
  }
  if (type === 'array') {
    return schema.items === undefined
      ? { type: 'array' }
      : { type: 'array', items: typeOfSchema(schema.items) };
  }
  return type;
}

function extractProperties(properties: Record<string, unknown>): Shape {
  const shape: Shape = {};
  for (const [key, propertySchema] of Object.entries(properties)) {
    setOwn(shape, key, typeOfSchema(propertySchema));
  }
  return shape;
}

/**
 * Extract a planning shape from a declared structured output.
 *
 * - `{type: "object", properties}` becomes one key per property, nested
 *   objects recursively, arrays as `{type: "array", items}`
 * - any other JSON-schema (`{type: "string"}`) becomes `{value: <type>}`
 * - a plain key/type description (`{text: "string"}`) is taken as-is
 * - an empty declaration gives an empty shape
 */
export function extractShapeFromStructuredOutput(structuredOutput: Record<string, unknown>): Shape {
  if (Object.keys(structuredOutput).length === 0) {
    return {};
  }

  if (typeof structuredOutput.type === 'string') {
    if (structuredOutput.type === 'object' && isRecord(structuredOutput.properties)) {
      return extractProperties(structuredOutput.properties);
    }
    return { value: typeOfSchema(structuredOutput) };
  }

  return asShape(structuredOutput) ?? { value: 'unknown' };
}

/**
 * Narrow a plain key/type description to a shape, or null when a leaf is
 * neither a type name nor a nested description.
 */
export function asShape(value: Record<string, unknown>): Shape | null {
  const shape: Shape = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      setOwn(shape, key, entry);
    } else if (isRecord(entry)) {
      const nested = asShape(entry);
      if (nested === null) return null;
      setOwn(shape, key, nested);
    } else {
      return null;
    }
  }
  return shape;
}

// =============================================================================
// Shape Inference
// =============================================================================

/**
 * Type name of a concrete value
 */
export function typeName(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
    case 'bigint':
      return 'number';
    case 'string':
      return 'string';
    case 'object':
      return 'object';
    default:
      return 'unknown';
  }
}

/**
 * Shape of a concrete object, one level deep per nested object
 */
export function shapeOfValue(value: unknown): Shape {
  if (!isRecord(value)) {
    return { value: typeName(value) };
  }
  const shape: Shape = {};
  for (const [key, entry] of Object.entries(value)) {
    setOwn(shape, key, isRecord(entry) ? shapeOfValue(entry) : typeName(entry));
  }
  return shape;
}

// =============================================================================
// Union Merge
// =============================================================================

/**
 * One contributor to a union merge
 */
export interface MergeSource<V> {
  /** Id of the node the value came from */
  nodeId: string;
  value: Record<string, V>;
}

/**
 * Result of a union merge
 */
export interface MergeResult<V> {
  merged: Record<string, V>;
  /** One note per colliding key */
  notes: string[];
  /** Colliding key -> ids of every source that supplied it */
  collisions: Map<string, string[]>;
}

/**
 * Union-merge values in the given order (callers pass topological order).
 *
 * Keys from one source pass through. Keys whose values agree pass through.
 * Keys whose values disagree take the value of the last source, and a note
 * names the key and every source that supplied it.
 */
export function unionMerge<V>(
  sources: ReadonlyArray<MergeSource<V>>,
  same: (a: V, b: V) => boolean = sameValue
): MergeResult<V> {
  const merged: Record<string, V> = {};
  const suppliers = new Map<string, string[]>();
  const conflicting = new Set<string>();

  for (const source of sources) {
    for (const [key, value] of Object.entries(source.value)) {
      const seen = suppliers.get(key);
      if (seen === undefined) {
        suppliers.set(key, [source.nodeId]);
      } else {
        if (!same(merged[key], value)) conflicting.add(key);
        seen.push(source.nodeId);
      }
      setOwn(merged, key, value);
    }
  }

  const notes: string[] = [];
  const collisions = new Map<string, string[]>();
  for (const key of conflicting) {
    const ids = suppliers.get(key) ?? [];
    collisions.set(key, ids);
    notes.push(
      `Field '${key}' has conflicting types from parents ${ids.join(', ')}; using ${ids[ids.length - 1]}`
    );
  }

  return { merged, notes, collisions };
}

/**
 * Structural equality over JSON-like values
 */
export function sameValue(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => sameValue(item, b[i]));
  }
  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    return aKeys.length === bKeys.length && aKeys.every((key) => key in b && sameValue(a[key], b[key]));
  }
  return false;
}

/**
 * Compare real values by their type names, so two parents both supplying a
 * string for the same key do not count as a collision.
 */
export function sameType(a: unknown, b: unknown): boolean {
  return typeName(a) === typeName(b);
}
