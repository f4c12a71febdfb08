/**
 * Prompt Templates
 *
 * Text with `{{ expression }}` placeholders, used by job prompts and by the
 * query templates of resource nodes.
 *
 * @module @nodeflow/engine/expression/template
 */

import { checkExpressionSyntax, evaluateExpression, type ExpressionContext } from './evaluator.js';
import { ExpressionEvaluationError, ExpressionSyntaxError } from '../errors.js';

const PLACEHOLDER_PATTERN = /\{\{\s*(.*?)\s*\}\}/g;

const KNOWN_ROOTS = ['base.', 'input.'];

/**
 * Outcome of checking a template
 */
export interface TemplateValidation {
  placeholders: string[];
  /** Non-fatal findings, such as placeholders outside `base`/`input` */
  warnings: string[];
  /** Findings that make the template unusable */
  errors: string[];
}

export interface RenderedTemplate {
  text: string;
  /** One entry per placeholder left unresolved */
  warnings: string[];
}

/**
 * List the trimmed placeholder expressions in a template
 */
export function extractPlaceholders(text: string): string[] {
  return Array.from(text.matchAll(PLACEHOLDER_PATTERN), (match) => match[1].trim());
}

function count(text: string, char: string): number {
  return text.split(char).length - 1;
}

/**
 * Check every placeholder of a template
 */
export function validateTemplate(text: string): TemplateValidation {
  const placeholders = extractPlaceholders(text);
  const warnings: string[] = [];
  const errors: string[] = [];

  for (const placeholder of placeholders) {
    if (placeholder === '') {
      errors.push('Empty placeholder found: {{}}');
      continue;
    }
    if (placeholder.includes('{') || placeholder.includes('}')) {
      errors.push(`Malformed placeholder: {{${placeholder}}}`);
      continue;
    }
    if (!KNOWN_ROOTS.some((root) => placeholder.startsWith(root))) {
      warnings.push(
        `Unknown root in placeholder: {{${placeholder}}} - should start with 'base.' or 'input.'`
      );
      continue;
    }

    const unbalanced: string[] = [];
    if (count(placeholder, '[') !== count(placeholder, ']')) {
      unbalanced.push(`Unclosed brackets in placeholder: {{${placeholder}}}`);
    }
    if (count(placeholder, '(') !== count(placeholder, ')')) {
      unbalanced.push(`Unclosed parentheses in placeholder: {{${placeholder}}}`);
    }
    if (unbalanced.length > 0) {
      errors.push(...unbalanced);
      continue;
    }

    try {
      checkExpressionSyntax(placeholder);
    } catch (error) {
      if (!(error instanceof ExpressionSyntaxError)) throw error;
      errors.push(`Invalid expression in placeholder: {{${placeholder}}}: ${error.detail}`);
    }
  }

  return { placeholders, warnings, errors };
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

interface Resolution {
  value: unknown;
  error?: string;
}

async function attempt(expression: string, context: ExpressionContext, timeoutMs?: number): Promise<Resolution> {
  try {
    return { value: await evaluateExpression(expression, context, { timeoutMs }) };
  } catch (error) {
    if (!(error instanceof ExpressionEvaluationError)) throw error;
    return { value: undefined, error: error.detail };
  }
}

async function resolvePlaceholder(
  expression: string,
  context: ExpressionContext,
  timeoutMs: number | undefined
): Promise<Resolution> {
  if (KNOWN_ROOTS.some((root) => expression.startsWith(root))) {
    return attempt(expression, context, timeoutMs);
  }

  // Bare placeholders read from input first, then base
  const fromInput = await attempt(`input.(${expression})`, context, timeoutMs);
  if (fromInput.value !== undefined && fromInput.value !== null) return fromInput;
  return attempt(`base.(${expression})`, context, timeoutMs);
}

/**
 * Replace each placeholder with its evaluated value. Placeholders that
 * evaluate to nothing stay in place and produce a warning.
 */
export async function renderTemplate(
  template: string,
  context: ExpressionContext,
  options: { timeoutMs?: number } = {}
): Promise<RenderedTemplate> {
  const warnings: string[] = [];
  let text = '';
  let last = 0;

  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const start = match.index ?? 0;
    const expression = match[1].trim();
    text += template.slice(last, start);
    last = start + match[0].length;

    const resolved: Resolution =
      expression === '' ? { value: undefined } : await resolvePlaceholder(expression, context, options.timeoutMs);
    if (resolved.value === undefined || resolved.value === null) {
      const reason = resolved.error ? ` (${resolved.error})` : '';
      warnings.push(`Could not resolve placeholder: {{${expression}}}${reason}`);
      text += match[0];
    } else {
      text += stringify(resolved.value);
    }
  }

  text += template.slice(last);
  return { text, warnings };
}
