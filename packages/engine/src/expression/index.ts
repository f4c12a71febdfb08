/**
 * Expressions
 *
 * @module @nodeflow/engine/expression
 */

export {
  type ExpressionContext,
  type EvaluateOptions,
  DEFAULT_EXPRESSION_TIMEOUT_MS,
  getBaseDefaults,
  checkExpressionSyntax,
  evaluateExpression,
  evaluatePredicate,
} from './evaluator.js';

export {
  type TemplateValidation,
  type RenderedTemplate,
  extractPlaceholders,
  validateTemplate,
  renderTemplate,
} from './template.js';
