/**
 * Reliability Primitives
 *
 * This module provides:
 * - Error taxonomy for consistent failure handling
 * - Observability primitives (structured logging, tracing, metrics)
 * - Retry with exponential backoff and jitter
 *
 * @module @nodeflow/core/reliability
 */

// Error taxonomy
export {
  type NodeflowErrorCode,
  type NodeflowErrorOptions,
  NodeflowError,
  RetryableError,
  TimeoutError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ConfigurationError,
  isRetryable,
  toError,
} from './errors.js';

// Observability
export {
  type LogLevel,
  type LogEntry,
  type TraceContext,
  type MetricType,
  type MetricValue,
  type MetricsRegistry,
  Logger,
  getLogger,
  createTraceContext,
  getTraceContext,
  setTraceContext,
  withChildSpan,
  DefaultMetricsRegistry,
  type DefaultMetricsRegistryOptions,
  getMetricsRegistry,
  setMetricsRegistry,
} from './observability.js';

// Retry
export {
  type RetryConfig,
  DEFAULT_RETRY_CONFIG,
  calculateBackoff,
  retry,
} from './retry.js';
