/**
 * Observability Primitives
 *
 * Structured logging, trace context and metrics interfaces.
 *
 * Hard rules:
 * - All logs are JSON structured
 * - Trace correlation via runId
 * - Metrics interface is pluggable (no cloud wiring required)
 *
 * @module @nodeflow/core/reliability/observability
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

// =============================================================================
// Log Types
// =============================================================================

/**
 * Log levels
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** Log level */
  level: LogLevel;

  /** Log message */
  message: string;

  /** ISO timestamp */
  timestamp: string;

  /** Run ID for correlation */
  runId?: string;

  /** Workflow ID for correlation */
  workflowId?: string;

  /** Node ID within run */
  nodeId?: string;

  /** Component name */
  component?: string;

  /** Additional structured data */
  data?: Record<string, unknown>;

  /** Error details if applicable */
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

// =============================================================================
// Logger
// =============================================================================

/**
 * Structured JSON logger
 */
export class Logger {
  private component: string;
  private context: Record<string, unknown>;

  constructor(component: string, context?: Record<string, unknown>) {
    this.component = component;
    this.context = context ?? {};
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.component, {
      ...this.context,
      ...additionalContext,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', message, data, describeError(error));
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    const trace = getTraceContext();

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      runId: trace?.runId ?? stringField(this.context, 'runId'),
      workflowId: trace?.workflowId ?? stringField(this.context, 'workflowId'),
      nodeId: trace?.nodeId ?? stringField(this.context, 'nodeId'),
      data: { ...this.context, ...data },
      error,
    };

    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([, v]) => v !== undefined)
    );

    const output = JSON.stringify(cleaned);

    switch (level) {
      case 'DEBUG':
        if (process.env.NODEFLOW_DEBUG === 'true' || process.env.DEBUG) {
          console.debug(output);
        }
        break;
      case 'INFO':
        console.info(output);
        break;
      case 'WARN':
        console.warn(output);
        break;
      case 'ERROR':
        console.error(output);
        break;
    }
  }
}

function stringField(context: Record<string, unknown>, key: string): string | undefined {
  const value = context[key];
  return typeof value === 'string' ? value : undefined;
}

function describeError(error: unknown): LogEntry['error'] | undefined {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code,
      stack: error.stack,
    };
  }
  if (error === undefined || error === null) {
    return undefined;
  }
  return { name: 'Error', message: String(error) };
}

// =============================================================================
// Logger Factory
// =============================================================================

const loggers = new Map<string, Logger>();

/**
 * Get or create a logger for a component
 */
export function getLogger(component: string, context?: Record<string, unknown>): Logger {
  const key = context ? `${component}:${JSON.stringify(context)}` : component;

  let logger = loggers.get(key);
  if (!logger) {
    logger = new Logger(component, context);
    loggers.set(key, logger);
  }

  return logger;
}

// =============================================================================
// Trace Context
// =============================================================================

/**
 * Trace context for correlation
 */
export interface TraceContext {
  /** Run ID as the primary correlation ID */
  runId: string;

  /** Workflow being executed */
  workflowId?: string;

  /** Current node ID */
  nodeId?: string;

  /** Parent span ID */
  parentSpanId?: string;

  /** Current span ID */
  spanId: string;

  /** When the trace started */
  startedAt: Date;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Create a new trace context
 */
export function createTraceContext(runId: string, options?: Partial<TraceContext>): TraceContext {
  return {
    runId,
    workflowId: options?.workflowId,
    nodeId: options?.nodeId,
    parentSpanId: options?.parentSpanId,
    spanId: generateSpanId(),
    startedAt: new Date(),
  };
}

/**
 * Get the current trace context
 */
export function getTraceContext(): TraceContext | undefined {
  return traceStorage.getStore();
}

/**
 * Set trace context and run a function
 */
export function setTraceContext<T>(ctx: TraceContext, fn: () => T): T {
  return traceStorage.run(ctx, fn);
}

/**
 * Run a function inside a child span of the current trace
 */
export function withChildSpan<T>(overrides: Partial<TraceContext>, fn: () => T): T {
  const parent = getTraceContext();
  if (!parent) {
    return fn();
  }
  return traceStorage.run(
    { ...parent, ...overrides, parentSpanId: parent.spanId, spanId: generateSpanId() },
    fn
  );
}

function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

// =============================================================================
// Metrics
// =============================================================================

/**
 * Metric types
 */
export type MetricType = 'counter' | 'gauge' | 'histogram' | 'timer';

/**
 * Metric value
 */
export interface MetricValue {
  name: string;
  type: MetricType;
  value: number;
  labels?: Record<string, string>;
  timestamp: Date;
}

/**
 * Metrics registry interface
 *
 * Implementations can use:
 * - In-memory (for testing)
 * - Prometheus
 * - OpenTelemetry
 */
export interface MetricsRegistry {
  increment(name: string, labels?: Record<string, string>, value?: number): void;

  gauge(name: string, value: number, labels?: Record<string, string>): void;

  histogram(name: string, value: number, labels?: Record<string, string>): void;

  /**
   * Record a timer value (duration in ms)
   */
  timer(name: string, durationMs: number, labels?: Record<string, string>): void;

  /**
   * Start a timer and return a function to stop it
   */
  startTimer(name: string, labels?: Record<string, string>): () => void;

  /**
   * Get all recorded metrics (for testing/debugging)
   */
  getMetrics(): MetricValue[];

  /**
   * Current counter value for a name and label set
   */
  getCounter(name: string, labels?: Record<string, string>): number;

  reset(): void;
}

// =============================================================================
// Default Metrics Implementation
// =============================================================================

export interface DefaultMetricsRegistryOptions {
  /** Histogram and timer samples kept per series; older samples are dropped (default: 1000) */
  maxSamplesPerSeries?: number;
}

/**
 * In-memory metrics registry. Counters and gauges hold one current value per
 * series; histograms and timers keep a bounded window of recent samples.
 */
export class DefaultMetricsRegistry implements MetricsRegistry {
  private readonly maxSamples: number;
  private counters = new Map<string, MetricValue>();
  private gauges = new Map<string, MetricValue>();
  private samples = new Map<string, MetricValue[]>();

  constructor(options: DefaultMetricsRegistryOptions = {}) {
    this.maxSamples = Math.max(1, options.maxSamplesPerSeries ?? 1000);
  }

  increment(name: string, labels?: Record<string, string>, value: number = 1): void {
    const key = this.makeKey(name, labels);
    const current = this.counters.get(key)?.value ?? 0;
    this.counters.set(key, { name, type: 'counter', value: current + value, labels, timestamp: new Date() });
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    this.gauges.set(this.makeKey(name, labels), { name, type: 'gauge', value, labels, timestamp: new Date() });
  }

  histogram(name: string, value: number, labels?: Record<string, string>): void {
    this.sample({ name, type: 'histogram', value, labels, timestamp: new Date() });
  }

  timer(name: string, durationMs: number, labels?: Record<string, string>): void {
    this.sample({ name, type: 'timer', value: durationMs, labels, timestamp: new Date() });
  }

  startTimer(name: string, labels?: Record<string, string>): () => void {
    const start = Date.now();
    return () => {
      this.timer(name, Date.now() - start, labels);
    };
  }

  getMetrics(): MetricValue[] {
    return [...this.counters.values(), ...this.gauges.values(), ...[...this.samples.values()].flat()];
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels))?.value ?? 0;
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.samples.clear();
  }

  private sample(metric: MetricValue): void {
    const key = `${metric.type}|${this.makeKey(metric.name, metric.labels)}`;
    const series = this.samples.get(key) ?? [];
    series.push(metric);
    if (series.length > this.maxSamples) {
      series.splice(0, series.length - this.maxSamples);
    }
    this.samples.set(key, series);
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name;
    const sorted = Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
    return `${name}:${sorted.map(([k, v]) => `${k}=${v}`).join(',')}`;
  }
}

// =============================================================================
// Metrics Singleton
// =============================================================================

let globalMetricsRegistry: MetricsRegistry | null = null;

/**
 * Get the global metrics registry
 */
export function getMetricsRegistry(): MetricsRegistry {
  if (!globalMetricsRegistry) {
    globalMetricsRegistry = new DefaultMetricsRegistry();
  }
  return globalMetricsRegistry;
}

/**
 * Set a custom metrics registry
 */
export function setMetricsRegistry(registry: MetricsRegistry): void {
  globalMetricsRegistry = registry;
}
