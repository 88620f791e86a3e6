/**
 * Secret Resolver Observability - Metrics
 */

/**
 * Metric types
 */
export enum MetricType {
  Counter = 'counter',
  Gauge = 'gauge',
  Histogram = 'histogram',
}

/**
 * Metric data point
 */
export interface MetricDataPoint {
  name: string;
  type: MetricType;
  value: number;
  labels?: Record<string, string>;
  timestamp?: Date;
}

/**
 * Metrics collector interface
 */
export interface MetricsCollector {
  increment(name: string, value?: number, labels?: Record<string, string>): void;
  gauge(name: string, value: number, labels?: Record<string, string>): void;
  histogram(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Default no-op metrics collector
 */
export class NoOpMetricsCollector implements MetricsCollector {
  increment(_name: string, _value?: number, _labels?: Record<string, string>): void {
    // No-op
  }

  gauge(_name: string, _value: number, _labels?: Record<string, string>): void {
    // No-op
  }

  histogram(_name: string, _value: number, _labels?: Record<string, string>): void {
    // No-op
  }
}

/**
 * Simple in-memory metrics collector
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private metrics: MetricDataPoint[] = [];

  increment(name: string, value = 1, labels?: Record<string, string>): void {
    this.record({ name, type: MetricType.Counter, value, labels });
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    this.record({ name, type: MetricType.Gauge, value, labels });
  }

  histogram(name: string, value: number, labels?: Record<string, string>): void {
    this.record({ name, type: MetricType.Histogram, value, labels });
  }

  getMetrics(): MetricDataPoint[] {
    return [...this.metrics];
  }

  getMetricsByName(name: string): MetricDataPoint[] {
    return this.metrics.filter((m) => m.name === name);
  }

  /**
   * Sum of all recorded values for a counter, optionally only the data points
   * carrying every given label
   */
  total(name: string, labels: Record<string, string> = {}): number {
    return this.getMetricsByName(name)
      .filter((m) => Object.entries(labels).every(([key, value]) => m.labels?.[key] === value))
      .reduce((sum, m) => sum + m.value, 0);
  }

  clear(): void {
    this.metrics = [];
  }

  private record(metric: MetricDataPoint): void {
    this.metrics.push({ ...metric, timestamp: metric.timestamp ?? new Date() });
  }
}

/**
 * Metric names emitted by the resolver
 */
export const METRICS = {
  // Cache metrics
  CACHE_HITS: 'secret_resolver_cache_hits',
  CACHE_MISSES: 'secret_resolver_cache_misses',
  CACHE_EVICTIONS: 'secret_resolver_cache_evictions',
  CACHE_SIZE: 'secret_resolver_cache_size',

  // Fetch metrics
  FETCH_ATTEMPTS: 'secret_resolver_fetch_attempts',
  FETCH_DURATION_MS: 'secret_resolver_fetch_duration_ms',
  FETCH_ERRORS: 'secret_resolver_fetch_errors',
  RETRY_ATTEMPTS: 'secret_resolver_retry_attempts',
  SINGLE_FLIGHT_JOINS: 'secret_resolver_single_flight_joins',

  // Credential metrics
  CREDENTIAL_ACQUISITIONS: 'secret_resolver_credential_acquisitions',
  CREDENTIAL_FAILURES: 'secret_resolver_credential_failures',

  // Rotation metrics
  SECRET_EXPIRY_DAYS: 'secret_resolver_secret_expiry_days',
  SECRET_ROTATIONS: 'secret_resolver_secret_rotations',
} as const;

/**
 * Create metrics labels for an operation
 */
export function createOperationLabels(
  operation: string,
  provider?: string
): Record<string, string> {
  const labels: Record<string, string> = { operation };
  if (provider) {
    labels.provider = provider;
  }
  return labels;
}

/**
 * Create metrics labels for an error
 */
export function createErrorLabels(operation: string, code: string): Record<string, string> {
  return { operation, error_code: code };
}
