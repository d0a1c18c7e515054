/**
 * Metrics collector port: Prometheus-compatible series plus the generic
 * `record(name, value, unit)` sink integration code reports through.
 * The core defines WHAT we track; infrastructure decides HOW.
 */

export type Labels = Record<string, string>;

export interface Counter {
  inc(labels?: Labels, value?: number): void;
  get(labels?: Labels): number;
}

export interface Histogram {
  observe(value: number, labels?: Labels): void;
  /** Returns { count, sum, buckets: Map<number, number> } per label set */
  get(labels?: Labels): HistogramSnapshot | undefined;
}

export interface Gauge {
  set(value: number, labels?: Labels): void;
  get(labels?: Labels): number;
}

export interface HistogramSnapshot {
  readonly count: number;
  readonly sum: number;
  readonly buckets: ReadonlyMap<number, number>;
}

export interface RecordedMetric {
  readonly name: string;
  readonly unit: string;
  readonly last: number;
  readonly count: number;
  readonly sum: number;
}

export interface MetricsCollector {
  /** Gateway dispatches by interface, operation and outcome */
  readonly gatewayOperationsTotal: Counter;
  /** Gateway dispatch latency in milliseconds */
  readonly gatewayOperationDurationMs: Histogram;
  /** Outbound requests by transport and outcome */
  readonly networkRequestsTotal: Counter;
  /** Retry attempts by transport */
  readonly networkRetriesTotal: Counter;
  /** Local admission rejections by transport */
  readonly rateLimitedTotal: Counter;
  /** Circuit breaker state (0=closed, 1=half_open, 2=open) */
  readonly circuitBreakerState: Gauge;
  /** Cache entries dropped by reason (expired, lru, emergency) */
  readonly cacheEvictionsTotal: Counter;

  /** Generic sink: remember the latest value and running totals per name */
  record(name: string, value: number, unit?: string): void;
  /** Everything passed to record(), sorted by name */
  snapshot(): RecordedMetric[];

  /** Serialize all metrics to Prometheus text exposition format */
  serialize(): string;

  /** Reset all metrics (useful for testing) */
  reset(): void;
}
