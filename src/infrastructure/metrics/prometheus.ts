/**
 * Prometheus-compatible metrics collector: zero dependencies.
 *
 * Implements counters, histograms, and gauges with label support.
 * Serializes to Prometheus text exposition format (v0.0.4).
 */

import type {
  Counter,
  Gauge,
  Histogram,
  HistogramSnapshot,
  Labels,
  MetricsCollector,
  RecordedMetric,
} from "../../core/ports/metrics.js";

// ── Label key serialization ──

const labelKey = (labels?: Labels): string => {
  if (!labels) return "";
  const entries = Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : 1));
  if (entries.length === 0) return "";
  return entries.map(([k, v]) => `${k}="${v}"`).join(",");
};

const formatLabels = (key: string): string => (key ? `{${key}}` : "");

// ── Counter implementation ──

const createCounter = (name: string, help: string): Counter & { serialize(): string } => {
  const values = new Map<string, number>();

  return {
    inc(labels?: Labels, value = 1) {
      const key = labelKey(labels);
      values.set(key, (values.get(key) ?? 0) + value);
    },
    get(labels?: Labels): number {
      return values.get(labelKey(labels)) ?? 0;
    },
    serialize(): string {
      const lines: string[] = [];
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const [key, value] of values) {
        lines.push(`${name}${formatLabels(key)} ${value}`);
      }
      // If no values recorded, emit a zero line
      if (values.size === 0) {
        lines.push(`${name} 0`);
      }
      return lines.join("\n");
    },
  };
};

// ── Histogram implementation ──

/** Default Prometheus-style buckets (in ms for latency) */
const DEFAULT_BUCKETS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

interface HistogramData {
  count: number;
  sum: number;
  buckets: Map<number, number>;
}

const createHistogram = (
  name: string,
  help: string,
  buckets: readonly number[] = DEFAULT_BUCKETS,
): Histogram & { serialize(): string } => {
  const data = new Map<string, HistogramData>();

  const getOrCreate = (key: string): HistogramData => {
    let entry = data.get(key);
    if (!entry) {
      entry = {
        count: 0,
        sum: 0,
        buckets: new Map(buckets.map((b) => [b, 0])),
      };
      data.set(key, entry);
    }
    return entry;
  };

  return {
    observe(value: number, labels?: Labels) {
      const key = labelKey(labels);
      const entry = getOrCreate(key);
      entry.count++;
      entry.sum += value;
      for (const bound of buckets) {
        if (value <= bound) {
          entry.buckets.set(bound, (entry.buckets.get(bound) ?? 0) + 1);
        }
      }
    },
    get(labels?: Labels): HistogramSnapshot | undefined {
      const entry = data.get(labelKey(labels));
      if (!entry) return undefined;
      return {
        count: entry.count,
        sum: entry.sum,
        buckets: new Map(entry.buckets),
      };
    },
    serialize(): string {
      const lines: string[] = [];
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} histogram`);

      for (const [key, entry] of data) {
        const lbl = key ? `,${key}` : "";
        for (const bound of buckets) {
          const bucketCount = entry.buckets.get(bound) ?? 0;
          lines.push(`${name}_bucket{le="${bound}"${lbl}} ${bucketCount}`);
        }
        lines.push(`${name}_bucket{le="+Inf"${lbl}} ${entry.count}`);
        lines.push(`${name}_sum${formatLabels(key)} ${entry.sum}`);
        lines.push(`${name}_count${formatLabels(key)} ${entry.count}`);
      }

      if (data.size === 0) {
        // Emit empty buckets
        for (const bound of buckets) {
          lines.push(`${name}_bucket{le="${bound}"} 0`);
        }
        lines.push(`${name}_bucket{le="+Inf"} 0`);
        lines.push(`${name}_sum 0`);
        lines.push(`${name}_count 0`);
      }

      return lines.join("\n");
    },
  };
};

// ── Gauge implementation ──

const createGauge = (name: string, help: string): Gauge & { serialize(): string } => {
  const values = new Map<string, number>();

  return {
    set(value: number, labels?: Labels) {
      values.set(labelKey(labels), value);
    },
    get(labels?: Labels): number {
      return values.get(labelKey(labels)) ?? 0;
    },
    serialize(): string {
      const lines: string[] = [];
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} gauge`);
      for (const [key, value] of values) {
        lines.push(`${name}${formatLabels(key)} ${value}`);
      }
      if (values.size === 0) {
        lines.push(`${name} 0`);
      }
      return lines.join("\n");
    },
  };
};

// ── Generic record() sink ──

interface RecordedSeries {
  unit: string;
  last: number;
  count: number;
  sum: number;
}

/** Prometheus metric names allow [a-zA-Z0-9_:] only */
const sanitizeName = (name: string): string => name.replace(/[^a-zA-Z0-9_:]/g, "_");

const serializeRecorded = (recorded: ReadonlyMap<string, RecordedSeries>): string => {
  const lines: string[] = [];
  for (const [name, series] of [...recorded].sort(([a], [b]) => (a < b ? -1 : 1))) {
    const metric = sanitizeName(name);
    lines.push(`# HELP ${metric} Recorded ${series.unit} values`);
    lines.push(`# TYPE ${metric} gauge`);
    lines.push(`${metric} ${series.last}`);
  }
  return lines.join("\n");
};

// ── Metrics collector factory ──

const createSeries = () => ({
  gatewayOperationsTotal: createCounter(
    "gateway_operations_total",
    "Total gateway dispatches by interface, operation and outcome",
  ),
  gatewayOperationDurationMs: createHistogram(
    "gateway_operation_duration_ms",
    "Gateway dispatch duration in milliseconds",
  ),
  networkRequestsTotal: createCounter(
    "network_requests_total",
    "Outbound network calls by transport and outcome",
  ),
  networkRetriesTotal: createCounter("network_retries_total", "Retry attempts by transport"),
  rateLimitedTotal: createCounter(
    "rate_limited_total",
    "Calls rejected by the local rate limiter",
  ),
  circuitBreakerState: createGauge(
    "circuit_breaker_state",
    "Circuit breaker state (0=closed, 1=half_open, 2=open)",
  ),
  cacheEvictionsTotal: createCounter(
    "cache_evictions_total",
    "Cache entries dropped by reason (expired, lru, emergency)",
  ),
});

export const createMetricsCollector = (): MetricsCollector => {
  let series = createSeries();
  let recorded = new Map<string, RecordedSeries>();

  return {
    get gatewayOperationsTotal() {
      return series.gatewayOperationsTotal;
    },
    get gatewayOperationDurationMs() {
      return series.gatewayOperationDurationMs;
    },
    get networkRequestsTotal() {
      return series.networkRequestsTotal;
    },
    get networkRetriesTotal() {
      return series.networkRetriesTotal;
    },
    get rateLimitedTotal() {
      return series.rateLimitedTotal;
    },
    get circuitBreakerState() {
      return series.circuitBreakerState;
    },
    get cacheEvictionsTotal() {
      return series.cacheEvictionsTotal;
    },

    record(name: string, value: number, unit = "count"): void {
      const entry = recorded.get(name);
      if (entry) {
        entry.unit = unit;
        entry.last = value;
        entry.count++;
        entry.sum += value;
      } else {
        recorded.set(name, { unit, last: value, count: 1, sum: value });
      }
    },

    snapshot(): RecordedMetric[] {
      return [...recorded]
        .sort(([a], [b]) => (a < b ? -1 : 1))
        .map(([name, s]) => ({ name, unit: s.unit, last: s.last, count: s.count, sum: s.sum }));
    },

    serialize(): string {
      const sections = [
        series.gatewayOperationsTotal.serialize(),
        series.gatewayOperationDurationMs.serialize(),
        series.networkRequestsTotal.serialize(),
        series.networkRetriesTotal.serialize(),
        series.rateLimitedTotal.serialize(),
        series.circuitBreakerState.serialize(),
        series.cacheEvictionsTotal.serialize(),
      ];
      if (recorded.size > 0) {
        sections.push(serializeRecorded(recorded));
      }
      return `${sections.join("\n\n")}\n`;
    },

    reset(): void {
      series = createSeries();
      recorded = new Map();
    },
  };
};
