type Labels = Record<string, string>;

interface Metric {
  name: string;
  value: number;
  timestamp: number;
  labels?: Labels;
}

export interface HistogramSummary {
  count: number;
  avg: number;
  max: number;
}

export class MetricsCollector {
  private metrics: Metric[] = [];
  private counters = new Map<string, number>();
  private histograms = new Map<string, number[]>();

  incrementCounter(name: string, labels?: Labels): void {
    const key = metricKey(name, labels);
    const value = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, value);
    this.recordMetric(name, value, labels);
  }

  // Durations, sizes, etc.
  recordHistogram(name: string, value: number, labels?: Labels): void {
    const key = metricKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
    this.recordMetric(name, value, labels);
  }

  getCounter(name: string, labels?: Labels): number {
    return this.counters.get(metricKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: Labels): HistogramSummary {
    const values = this.histograms.get(metricKey(name, labels)) ?? [];
    if (values.length === 0) return { count: 0, avg: 0, max: 0 };
    const total = values.reduce((s, v) => s + v, 0);
    return { count: values.length, avg: total / values.length, max: Math.max(...values) };
  }

  private recordMetric(name: string, value: number, labels?: Labels): void {
    this.metrics.push({ name, value, timestamp: Date.now(), labels });
    // Keep only recent metrics (last 1000)
    if (this.metrics.length > 1000) {
      this.metrics = this.metrics.slice(-1000);
    }
  }

  exportJson(): { counters: Record<string, number>; histograms: Record<string, HistogramSummary> } {
    const counters = Object.fromEntries(this.counters);
    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, values] of this.histograms) {
      const total = values.reduce((s, v) => s + v, 0);
      histograms[key] = { count: values.length, avg: total / values.length, max: Math.max(...values) };
    }
    return { counters, histograms };
  }

  // Latest sample per series, Prometheus text format
  exportPrometheusMetrics(): string {
    const latest = new Map<string, Metric>();
    for (const metric of this.metrics) latest.set(metricKey(metric.name, metric.labels), metric);

    const lines: string[] = [];
    const typed = new Set<string>();
    for (const metric of latest.values()) {
      if (!typed.has(metric.name)) {
        lines.push(`# TYPE ${metric.name} gauge`);
        typed.add(metric.name);
      }
      const labels = metric.labels
        ? Object.entries(metric.labels).map(([k, v]) => `${k}="${v}"`).join(',')
        : '';
      lines.push(`${metric.name}${labels ? `{${labels}}` : ''} ${metric.value}`);
    }
    return lines.join('\n');
  }
}

function metricKey(name: string, labels?: Labels): string {
  if (!labels || Object.keys(labels).length === 0) return name;
  const sorted = Object.keys(labels).sort().map(k => `${k}=${labels[k]}`).join(',');
  return `${name}{${sorted}}`;
}
