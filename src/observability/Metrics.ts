import type { TurnOutcome } from "../types/Events.js";

export type Labels = Record<string, string>;

export interface CounterValue {
  name: string;
  labels: Labels;
  value: number;
}

export interface HistogramValue {
  name: string;
  labels: Labels;
  count: number;
  sum: number;
  /** upper bound (ms) → cumulative count */
  buckets: Record<string, number>;
}

export interface MetricsSnapshot {
  counters: CounterValue[];
  histograms: HistogramValue[];
}

interface Series {
  name: string;
  labels: Labels;
}

interface HistogramState extends Series {
  count: number;
  sum: number;
  values: number[];
}

const DEFAULT_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10_000, 30_000];

/**
 * In-process metrics for turns, model calls and tool dispatches.
 */
export class Metrics {
  private readonly counters = new Map<string, Series & { value: number }>();
  private readonly histograms = new Map<string, HistogramState>();

  increment(name: string, labels: Labels = {}, value = 1): void {
    const key = seriesKey(name, labels);
    const existing = this.counters.get(key);
    if (existing) {
      existing.value += value;
    } else {
      this.counters.set(key, { name, labels: { ...labels }, value });
    }
  }

  observe(name: string, labels: Labels, value: number): void {
    const key = seriesKey(name, labels);
    let hist = this.histograms.get(key);
    if (!hist) {
      hist = { name, labels: { ...labels }, count: 0, sum: 0, values: [] };
      this.histograms.set(key, hist);
    }
    hist.count++;
    hist.sum += value;
    hist.values.push(value);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.counters.get(seriesKey(name, labels))?.value ?? 0;
  }

  getHistogram(name: string, labels: Labels = {}): HistogramValue | undefined {
    const hist = this.histograms.get(seriesKey(name, labels));
    return hist ? toHistogramValue(hist) : undefined;
  }

  recordTurn(outcome: TurnOutcome, durationMs: number): void {
    this.increment("turns_total", { outcome });
    this.observe("turn_duration_ms", {}, durationMs);
  }

  recordModelCall(ok: boolean): void {
    this.increment("model_calls_total", { ok: String(ok) });
  }

  recordToolDispatch(tool: string, ok: boolean, durationMs: number): void {
    this.increment("tool_dispatch_total", { tool, ok: String(ok) });
    this.observe("tool_dispatch_duration_ms", { tool }, durationMs);
  }

  recordRetry(scope: string): void {
    this.increment("retries_total", { scope });
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: [...this.counters.values()].map(({ name, labels, value }) => ({
        name,
        labels,
        value,
      })),
      histograms: [...this.histograms.values()].map(toHistogramValue),
    };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

function seriesKey(name: string, labels: Labels): string {
  const sorted = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
  return `${name}{${sorted}}`;
}

function toHistogramValue(hist: HistogramState): HistogramValue {
  const buckets: Record<string, number> = {};
  for (const bound of DEFAULT_BUCKETS) {
    buckets[String(bound)] = hist.values.filter((v) => v <= bound).length;
  }
  return {
    name: hist.name,
    labels: { ...hist.labels },
    count: hist.count,
    sum: hist.sum,
    buckets,
  };
}
