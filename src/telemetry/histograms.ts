import { Histogram } from "../types";

type Attributes = Record<string, string | number | undefined>;

export const LATENCY_BASE = "aoai-simulator.latency.base";
export const LATENCY_FULL = "aoai-simulator.latency.full";
export const TOKENS_USED = "aoai-simulator.tokens_used";
export const TOKENS_REQUESTED = "aoai-simulator.tokens_requested";

const LAT_BUCKETS = [0.05, 0.1, 0.2, 0.3, 0.5, 1, 2, 5, 10, 30]; // seconds
const TOKEN_BUCKETS = [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 50000];

export function labelString(attributes: Attributes, extra?: Record<string, string>): string {
  const parts = Object.entries({ ...attributes, ...extra })
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}="${String(v)}"`);
  return `{${parts.join(",")}}`;
}

export class InMemoryHistogram implements Histogram {
  observations: Array<{ value: number; attributes: Attributes }> = [];

  constructor(readonly name: string) {}

  record(value: number, attributes: Attributes): void {
    this.observations.push({ value, attributes: { ...attributes } });
  }
}

/**
 * Prometheus-style cumulative histogram: `_bucket{...,le="b"}` counters plus
 * `_sum` and `_count` per label set.
 */
export class BucketHistogram implements Histogram {
  readonly counters = new Map<string, number>();

  constructor(readonly name: string, private readonly buckets: readonly number[]) {}

  record(value: number, attributes: Attributes): void {
    if (!Number.isFinite(value)) {
      throw new RangeError(`${this.name}: cannot record non-finite value ${value}`);
    }
    const metric = this.name.replace(/[.-]/g, "_");
    for (const b of this.buckets) {
      if (value <= b) this.inc(`${metric}_bucket${labelString(attributes, { le: String(b) })}`, 1);
    }
    this.inc(`${metric}_bucket${labelString(attributes, { le: "+Inf" })}`, 1);
    this.inc(`${metric}_sum${labelString(attributes)}`, value);
    this.inc(`${metric}_count${labelString(attributes)}`, 1);
  }

  snapshot(): Map<string, number> {
    return new Map(this.counters);
  }

  private inc(key: string, by: number): void {
    this.counters.set(key, (this.counters.get(key) ?? 0) + by);
  }
}

export type InMemoryMetrics = {
  latencyBase: InMemoryHistogram;
  latencyFull: InMemoryHistogram;
  tokensUsed: InMemoryHistogram;
  tokensRequested: InMemoryHistogram;
};

export type BucketMetrics = {
  latencyBase: BucketHistogram;
  latencyFull: BucketHistogram;
  tokensUsed: BucketHistogram;
  tokensRequested: BucketHistogram;
};

export function createInMemoryMetrics(): InMemoryMetrics {
  return {
    latencyBase: new InMemoryHistogram(LATENCY_BASE),
    latencyFull: new InMemoryHistogram(LATENCY_FULL),
    tokensUsed: new InMemoryHistogram(TOKENS_USED),
    tokensRequested: new InMemoryHistogram(TOKENS_REQUESTED)
  };
}

export function createBucketMetrics(): BucketMetrics {
  return {
    latencyBase: new BucketHistogram(LATENCY_BASE, LAT_BUCKETS),
    latencyFull: new BucketHistogram(LATENCY_FULL, LAT_BUCKETS),
    tokensUsed: new BucketHistogram(TOKENS_USED, TOKEN_BUCKETS),
    tokensRequested: new BucketHistogram(TOKENS_REQUESTED, TOKEN_BUCKETS)
  };
}

export function snapshotMetrics(metrics: BucketMetrics): Record<string, number> {
  const out: Record<string, number> = {};
  for (const histogram of [metrics.latencyBase, metrics.latencyFull, metrics.tokensUsed, metrics.tokensRequested]) {
    for (const [key, value] of histogram.snapshot()) out[key] = value;
  }
  return out;
}

