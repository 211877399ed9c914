import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export interface RequestObservation {
  /** "success" or the error kind that ended the request. */
  outcome: string;
  latencyMs: number;
  cached: boolean;
}

export type UpstreamOutcome = "success" | "upstream.transient" | "upstream.permanent" | "upstream.malformed_response" | "error";

export interface MetricsRecorder {
  recordRequest(observation: RequestObservation): void;
  recordUpstreamCall(outcome: UpstreamOutcome): void;
  setCacheEntries(count: number): void;
}

/**
 * Prometheus counters for the identify pipeline. Each instance owns its registry so that
 * several apps (tests, mostly) can coexist in one process.
 */
export class PrometheusMetrics implements MetricsRecorder {
  readonly registry = new Registry();

  private readonly requestsTotal = new Counter({
    name: "plant_gateway_requests_total",
    help: "Identification requests by outcome and cache source",
    labelNames: ["outcome", "cached"] as const,
    registers: [this.registry],
  });

  private readonly requestDuration = new Histogram({
    name: "plant_gateway_request_duration_seconds",
    help: "Identification request latency",
    labelNames: ["outcome"] as const,
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
    registers: [this.registry],
  });

  private readonly upstreamCalls = new Counter({
    name: "plant_gateway_upstream_calls_total",
    help: "Calls to the identification provider by outcome",
    labelNames: ["outcome"] as const,
    registers: [this.registry],
  });

  private readonly cacheEntries = new Gauge({
    name: "plant_gateway_cache_entries",
    help: "Entries currently held in the result cache",
    registers: [this.registry],
  });

  constructor(options: { collectDefaults?: boolean } = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  recordRequest({ outcome, latencyMs, cached }: RequestObservation): void {
    this.requestsTotal.inc({ outcome, cached: String(cached) });
    this.requestDuration.observe({ outcome }, latencyMs / 1000);
  }

  recordUpstreamCall(outcome: UpstreamOutcome): void {
    this.upstreamCalls.inc({ outcome });
  }

  setCacheEntries(count: number): void {
    this.cacheEntries.set(count);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
