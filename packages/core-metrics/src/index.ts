import { Global, Module } from "@nestjs/common";
import { Counter, Histogram, Registry } from "prom-client";

export interface IMetrics {
  increment(name: string, labels?: Record<string, string>): void;
  observe(name: string, value: number, labels?: Record<string, string>): void;
}

export const METRICS = Symbol("METRICS");

const HELP: Record<string, string> = {
  wagers_total: "Wagers by game and result; rejected counts failed settlements",
  settlement_latency_ms: "Time from settle() call to commit, in milliseconds",
  coin_requests_total: "Coin request transitions by resulting status",
};

const LATENCY_BUCKETS_MS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2000];

/**
 * Creates collectors on first use. A metric's label names are fixed by its
 * first call; later calls must pass the same keys.
 */
export class PrometheusMetricsService implements IMetrics {
  private readonly counters = new Map<string, Counter<string>>();
  private readonly histograms = new Map<string, Histogram<string>>();

  constructor(readonly registry: Registry = new Registry()) {
    this.registry.setDefaultLabels({ service: "coin-casino" });
  }

  increment(name: string, labels: Record<string, string> = {}): void {
    let counter = this.counters.get(name);
    if (!counter) {
      counter = new Counter({ name, help: HELP[name] ?? name, labelNames: Object.keys(labels), registers: [this.registry] });
      this.counters.set(name, counter);
    }
    counter.inc(labels, 1);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    let histogram = this.histograms.get(name);
    if (!histogram) {
      histogram = new Histogram({
        name,
        help: HELP[name] ?? name,
        labelNames: Object.keys(labels),
        buckets: LATENCY_BUCKETS_MS,
        registers: [this.registry],
      });
      this.histograms.set(name, histogram);
    }
    histogram.observe(labels, value);
  }

  /** Prometheus text exposition of everything recorded so far. */
  metricsText(): Promise<string> {
    return this.registry.metrics();
  }
}

export class NoopMetricsService implements IMetrics {
  increment(): void {}
  observe(): void {}
}

@Global()
@Module({
  providers: [
    {
      provide: METRICS,
      useFactory: (): IMetrics =>
        process.env.METRICS_DISABLED === "true" ? new NoopMetricsService() : new PrometheusMetricsService(),
    },
  ],
  exports: [METRICS],
})
export class MetricsModule {}
