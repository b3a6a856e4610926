import { Global, Module } from "@nestjs/common";
import { Counter, Histogram, Registry } from "prom-client";

export interface IMetrics {
  increment(name: string, labels?: Record<string, string>): void;
  observe(name: string, value: number, labels?: Record<string, string>): void;
}

export const METRICS = Symbol("METRICS");

const HELP: Record<string, string> = {
  lottery_operations_total: "Lottery operations by outcome (success, rejected, failed, persist_failed)",
  lottery_operation_duration_ms: "Time from lock acquisition to journal commit",
};

export class PrometheusMetricsService implements IMetrics {
  private counters = new Map<string, Counter<string>>();
  private histograms = new Map<string, Histogram<string>>();

  constructor(readonly registry: Registry = new Registry()) {
    this.registry.setDefaultLabels({ service: "lotto-stake" });
  }

  increment(name: string, labels: Record<string, string> = {}): void {
    const counter = this.getOrCreateCounter(name, Object.keys(labels));
    counter.inc(labels, 1);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    const histogram = this.getOrCreateHistogram(name, Object.keys(labels));
    histogram.observe(labels, value);
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }

  private getOrCreateCounter(name: string, labelNames: string[]): Counter<string> {
    const existing = this.counters.get(name);
    if (existing) return existing;
    const counter = new Counter({
      name,
      help: HELP[name] ?? name,
      labelNames,
      registers: [this.registry],
    });
    this.counters.set(name, counter);
    return counter;
  }

  private getOrCreateHistogram(name: string, labelNames: string[]): Histogram<string> {
    const existing = this.histograms.get(name);
    if (existing) return existing;
    const histogram = new Histogram({
      name,
      help: HELP[name] ?? name,
      labelNames,
      buckets: [0.5, 1, 2, 5, 10, 25, 50, 100, 250],
      registers: [this.registry],
    });
    this.histograms.set(name, histogram);
    return histogram;
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
      useFactory: () => {
        if (process.env.METRICS_DISABLED === "true") {
          return new NoopMetricsService();
        }
        return new PrometheusMetricsService();
      },
    },
  ],
  exports: [METRICS],
})
export class MetricsModule {}
