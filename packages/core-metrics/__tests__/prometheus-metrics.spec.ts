import { describe, expect, it } from "vitest";
import { PrometheusMetricsService } from "@lotto-stake/core-metrics";

function sample(text: string, name: string, ...labels: string[]): string | undefined {
  const line = text
    .split("\n")
    .find((entry) => entry.startsWith(`${name}{`) && labels.every((label) => entry.includes(label)));
  return line?.slice(line.lastIndexOf(" ") + 1);
}

describe("PrometheusMetricsService", () => {
  it("counts operations per label set", async () => {
    const metrics = new PrometheusMetricsService();
    metrics.increment("lottery_operations_total", { operation: "rounds.placeBet", status: "success" });
    metrics.increment("lottery_operations_total", { operation: "rounds.placeBet", status: "success" });
    metrics.increment("lottery_operations_total", { operation: "rounds.placeBet", status: "rejected" });

    const text = await metrics.render();
    expect(text).toContain("# HELP lottery_operations_total Lottery operations by outcome (success, rejected, failed, persist_failed)");
    expect(sample(text, "lottery_operations_total", 'status="success"', 'service="lotto-stake"')).toBe("2");
    expect(sample(text, "lottery_operations_total", 'status="rejected"')).toBe("1");
  });

  it("records durations into histogram buckets", async () => {
    const metrics = new PrometheusMetricsService();
    metrics.observe("lottery_operation_duration_ms", 3, { operation: "gifts.distributeGifts" });

    const text = await metrics.render();
    expect(sample(text, "lottery_operation_duration_ms_bucket", 'le="2"')).toBe("0");
    expect(sample(text, "lottery_operation_duration_ms_bucket", 'le="5"')).toBe("1");
    expect(sample(text, "lottery_operation_duration_ms_count", 'operation="gifts.distributeGifts"')).toBe("1");
  });

  it("falls back to the metric name as help text", async () => {
    const metrics = new PrometheusMetricsService();
    metrics.increment("lottery_custom_total");

    expect(await metrics.render()).toContain("# HELP lottery_custom_total lottery_custom_total");
  });
});
