import { newDb } from "pg-mem";
import { PgDbClient, type IDbClient } from "@lotto-stake/core-db";
import { type LotteryErrorCode, isLotteryError } from "@lotto-stake/core-errors";
import type { ILogger } from "@lotto-stake/core-logging";
import type { IMetrics } from "@lotto-stake/core-metrics";

export interface LogEntry {
  level: "info" | "warn" | "error";
  msg: string;
  meta: Record<string, unknown>;
}

export class InMemoryLogger implements ILogger {
  readonly entries: LogEntry[] = [];

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "info", msg, meta });
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "warn", msg, meta });
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "error", msg, meta });
  }

  messages(level?: LogEntry["level"]): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.msg);
  }
}

export class RecordingMetrics implements IMetrics {
  readonly counters = new Map<string, number>();
  readonly observations: Array<{ name: string; value: number; labels: Record<string, string> }> = [];

  increment(name: string, labels: Record<string, string> = {}): void {
    const key = metricKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    this.observations.push({ name, value, labels });
  }

  count(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(metricKey(name, labels)) ?? 0;
  }
}

function metricKey(name: string, labels: Record<string, string>): string {
  const rendered = Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`)
    .join(",");
  return `${name}{${rendered}}`;
}

/** Runs `fn` and returns the LotteryError code it threw, or null if it succeeded. */
export function errorCodeOf(fn: () => unknown): LotteryErrorCode | null {
  try {
    fn();
  } catch (err) {
    if (isLotteryError(err)) return err.code;
    throw err;
  }
  return null;
}

export function createDbClient(): IDbClient {
  const db = newDb();
  const pg = db.adapters.createPg();
  return new PgDbClient(new pg.Pool());
}
