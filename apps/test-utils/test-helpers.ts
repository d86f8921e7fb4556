import { randomUUID } from "crypto";
import { newDb, DataType } from "pg-mem";
import { PgDbClient, readSchema } from "@coin-casino/core-db";
import type { ILogger } from "@coin-casino/core-logging";
import type { IMetrics } from "@coin-casino/core-metrics";

export interface LoggedEntry {
  level: "info" | "warn" | "error";
  msg: string;
  meta: Record<string, unknown>;
}

export class InMemoryLogger implements ILogger {
  readonly entries: LoggedEntry[] = [];

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "info", msg, meta });
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "warn", msg, meta });
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "error", msg, meta });
  }

  messages(level?: LoggedEntry["level"]): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.msg);
  }
}

export class RecordingMetrics implements IMetrics {
  readonly counts = new Map<string, number>();
  readonly observations: { name: string; value: number }[] = [];

  increment(name: string, labels: Record<string, string> = {}): void {
    const key = metricKey(name, labels);
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }

  observe(name: string, value: number): void {
    this.observations.push({ name, value });
  }

  count(name: string, labels: Record<string, string> = {}): number {
    return this.counts.get(metricKey(name, labels)) ?? 0;
  }
}

function metricKey(name: string, labels: Record<string, string>): string {
  const suffix = Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`)
    .join(",");
  return `${name}{${suffix}}`;
}

/** pg-mem database loaded with the production schema. */
export async function createDbClient(): Promise<PgDbClient> {
  const db = newDb({ autoCreateForeignKeyIndices: true });
  db.public.registerFunction({
    name: "now",
    returns: DataType.timestamptz,
    implementation: () => new Date(),
  });
  db.public.registerFunction({
    name: "gen_random_uuid",
    returns: DataType.uuid,
    implementation: () => randomUUID(),
  });
  db.public.none(readSchema());

  const { Pool } = db.adapters.createPg();
  return new PgDbClient(new Pool());
}
