// src/metrics.ts

import { Counter, Gauge, Histogram, Registry } from "prom-client";

/**
 * Where the routing core reports its numbers. Names are dotted paths such as
 * `services.<service-id>.counters.instance-counts.slots-available`.
 */
export interface MetricsSink {
  /** Sets a counter to an absolute value. */
  setCounter(name: string, value: number): void;
  incCounter(name: string, delta?: number): void;
  markMeter(name: string): void;
  recordTimer(name: string, durationMs: number): void;
}

export type MetricType = "counters" | "meters" | "timers";

export function serviceMetric(serviceId: string, type: MetricType, ...path: string[]): string {
  return ["services", serviceId, type, ...path].join(".");
}

export function routerMetric(classifier: string, type: MetricType, ...path: string[]): string {
  return ["router", classifier, type, ...path].join(".");
}

export interface MetricTree {
  [key: string]: number | MetricTree;
}

/**
 * Turns the flat names below `prefix` into a nested map:
 * `{ "a.b": 1, "a.c": 2 }` becomes `{ a: { b: 1, c: 2 } }`.
 */
export function nestMetrics(flat: Record<string, number>, prefix = ""): MetricTree {
  const root: MetricTree = {};
  const lead = prefix ? `${prefix}.` : "";
  for (const [name, value] of Object.entries(flat)) {
    if (!name.startsWith(lead)) {
      continue;
    }
    const parts = name.slice(lead.length).split(".");
    let node = root;
    parts.forEach((part, index) => {
      if (index === parts.length - 1) {
        node[part] = value;
        return;
      }
      const next = node[part];
      if (typeof next === "object") {
        node = next;
      } else {
        const created: MetricTree = {};
        node[part] = created;
        node = created;
      }
    });
  }
  return root;
}

/**
 * Sums per-router snapshots name by name.
 */
export function aggregateRouterMetrics(
  byRouter: Record<string, Record<string, number>>,
): Record<string, number> {
  const total: Record<string, number> = {};
  for (const snapshot of Object.values(byRouter)) {
    for (const [name, value] of Object.entries(snapshot)) {
      total[name] = (total[name] ?? 0) + value;
    }
  }
  return total;
}

/**
 * prom-client backed sink. Every dotted name becomes the `name` label of
 * one of three series; counter and meter values are mirrored locally so
 * state endpoints can read them without scraping.
 */
export class PromMetricsSink implements MetricsSink {
  readonly registry: Registry;
  private readonly counters: Gauge<"name">;
  private readonly meters: Counter<"name">;
  private readonly timers: Histogram<"name">;
  private readonly values = new Map<string, number>();

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;
    this.counters = new Gauge({
      name: "instance_router_counter",
      help: "Router counters by dotted metric name",
      labelNames: ["name"],
      registers: [registry],
    });
    this.meters = new Counter({
      name: "instance_router_meter_total",
      help: "Router event meters by dotted metric name",
      labelNames: ["name"],
      registers: [registry],
    });
    this.timers = new Histogram({
      name: "instance_router_timer_seconds",
      help: "Router timers by dotted metric name",
      labelNames: ["name"],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 30],
      registers: [registry],
    });
  }

  setCounter(name: string, value: number): void {
    this.counters.set({ name }, value);
    this.values.set(name, value);
  }

  incCounter(name: string, delta = 1): void {
    this.counters.inc({ name }, delta);
    this.values.set(name, (this.values.get(name) ?? 0) + delta);
  }

  markMeter(name: string): void {
    this.meters.inc({ name });
    this.values.set(name, (this.values.get(name) ?? 0) + 1);
  }

  recordTimer(name: string, durationMs: number): void {
    this.timers.observe({ name }, durationMs / 1000);
  }

  /**
   * Current counter and meter values whose names start with `prefix`.
   */
  snapshot(prefix = ""): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [name, value] of this.values) {
      if (name.startsWith(prefix)) {
        result[name] = value;
      }
    }
    return result;
  }

  /** Prometheus text exposition. */
  expose(): Promise<string> {
    return this.registry.metrics();
  }
}
