// test/fixtures.ts

import { MetricsSink, Scheduler, SchedulerState, ServiceInstance } from "../src";

export function makeInstance(id: string, serviceId = "svc-a", port = 8080): ServiceInstance {
  return { id, serviceId, host: "127.0.0.1", port };
}

export interface ServiceInstances {
  healthy?: ServiceInstance[];
  unhealthy?: ServiceInstance[];
  killed?: ServiceInstance[];
}

/**
 * Scheduler snapshot where every listed service is available.
 */
export function schedulerState(services: Record<string, ServiceInstances>, time = 1000): SchedulerState {
  const state: SchedulerState = {
    availableServiceIds: Object.keys(services),
    serviceIdToHealthyInstances: {},
    serviceIdToUnhealthyInstances: {},
    serviceIdToKilledInstances: {},
    time,
  };
  for (const [serviceId, instances] of Object.entries(services)) {
    state.serviceIdToHealthyInstances[serviceId] = instances.healthy ?? [];
    state.serviceIdToUnhealthyInstances[serviceId] = instances.unhealthy ?? [];
    state.serviceIdToKilledInstances[serviceId] = instances.killed ?? [];
  }
  return state;
}

export class RecordingMetrics implements MetricsSink {
  readonly values = new Map<string, number>();
  readonly timers: Array<[name: string, durationMs: number]> = [];

  setCounter(name: string, value: number): void {
    this.values.set(name, value);
  }

  incCounter(name: string, delta = 1): void {
    this.values.set(name, (this.values.get(name) ?? 0) + delta);
  }

  markMeter(name: string): void {
    this.incCounter(name);
  }

  recordTimer(name: string, durationMs: number): void {
    this.timers.push([name, durationMs]);
  }

  get(name: string): number | undefined {
    return this.values.get(name);
  }
}

export class FakeScheduler implements Scheduler {
  readonly killed: ServiceInstance[] = [];
  failing = false;

  constructor(public state: SchedulerState) {}

  async getSchedulerState(): Promise<SchedulerState> {
    if (this.failing) {
      throw new Error("scheduler unavailable");
    }
    return this.state;
  }

  processInstanceKilled(instance: ServiceInstance): void {
    this.killed.push(instance);
  }
}

export class ManualClock {
  constructor(public current = 1_000_000) {}

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
