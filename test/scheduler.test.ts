// test/scheduler.test.ts

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  BadRequestError,
  DEFAULT_ROUTER_CONFIG,
  InMemoryServiceDescriptionStore,
  SchedulerState,
  SchedulerStateBroadcaster,
  SchedulerSyncer,
  allowsWorkStealing,
  instanceEndpoint,
  resolveServiceDescription,
} from "../src";
import { FakeScheduler, ManualClock, makeInstance, schedulerState } from "./fixtures";

describe("SchedulerStateBroadcaster", () => {
  it("should deliver published snapshots to subscribers", () => {
    const broadcaster = new SchedulerStateBroadcaster("router-1");
    const received: SchedulerState[] = [];
    broadcaster.subscribe((state) => received.push(state));

    const state = schedulerState({ "svc-a": { healthy: [makeInstance("i-1")] } });
    expect(broadcaster.publish(state)).toBe(true);

    expect(received).toHaveLength(1);
    expect(received[0].serviceIdToHealthyInstances["svc-a"][0].id).toBe("i-1");
  });

  it("should replay the latest snapshot to a late subscriber", () => {
    const broadcaster = new SchedulerStateBroadcaster();
    broadcaster.publish(schedulerState({ "svc-a": {} }, 1));
    broadcaster.publish(schedulerState({ "svc-b": {} }, 2));

    const received: number[] = [];
    broadcaster.subscribe((state) => received.push(state.time));

    expect(received).toEqual([2]);
    expect(broadcaster.latest()?.availableServiceIds).toEqual(["svc-b"]);
  });

  it("should drop a malformed snapshot and keep the previous one", () => {
    const broadcaster = new SchedulerStateBroadcaster();
    const received: number[] = [];
    broadcaster.subscribe((state) => received.push(state.time));
    broadcaster.publish(schedulerState({ "svc-a": {} }, 1));

    expect(broadcaster.publish({ availableServiceIds: "svc-a" })).toBe(false);
    expect(received).toEqual([1]);
    expect(broadcaster.latest()?.time).toBe(1);
  });

  it("should reject instances filed under another service", () => {
    const broadcaster = new SchedulerStateBroadcaster();
    const state = schedulerState({ "svc-a": { healthy: [makeInstance("i-1", "svc-b")] } });

    expect(broadcaster.publish(state)).toBe(false);
  });

  it("should default missing killed instances", () => {
    const broadcaster = new SchedulerStateBroadcaster();
    broadcaster.publish({
      availableServiceIds: [],
      serviceIdToHealthyInstances: {},
      serviceIdToUnhealthyInstances: {},
      time: 5,
    });

    expect(broadcaster.latest()?.serviceIdToKilledInstances).toEqual({});
  });

  it("should stop delivering after unsubscribe and survive a throwing listener", () => {
    const broadcaster = new SchedulerStateBroadcaster();
    const received: number[] = [];
    const unsubscribe = broadcaster.subscribe((state) => received.push(state.time));
    broadcaster.subscribe(() => {
      throw new Error("listener failed");
    });

    broadcaster.publish(schedulerState({}, 1));
    unsubscribe();
    broadcaster.publish(schedulerState({}, 2));

    expect(received).toEqual([1]);
  });
});

describe("SchedulerSyncer", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should publish what the scheduler returns", async () => {
    const broadcaster = new SchedulerStateBroadcaster();
    const scheduler = new FakeScheduler(schedulerState({ "svc-a": {} }, 7));
    const clock = new ManualClock();
    const syncer = new SchedulerSyncer(scheduler, broadcaster, { intervalSecs: 1 }, "router-1", clock.now);

    expect(await syncer.syncOnce()).toBe(true);
    expect(broadcaster.latest()?.time).toBe(7);
    expect(syncer.getHealth()).toEqual({
      name: "SchedulerSyncer",
      status: "healthy",
      details: { running: false, lastSuccessAt: clock.current, consecutiveFailures: 0 },
    });
  });

  it("should keep the previous snapshot when the scheduler fails", async () => {
    const broadcaster = new SchedulerStateBroadcaster();
    const scheduler = new FakeScheduler(schedulerState({ "svc-a": {} }, 7));
    const syncer = new SchedulerSyncer(scheduler, broadcaster, { intervalSecs: 1 });
    await syncer.syncOnce();

    scheduler.failing = true;
    expect(await syncer.syncOnce()).toBe(false);
    expect(broadcaster.latest()?.time).toBe(7);
    expect(syncer.getHealth().status).toBe("degraded");

    await syncer.syncOnce();
    await syncer.syncOnce();
    expect(syncer.getHealth().status).toBe("unhealthy");
  });

  it("should poll on its interval until stopped", async () => {
    vi.useFakeTimers();
    const broadcaster = new SchedulerStateBroadcaster();
    const scheduler = new FakeScheduler(schedulerState({}, 1));
    const spy = vi.spyOn(scheduler, "getSchedulerState");
    const syncer = new SchedulerSyncer(scheduler, broadcaster, { intervalSecs: 2 });

    syncer.start();
    await vi.advanceTimersByTimeAsync(4000);
    expect(spy).toHaveBeenCalledTimes(3);
    expect(syncer.getHealth().details?.running).toBe(true);

    syncer.stop();
    await vi.advanceTimersByTimeAsync(4000);
    expect(spy).toHaveBeenCalledTimes(3);
  });
});

describe("service descriptions", () => {
  it("should fill missing fields from the configuration", () => {
    const store = new InMemoryServiceDescriptionStore();
    store.put("svc-a", { maxQueueLength: 3, name: "Service A" });

    expect(resolveServiceDescription(store, "svc-a", DEFAULT_ROUTER_CONFIG)).toEqual({
      interstitialSecs: 0,
      maxQueueLength: 3,
      concurrencyLevel: 1,
      distributionScheme: "balanced",
      name: "Service A",
    });
    expect(resolveServiceDescription(store, "svc-x", DEFAULT_ROUTER_CONFIG).maxQueueLength).toBe(1000000);
  });

  it("should keep defaults for fields a source leaves undefined", () => {
    const source = { get: () => ({ concurrencyLevel: undefined, maxQueueLength: 5 }) };

    const description = resolveServiceDescription(source, "svc-a", DEFAULT_ROUTER_CONFIG);

    expect(description.concurrencyLevel).toBe(1);
    expect(description.maxQueueLength).toBe(5);
    expect(description.distributionScheme).toBe("balanced");
  });

  it("should reject invalid fields", () => {
    const store = new InMemoryServiceDescriptionStore();

    expect(() => store.put("svc-a", { concurrencyLevel: 0 })).toThrow(BadRequestError);
    expect(store.get("svc-a")).toBeUndefined();
  });

  it("should only let balanced services take part in work-stealing", () => {
    expect(allowsWorkStealing("balanced")).toBe(true);
    expect(allowsWorkStealing("simple")).toBe(false);
  });

  it("should format an instance endpoint", () => {
    expect(instanceEndpoint(makeInstance("i-1", "svc-a", 31000))).toBe("127.0.0.1:31000");
  });
});
