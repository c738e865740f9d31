// test/dispatcher.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  ActorSystem,
  InMemoryServiceDescriptionStore,
  ServiceDispatcher,
  StaticCluster,
  ownedInstances,
  resolveRouterConfig,
} from "../src";
import { ManualClock, RecordingMetrics, makeInstance, schedulerState } from "./fixtures";

describe("ServiceDispatcher", () => {
  let system: ActorSystem;
  let cluster: StaticCluster;
  let metrics: RecordingMetrics;
  let descriptions: InMemoryServiceDescriptionStore;
  let dispatcher: ServiceDispatcher;

  beforeEach(() => {
    system = new ActorSystem("router-1");
    cluster = new StaticCluster("router-1");
    metrics = new RecordingMetrics();
    descriptions = new InMemoryServiceDescriptionStore();
    dispatcher = new ServiceDispatcher({
      routerId: "router-1",
      system,
      cluster,
      descriptions,
      config: resolveRouterConfig({ queueTimeoutMs: 50 }),
      metrics,
      clock: new ManualClock().now,
      onStolenInstanceReleased: () => undefined,
      onOfferLeaseExpired: () => undefined,
    });
  });

  afterEach(async () => {
    await dispatcher.shutdown();
    await system.shutdown({ timeout: 200 });
  });

  it("should give every caller the same responder of a service", () => {
    const first = dispatcher.responderFor("svc-a");
    const second = dispatcher.responderFor("svc-a");

    expect(second).toBe(first);
    expect(system.isRegistered("responder:svc-a#1")).toBe(true);
    expect(metrics.get("router.dispatcher.counters.responders-created")).toBe(1);
  });

  it("should route scheduler state to the responders", async () => {
    dispatcher.handleSchedulerState(
      schedulerState({
        "svc-a": { healthy: [makeInstance("i-1")] },
        "svc-b": { healthy: [makeInstance("i-2", "svc-b")] },
      }),
    );

    expect(dispatcher.serviceIds()).toEqual(["svc-a", "svc-b"]);
    expect(await dispatcher.selectInstance("svc-b")).toEqual({
      status: "selected",
      instance: makeInstance("i-2", "svc-b"),
      stolen: false,
    });
  });

  it("should only track the instances this router owns", async () => {
    const instances = Array.from({ length: 20 }, (_, i) => makeInstance(`i-${i}`));
    cluster.addMember("router-2");
    dispatcher.handleSchedulerState(schedulerState({ "svc-a": { healthy: instances } }));

    const owned = ownedInstances(instances, "router-1", ["router-1", "router-2"]).map((i) => i.id);
    expect((await dispatcher.queryState("svc-a")).availableInstanceIds.sort()).toEqual(owned.sort());

    cluster.removeMember("router-2");

    const all = instances.map((i) => i.id).sort();
    expect((await dispatcher.queryState("svc-a")).availableInstanceIds.sort()).toEqual(all);
  });

  it("should retire the responder of a removed service and create a fresh one on demand", async () => {
    dispatcher.handleSchedulerState(schedulerState({ "svc-a": { healthy: [makeInstance("i-1")] } }));
    await dispatcher.queryState("svc-a");

    dispatcher.handleSchedulerState(schedulerState({}));

    await vi.waitFor(() => {
      expect(dispatcher.serviceIds()).toEqual([]);
      expect(system.isRegistered("responder:svc-a#1")).toBe(false);
    });

    expect(await dispatcher.selectInstance("svc-a")).toEqual({ status: "no-instance-available" });
    expect(system.isRegistered("responder:svc-a#2")).toBe(true);
    expect((await dispatcher.queryState("svc-a")).status).toBe("active");
  });

  it("should queue acquisitions until the queue timeout", async () => {
    expect(await dispatcher.acquireInstance("svc-x", { priority: 1 })).toEqual({
      status: "no-instance-available",
    });
  });

  it("should report per-service loads", async () => {
    dispatcher.handleSchedulerState(
      schedulerState({ "svc-a": { healthy: [makeInstance("i-1"), makeInstance("i-2")] } }),
    );
    await dispatcher.selectInstance("svc-a");

    expect(await dispatcher.queryLoads()).toEqual([
      { serviceId: "svc-a", slotsAvailable: 1, slotsInUse: 1, slotsOffered: 0, outstanding: 0 },
    ]);
    const states = await dispatcher.queryAllStates();
    expect(Object.keys(states)).toEqual(["svc-a"]);
  });

  it("should ignore releases and revocations for services without a responder", async () => {
    expect(dispatcher.releaseInstance("svc-x", "i-1", "success")).toBe(false);
    expect(await dispatcher.revokeOffer("svc-x", "c-1")).toBe("unknown-offer");
    expect(await dispatcher.reserveOffer("svc-x", "router-2", "c-1")).toBeNull();
    expect(dispatcher.serviceIds()).toEqual([]);
  });

  it("should not create responders to blacklist or take offers", async () => {
    expect(await dispatcher.blacklistInstance("svc-x", "i-1", 1000, "killed")).toBe("no-such-instance");
    expect(
      await dispatcher.offerInstance({
        cid: "c-1",
        requestId: "req-1",
        routerId: "router-2",
        serviceId: "svc-x",
        instance: makeInstance("i-9", "svc-x"),
      }),
    ).toBe("declined");
    expect(dispatcher.serviceIds()).toEqual([]);
  });

  it("should retire idle responders of services the scheduler never listed", async () => {
    for (let n = 0; n < 5; n++) {
      await dispatcher.queryState(`svc-unknown-${n}`);
    }
    expect(dispatcher.serviceIds()).toHaveLength(5);

    dispatcher.handleSchedulerState(schedulerState({ "svc-a": { healthy: [makeInstance("i-1")] } }));

    await vi.waitFor(() => {
      expect(dispatcher.serviceIds()).toEqual(["svc-a"]);
      expect(system.isRegistered("responder:svc-unknown-0#1")).toBe(false);
    });
    expect(dispatcher.getHealth().details).toMatchObject({ responderCount: 1 });
  });

  it("should resolve the distribution scheme from descriptions", () => {
    descriptions.put("svc-a", { distributionScheme: "simple" });

    expect(dispatcher.distributionSchemeOf("svc-a")).toBe("simple");
    expect(dispatcher.distributionSchemeOf("svc-b")).toBe("balanced");
  });

  it("should report its health", () => {
    dispatcher.handleSchedulerState(schedulerState({ "svc-a": {} }, 42));

    expect(dispatcher.getHealth()).toEqual({
      name: "ServiceDispatcher",
      status: "healthy",
      details: { responderCount: 1, availableServiceCount: 1, lastSchedulerStateTime: 42 },
    });
  });
});
