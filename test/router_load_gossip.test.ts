// test/router_load_gossip.test.ts

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { InMemoryTransport, RouterLoadGossip, ROUTER_LOADS_TOPIC, StaticCluster } from "../src";
import { ManualClock } from "./fixtures";

function load(serviceId: string, outstanding: number) {
  return { serviceId, slotsAvailable: 0, slotsInUse: 1, slotsOffered: 0, outstanding };
}

describe("RouterLoadGossip", () => {
  let clock: ManualClock;
  let transports: InMemoryTransport[];
  let cluster: StaticCluster;
  let local: RouterLoadGossip;
  let peerA: RouterLoadGossip;
  let peerB: RouterLoadGossip;

  beforeEach(async () => {
    clock = new ManualClock();
    transports = ["router-1", "router-2", "router-3"].map((id) => new InMemoryTransport(id));
    for (const transport of transports) {
      await transport.connect();
    }
    InMemoryTransport.connectAll(transports);

    cluster = new StaticCluster("router-1", ["router-2", "router-3"]);
    const config = { ttlMs: 1000, clock: clock.now };
    local = new RouterLoadGossip("router-1", transports[0], cluster, config);
    peerA = new RouterLoadGossip("router-2", transports[1], new StaticCluster("router-2"), config);
    peerB = new RouterLoadGossip("router-3", transports[2], new StaticCluster("router-3"), config);
    await local.connect();
  });

  afterEach(async () => {
    await local.disconnect();
    for (const transport of transports) {
      await transport.disconnect();
    }
  });

  it("should rank peers by outstanding requests", async () => {
    await peerA.publish([load("svc-a", 1)]);
    await peerB.publish([load("svc-a", 4), load("svc-b", 0)]);

    expect(local.peersNeedingHelp("svc-a")).toEqual(["router-3", "router-2"]);
    expect(local.peersNeedingHelp("svc-b")).toEqual([]);
  });

  it("should ignore its own reports", async () => {
    await local.publish([load("svc-a", 3)]);

    expect(local.peersNeedingHelp("svc-a")).toEqual([]);
    expect(local.getPeerReports()).toEqual([]);
  });

  it("should ignore stale reports", async () => {
    await peerA.publish([load("svc-a", 1)]);
    clock.advance(1001);

    expect(local.peersNeedingHelp("svc-a")).toEqual([]);
  });

  it("should keep the newest report of a peer", async () => {
    await peerA.publish([load("svc-a", 2)]);
    await transports[1].publish(ROUTER_LOADS_TOPIC, {
      routerId: "router-2",
      timestamp: clock.current - 10,
      services: [load("svc-a", 0)],
    });

    expect(local.peersNeedingHelp("svc-a")).toEqual(["router-2"]);
  });

  it("should drop malformed reports", async () => {
    await transports[1].publish(ROUTER_LOADS_TOPIC, { routerId: "router-2", services: "lots" });

    expect(local.getPeerReports()).toEqual([]);
  });

  it("should forget routers that left", async () => {
    await peerA.publish([load("svc-a", 1)]);

    cluster.removeMember("router-2");

    expect(local.getPeerReports()).toEqual([]);
    expect(local.peersNeedingHelp("svc-a")).toEqual([]);
  });
});
