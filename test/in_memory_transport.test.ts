// test/in_memory_transport.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InMemoryTransport, PeerNotFoundError, TimeoutError, TransportError } from "../src";

describe("InMemoryTransport", () => {
  let a: InMemoryTransport;
  let b: InMemoryTransport;

  beforeEach(async () => {
    a = new InMemoryTransport("router-1");
    b = new InMemoryTransport("router-2");
    await a.connect();
    await b.connect();
    InMemoryTransport.connectAll([a, b]);
  });

  afterEach(async () => {
    await a.disconnect();
    await b.disconnect();
  });

  it("should answer requests through the peer's handler", async () => {
    b.onRequest(async (message) => ({ echoed: message }));

    expect(await a.request("router-2", { n: 1 }, 1000)).toEqual({ echoed: { n: 1 } });
  });

  it("should not share payloads by reference", async () => {
    const payload = { items: [1] };
    let received: unknown;
    b.onMessage((message) => {
      received = message;
    });

    await a.send("router-2", payload);

    expect(received).toEqual(payload);
    expect(received).not.toBe(payload);
  });

  it("should time out slow handlers", async () => {
    b.onRequest(() => new Promise(() => undefined));

    await expect(a.request("router-2", {}, 20)).rejects.toBeInstanceOf(TimeoutError);
  });

  it("should fail without a request handler or a peer", async () => {
    await expect(a.request("router-2", {}, 20)).rejects.toBeInstanceOf(TransportError);
    await expect(a.request("router-9", {}, 20)).rejects.toBeInstanceOf(PeerNotFoundError);
  });

  it("should publish to its own and its peers' subscribers", async () => {
    const own = vi.fn();
    const peer = vi.fn();
    await a.subscribe("topic", own);
    const subscription = await b.subscribe("topic", peer);

    await a.publish("topic", { v: 1 });
    await subscription.unsubscribe();
    await a.publish("topic", { v: 2 });

    expect(own).toHaveBeenCalledTimes(2);
    expect(peer).toHaveBeenCalledTimes(1);
    expect(peer).toHaveBeenCalledWith({ v: 1 });
  });

  it("should stop reaching a disconnected peer", async () => {
    await b.disconnect();

    await expect(a.send("router-2", {})).rejects.toBeInstanceOf(PeerNotFoundError);
    expect(a.getHealth().status).toBe("healthy");
    expect(b.getHealth().status).toBe("unhealthy");
  });
});
