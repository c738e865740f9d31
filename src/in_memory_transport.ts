// src/in_memory_transport.ts

import { EventEmitter } from "events";
import { PeerNotFoundError, TimeoutError, TransportError } from "./errors";
import { ComponentHealth, HealthCheckable } from "./health";
import {
  MessageHandler,
  RequestHandler,
  Subscription,
  Transport,
} from "./transport";

/**
 * Transport for routers living in one process (tests, single-node runs).
 * Peers are wired explicitly with setPeer(); payloads are passed through a
 * JSON round trip so nothing is shared by reference between routers.
 */
export class InMemoryTransport implements Transport, HealthCheckable {
  private readonly bus = new EventEmitter();
  private readonly peers = new Map<string, InMemoryTransport>();
  private requestHandler?: RequestHandler;
  private messageHandler?: MessageHandler;
  private connected = false;

  constructor(private readonly routerId: string) {}

  getRouterId(): string {
    return this.routerId;
  }

  async connect(): Promise<void> {
    this.bus.setMaxListeners(100);
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.bus.removeAllListeners();
    this.peers.clear();
  }

  updatePeers(_peers: Array<[routerId: string, address: string]>): void {
    // addresses mean nothing in-process; peers are wired with setPeer()
  }

  setPeer(routerId: string, transport: InMemoryTransport): void {
    this.peers.set(routerId, transport);
  }

  removePeer(routerId: string): void {
    this.peers.delete(routerId);
  }

  /**
   * Wires every transport to every other one.
   */
  static connectAll(transports: InMemoryTransport[]): void {
    for (const a of transports) {
      for (const b of transports) {
        if (a !== b) {
          a.setPeer(b.getRouterId(), b);
        }
      }
    }
  }

  async request(routerId: string, message: unknown, timeout: number): Promise<unknown> {
    const target = this.resolve(routerId);
    const handler = target.requestHandler;
    if (!handler) {
      throw new TransportError(`No request handler on router ${routerId}`, routerId);
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutError(`request to ${routerId}`, timeout)),
        timeout,
      );
    });
    try {
      const reply = await Promise.race([handler(copy(message)), expired]);
      return copy(reply);
    } finally {
      clearTimeout(timer);
    }
  }

  async send(routerId: string, message: unknown): Promise<void> {
    const target = this.resolve(routerId);
    target.messageHandler?.(copy(message));
  }

  async publish(topic: string, message: unknown): Promise<void> {
    this.bus.emit(topic, copy(message));
    for (const peer of this.peers.values()) {
      if (peer.connected) {
        peer.bus.emit(topic, copy(message));
      }
    }
  }

  async subscribe(topic: string, handler: MessageHandler): Promise<Subscription> {
    this.bus.on(topic, handler);
    return {
      unsubscribe: async () => {
        this.bus.off(topic, handler);
      },
    };
  }

  onRequest(handler: RequestHandler): void {
    this.requestHandler = handler;
  }

  onMessage(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  getHealth(): ComponentHealth {
    return {
      name: "InMemoryTransport",
      status: this.connected ? "healthy" : "unhealthy",
      details: { peerCount: this.peers.size },
    };
  }

  private resolve(routerId: string): InMemoryTransport {
    if (routerId === this.routerId) {
      return this;
    }
    const peer = this.peers.get(routerId);
    if (!peer || !peer.connected) {
      throw new PeerNotFoundError(routerId);
    }
    return peer;
  }
}

function copy(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}
