// src/zeromq_transport.ts

import * as zmq from "zeromq";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { PeerNotFoundError, TimeoutError, TransportError, toError } from "./errors";
import { ComponentHealth, HealthCheckable } from "./health";
import { Logger, createLogger } from "./logger";
import {
  MessageHandler,
  RequestHandler,
  Subscription,
  Transport,
} from "./transport";

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const inboundFrameSchema = z.union([
  z.object({ kind: z.literal("request"), correlationId: z.string(), payload: z.unknown() }),
  z.object({ kind: z.literal("message"), payload: z.unknown() }),
]);

const replyFrameSchema = z.union([
  z.object({ kind: z.literal("reply"), correlationId: z.string(), payload: z.unknown() }),
  z.object({ kind: z.literal("error"), correlationId: z.string(), message: z.string() }),
]);

export interface ZeroMQTransportConfig {
  routerId: string;
  /** ROUTER socket port; the PUB socket binds to rpcPort + 1. */
  rpcPort: number;
  bindAddress?: string;
}

/**
 * Router-to-router transport over ZeroMQ. Requests travel DEALER → ROUTER
 * with a correlation id; load gossip uses PUB/SUB. Peer addresses are
 * `tcp://host:rpcPort`, the peer's publisher being on rpcPort + 1.
 */
export class ZeroMQTransport implements Transport, HealthCheckable {
  private readonly routerId: string;
  private readonly rpcAddress: string;
  private readonly pubAddress: string;
  private readonly log: Logger;

  private rpcSocket?: zmq.Router;
  private pubSocket?: zmq.Publisher;
  private subSocket?: zmq.Subscriber;

  private readonly dealers = new Map<string, zmq.Dealer>();
  private readonly pendingRequests = new Map<string, PendingRequest>();
  private readonly subscriptions = new Map<string, MessageHandler[]>();
  private readonly peerAddresses = new Map<string, { rpc: string; pub: string }>();

  private requestHandler?: RequestHandler;
  private messageHandler?: MessageHandler;

  constructor(config: ZeroMQTransportConfig) {
    const bindAddress = config.bindAddress ?? "0.0.0.0";
    this.routerId = config.routerId;
    this.rpcAddress = `tcp://${bindAddress}:${config.rpcPort}`;
    this.pubAddress = `tcp://${bindAddress}:${config.rpcPort + 1}`;
    this.log = createLogger("ZeroMQTransport", this.routerId);
  }

  getRouterId(): string {
    return this.routerId;
  }

  async connect(): Promise<void> {
    this.rpcSocket = new zmq.Router();
    await this.rpcSocket.bind(this.rpcAddress);
    this.pubSocket = new zmq.Publisher();
    await this.pubSocket.bind(this.pubAddress);
    this.subSocket = new zmq.Subscriber();
    for (const addresses of this.peerAddresses.values()) {
      this.subSocket.connect(addresses.pub);
    }

    void this.runRpcLoop(this.rpcSocket);
    void this.runSubLoop(this.subSocket);
    this.log.info("Transport bound", { rpc: this.rpcAddress, pub: this.pubAddress });
  }

  async disconnect(): Promise<void> {
    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timer);
      pending.reject(new TransportError("Transport disconnected", this.routerId));
    }
    this.pendingRequests.clear();

    this.rpcSocket?.close();
    this.pubSocket?.close();
    this.subSocket?.close();
    for (const dealer of this.dealers.values()) {
      dealer.close();
    }
    this.dealers.clear();
  }

  updatePeers(peers: Array<[routerId: string, address: string]>): void {
    const current = new Set(peers.map(([id]) => id));

    for (const [peerId, addresses] of Array.from(this.peerAddresses.entries())) {
      if (!current.has(peerId)) {
        this.subSocket?.disconnect(addresses.pub);
        this.dealers.get(peerId)?.close();
        this.dealers.delete(peerId);
        this.peerAddresses.delete(peerId);
      }
    }

    for (const [peerId, rpcAddress] of peers) {
      if (peerId === this.routerId || this.peerAddresses.has(peerId)) {
        continue;
      }
      const match = /^tcp:\/\/([^:]+):(\d+)$/.exec(rpcAddress);
      if (!match) {
        this.log.warn("Ignoring peer with malformed address", { peerId, rpcAddress });
        continue;
      }
      const pubAddress = `tcp://${match[1]}:${parseInt(match[2], 10) + 1}`;
      this.peerAddresses.set(peerId, { rpc: rpcAddress, pub: pubAddress });
      this.subSocket?.connect(pubAddress);
    }
  }

  async request(routerId: string, message: unknown, timeout: number): Promise<unknown> {
    const dealer = this.dealerFor(routerId);
    const correlationId = uuidv4();

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRequests.delete(correlationId);
        reject(new TimeoutError(`request to ${routerId}`, timeout));
      }, timeout);
      this.pendingRequests.set(correlationId, { resolve, reject, timer });

      dealer
        .send(JSON.stringify({ kind: "request", correlationId, payload: message }))
        .catch((err: unknown) => {
          clearTimeout(timer);
          this.pendingRequests.delete(correlationId);
          this.log.error("Failed to send request", err, { peerId: routerId });
          reject(new TransportError(`Failed to send request to ${routerId}`, routerId, toError(err)));
        });
    });
  }

  async send(routerId: string, message: unknown): Promise<void> {
    const dealer = this.dealerFor(routerId);
    try {
      await dealer.send(JSON.stringify({ kind: "message", payload: message }));
    } catch (err) {
      this.log.error("Failed to send message", err, { peerId: routerId });
      throw new TransportError(`Failed to send message to ${routerId}`, routerId, toError(err));
    }
  }

  async publish(topic: string, message: unknown): Promise<void> {
    if (!this.pubSocket) {
      throw new TransportError("Transport not connected", this.routerId);
    }
    await this.pubSocket.send([topic, JSON.stringify(message)]);
  }

  async subscribe(topic: string, handler: MessageHandler): Promise<Subscription> {
    const subSocket = this.subSocket;
    if (!subSocket) {
      throw new TransportError("Transport not connected", this.routerId);
    }
    subSocket.subscribe(topic);
    const handlers = this.subscriptions.get(topic) ?? [];
    handlers.push(handler);
    this.subscriptions.set(topic, handlers);

    return {
      unsubscribe: async () => {
        const remaining = (this.subscriptions.get(topic) ?? []).filter((h) => h !== handler);
        if (remaining.length === 0) {
          this.subscriptions.delete(topic);
          subSocket.unsubscribe(topic);
        } else {
          this.subscriptions.set(topic, remaining);
        }
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
      name: "ZeroMQTransport",
      status: this.rpcSocket && !this.rpcSocket.closed ? "healthy" : "unhealthy",
      details: {
        peerCount: this.peerAddresses.size,
        pendingRequests: this.pendingRequests.size,
      },
    };
  }

  private dealerFor(routerId: string): zmq.Dealer {
    const addresses = this.peerAddresses.get(routerId);
    if (!addresses) {
      throw new PeerNotFoundError(routerId);
    }
    let dealer = this.dealers.get(routerId);
    if (!dealer) {
      dealer = new zmq.Dealer();
      dealer.connect(addresses.rpc);
      this.dealers.set(routerId, dealer);
      void this.runDealerLoop(routerId, dealer);
    }
    return dealer;
  }

  private async runRpcLoop(socket: zmq.Router): Promise<void> {
    for await (const [identity, frame] of socket) {
      const parsed = inboundFrameSchema.safeParse(parseJson(frame.toString()));
      if (!parsed.success) {
        this.log.warn("Dropping malformed frame on rpc socket");
        continue;
      }
      const inbound = parsed.data;
      if (inbound.kind === "message") {
        this.messageHandler?.(inbound.payload);
        continue;
      }
      const handler = this.requestHandler;
      if (!handler) {
        continue;
      }
      void handler(inbound.payload)
        .then(
          (payload) => ({ kind: "reply", correlationId: inbound.correlationId, payload }),
          (err: unknown) => ({
            kind: "error",
            correlationId: inbound.correlationId,
            message: toError(err).message,
          }),
        )
        .then((reply) => socket.send([identity, JSON.stringify(reply)]))
        .catch((err: unknown) => this.log.error("Failed to send reply", err));
    }
  }

  private async runSubLoop(socket: zmq.Subscriber): Promise<void> {
    for await (const [topicFrame, frame] of socket) {
      const handlers = this.subscriptions.get(topicFrame.toString());
      if (!handlers) {
        continue;
      }
      const message = parseJson(frame.toString());
      for (const handler of handlers) {
        try {
          handler(message);
        } catch (err) {
          this.log.error("Subscription handler failed", err, { topic: topicFrame.toString() });
        }
      }
    }
  }

  private async runDealerLoop(routerId: string, dealer: zmq.Dealer): Promise<void> {
    for await (const [frame] of dealer) {
      const parsed = replyFrameSchema.safeParse(parseJson(frame.toString()));
      if (!parsed.success) {
        this.log.warn("Dropping malformed reply", { peerId: routerId });
        continue;
      }
      const reply = parsed.data;
      const pending = this.pendingRequests.get(reply.correlationId);
      if (!pending) {
        continue;
      }
      clearTimeout(pending.timer);
      this.pendingRequests.delete(reply.correlationId);
      if (reply.kind === "error") {
        pending.reject(new TransportError(reply.message, routerId));
      } else {
        pending.resolve(reply.payload);
      }
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
