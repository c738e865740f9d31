// src/transport.ts

export interface Subscription {
  unsubscribe(): Promise<void>;
}

/**
 * Handler for fire-and-forget messages and topic deliveries. Payloads arrive
 * untyped off the wire; receivers validate them before use.
 */
export type MessageHandler = (message: unknown) => void;

/**
 * Handler for requests that expect a reply.
 */
export type RequestHandler = (message: unknown) => Promise<unknown>;

/**
 * Inter-router transport, addressed by router id. Implementations map router
 * ids to physical endpoints.
 */
export interface Transport {
  getRouterId(): string;

  /**
   * Sends a request to a peer router and waits for its reply.
   * @throws TimeoutError when the peer does not answer within `timeout` ms
   * @throws PeerNotFoundError when the router id has no known address
   */
  request(routerId: string, message: unknown, timeout: number): Promise<unknown>;

  send(routerId: string, message: unknown): Promise<void>;

  /**
   * Publishes to a topic every router subscribes to (load gossip).
   */
  publish(topic: string, message: unknown): Promise<void>;

  subscribe(topic: string, handler: MessageHandler): Promise<Subscription>;

  onRequest(handler: RequestHandler): void;

  onMessage(handler: MessageHandler): void;

  /**
   * Replaces the known peers with `[routerId, address]` pairs.
   */
  updatePeers(peers: Array<[routerId: string, address: string]>): void;

  connect(): Promise<void>;

  disconnect(): Promise<void>;
}
