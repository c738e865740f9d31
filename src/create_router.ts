// src/create_router.ts

import { v4 as uuidv4 } from "uuid";
import { ActorRef } from "./actor";
import { ActorSystem } from "./actor_system";
import { Cluster } from "./cluster";
import { RouterConfig, resolveRouterConfig } from "./config";
import { AcquireOptions, ServiceDispatcher, ServiceStateResult } from "./dispatcher";
import {
  BadRequestError,
  MaxQueueLengthExceededError,
  NoInstanceAvailableError,
  UnexpectedReplyError,
  toError,
} from "./errors";
import { HealthAggregator, HealthReport, isHealthCheckable } from "./health";
import { InMemoryTransport } from "./in_memory_transport";
import {
  InterstitialDecision,
  InterstitialMaintainer,
  InterstitialMaintainerCall,
  InterstitialMaintainerCast,
  InterstitialMaintainerReply,
  InterstitialPromise,
  InterstitialRequest,
  InterstitialState,
  evaluateInterstitial,
} from "./interstitial";
import { Logger, createLogger } from "./logger";
import { MetricsSink, PromMetricsSink } from "./metrics";
import {
  BlacklistStatus,
  InboundOffer,
  InstanceSelection,
  OfferResponse,
  RequestOutcome,
  ResponderStateSnapshot,
} from "./responder";
import { RouterLoadGossip } from "./router_load_gossip";
import { RouterRpc } from "./router_rpc";
import { Scheduler, SchedulerStateBroadcaster, SchedulerSyncer } from "./scheduler";
import {
  InMemoryServiceDescriptionStore,
  ServiceDescription,
  ServiceDescriptionSource,
  resolveServiceDescription,
} from "./service_description";
import { ServiceInstance } from "./service_instance";
import { StaticCluster } from "./static_cluster";
import { Transport } from "./transport";
import {
  WorkStealingBalancer,
  WorkStealingCall,
  WorkStealingCast,
  WorkStealingState,
} from "./work_stealing";
import { ZeroMQTransport } from "./zeromq_transport";

type MaintainerRef = ActorRef<InterstitialMaintainerCast, InterstitialMaintainerCall, InterstitialMaintainerReply>;
type BalancerRef = ActorRef<WorkStealingCast, WorkStealingCall, WorkStealingState>;

export interface RouterOptions {
  /** Defaults to `router-<random>`. */
  routerId?: string;
  config?: Partial<RouterConfig>;
  /** Polled every schedulerSyncerIntervalSecs when given. */
  scheduler?: Scheduler;
  descriptions?: ServiceDescriptionSource;
  transport?: Transport;
  cluster?: Cluster;
  metrics?: MetricsSink;
  clock?: () => number;
}

export interface DistributedRouterOptions extends Omit<RouterOptions, "transport" | "cluster"> {
  rpcPort: number;
  bindAddress?: string;
  /** Peer router ids and their `tcp://host:rpcPort` addresses. */
  peers?: Array<[routerId: string, address: string]>;
}

export interface AcquiredInstance {
  instance: ServiceInstance;
  /** Lent by a peer router; usable for this one request. */
  stolen: boolean;
}

export interface InterstitialQueryResult {
  interstitial: Extract<InterstitialMaintainerReply, { type: "all" }>["interstitial"];
  maintainer: Extract<InterstitialMaintainerReply, { type: "all" }>["maintainer"];
}

export interface ServiceStateReport {
  responderState: ServiceStateResult;
  interstitialState: Extract<InterstitialMaintainerReply, { type: "service" }> | { error: string };
  workStealingState: Pick<WorkStealingState, "inFlightOffers"> | { error: string };
}

/**
 * One router of the cluster: the routing core plus the collaborators it is
 * wired to. Exposes escape hatches for advanced use.
 */
export interface Router {
  readonly routerId: string;
  readonly config: RouterConfig;
  readonly system: ActorSystem;
  readonly dispatcher: ServiceDispatcher;
  readonly transport: Transport;
  readonly cluster: Cluster;
  readonly metrics: MetricsSink;
  readonly interstitialState: InterstitialState;

  blacklistInstance(serviceId: string, instanceId: string, periodMs: number, reason: string): Promise<BlacklistStatus>;
  offerInstance(serviceId: string, offer: InboundOffer): Promise<OfferResponse>;
  queryState(serviceId: string): Promise<ResponderStateSnapshot>;
  queryAllStates(): Promise<Record<string, ServiceStateResult>>;
  queryAllInterstitialState(): Promise<InterstitialQueryResult>;
  queryServiceState(serviceId: string): Promise<ServiceStateReport>;
  queryWorkStealingState(): Promise<WorkStealingState>;
  /** Never queues; answers no-instance-available when nothing is free. */
  selectInstanceForRequest(serviceId: string): Promise<InstanceSelection>;
  /**
   * Waits in the service's queue when nothing is free.
   * @throws MaxQueueLengthExceededError when the queue is full
   * @throws NoInstanceAvailableError when the wait times out or the service goes away
   */
  acquireInstance(serviceId: string, options?: AcquireOptions): Promise<AcquiredInstance>;
  releaseInstance(serviceId: string, instanceId: string, outcome: RequestOutcome): boolean;
  ensureInterstitialGate(serviceId: string, interstitialSecs: number): InterstitialPromise;
  evaluateInterstitial(request: InterstitialRequest): InterstitialDecision;
  describeService(serviceId: string): ServiceDescription;
  /** Feeds a scheduler snapshot in; false when it was malformed. */
  publishSchedulerState(state: unknown): boolean;
  getHealth(): Promise<HealthReport>;
  shutdown(): Promise<void>;
}

interface RouterParts {
  routerId: string;
  config: RouterConfig;
  system: ActorSystem;
  dispatcher: ServiceDispatcher;
  transport: Transport;
  cluster: Cluster;
  metrics: MetricsSink;
  interstitialState: InterstitialState;
  descriptions: ServiceDescriptionSource;
  broadcaster: SchedulerStateBroadcaster;
  gossip: RouterLoadGossip;
  maintainer: MaintainerRef;
  balancer: BalancerRef;
  health: HealthAggregator;
  scheduler?: Scheduler;
  syncer?: SchedulerSyncer;
  unsubscribe: Array<() => void>;
}

class RouterImpl implements Router {
  readonly routerId: string;
  readonly config: RouterConfig;
  readonly system: ActorSystem;
  readonly dispatcher: ServiceDispatcher;
  readonly transport: Transport;
  readonly cluster: Cluster;
  readonly metrics: MetricsSink;
  readonly interstitialState: InterstitialState;
  private readonly log: Logger;
  private stopped = false;

  constructor(private readonly parts: RouterParts) {
    this.routerId = parts.routerId;
    this.config = parts.config;
    this.system = parts.system;
    this.dispatcher = parts.dispatcher;
    this.transport = parts.transport;
    this.cluster = parts.cluster;
    this.metrics = parts.metrics;
    this.interstitialState = parts.interstitialState;
    this.log = createLogger("Router", parts.routerId);
  }

  async blacklistInstance(
    serviceId: string,
    instanceId: string,
    periodMs: number,
    reason: string,
  ): Promise<BlacklistStatus> {
    const status = await this.dispatcher.blacklistInstance(serviceId, instanceId, periodMs, reason);
    if (status === "blacklisted" && reason === "killed") {
      await this.notifyInstanceKilled(serviceId, instanceId);
    }
    return status;
  }

  private async notifyInstanceKilled(serviceId: string, instanceId: string): Promise<void> {
    const { scheduler, broadcaster } = this.parts;
    if (!scheduler?.processInstanceKilled) {
      return;
    }
    const state = broadcaster.latest();
    const instance = [
      ...(state?.serviceIdToHealthyInstances[serviceId] ?? []),
      ...(state?.serviceIdToUnhealthyInstances[serviceId] ?? []),
    ].find((candidate) => candidate.id === instanceId);
    if (!instance) {
      this.log.warn("Killed instance not in scheduler state", { serviceId, instanceId });
      return;
    }
    try {
      await scheduler.processInstanceKilled(instance);
    } catch (err) {
      this.log.error("Scheduler failed to process killed instance", err, { serviceId, instanceId });
    }
  }

  async offerInstance(serviceId: string, offer: InboundOffer): Promise<OfferResponse> {
    if (offer.serviceId !== serviceId) {
      throw new BadRequestError("Offer is for another service", [
        `serviceId: expected ${serviceId}, got ${offer.serviceId}`,
      ]);
    }
    return this.dispatcher.offerInstance(offer);
  }

  queryState(serviceId: string): Promise<ResponderStateSnapshot> {
    return this.dispatcher.queryState(serviceId);
  }

  queryAllStates(): Promise<Record<string, ServiceStateResult>> {
    return this.dispatcher.queryAllStates();
  }

  async queryAllInterstitialState(): Promise<InterstitialQueryResult> {
    const reply = await this.parts.maintainer.call({ type: "query-all" }, this.config.queryTimeoutMs);
    if (reply.type !== "all") {
      throw new UnexpectedReplyError("all", reply.type);
    }
    return { interstitial: reply.interstitial, maintainer: reply.maintainer };
  }

  /**
   * Everything this router knows about one service. Parts that fail are
   * reported as errors rather than failing the whole query.
   */
  async queryServiceState(serviceId: string): Promise<ServiceStateReport> {
    const { queryTimeoutMs } = this.config;
    const asError = (err: unknown) => ({ error: toError(err).message });
    const [responderState, interstitialState, workStealingState] = await Promise.all([
      this.dispatcher.queryState(serviceId).catch(asError),
      this.parts.maintainer
        .call({ type: "query-service", serviceId }, queryTimeoutMs)
        .then((reply) => {
          if (reply.type !== "service") {
            throw new UnexpectedReplyError("service", reply.type);
          }
          return reply;
        })
        .catch(asError),
      this.queryWorkStealingState()
        .then((state) => ({
          inFlightOffers: state.inFlightOffers.filter((offer) => offer.serviceId === serviceId),
        }))
        .catch(asError),
    ]);
    return { responderState, interstitialState, workStealingState };
  }

  queryWorkStealingState(): Promise<WorkStealingState> {
    return this.parts.balancer.call({ type: "query-state" }, this.config.queryTimeoutMs);
  }

  selectInstanceForRequest(serviceId: string): Promise<InstanceSelection> {
    return this.dispatcher.selectInstance(serviceId);
  }

  async acquireInstance(serviceId: string, options: AcquireOptions = {}): Promise<AcquiredInstance> {
    const selection = await this.dispatcher.acquireInstance(serviceId, options);
    switch (selection.status) {
      case "selected":
        return { instance: selection.instance, stolen: selection.stolen };
      case "max-queue-length-exceeded":
        throw new MaxQueueLengthExceededError(serviceId, selection.maxQueueLength);
      case "no-instance-available":
        throw new NoInstanceAvailableError(serviceId);
    }
  }

  releaseInstance(serviceId: string, instanceId: string, outcome: RequestOutcome): boolean {
    return this.dispatcher.releaseInstance(serviceId, instanceId, outcome);
  }

  ensureInterstitialGate(serviceId: string, interstitialSecs: number): InterstitialPromise {
    return this.interstitialState.ensure(serviceId, interstitialSecs);
  }

  evaluateInterstitial(request: InterstitialRequest): InterstitialDecision {
    const { interstitialSecs } = this.describeService(request.serviceId);
    return evaluateInterstitial(request, this.interstitialState, interstitialSecs, this.metrics);
  }

  describeService(serviceId: string): ServiceDescription {
    return resolveServiceDescription(this.parts.descriptions, serviceId, this.config);
  }

  publishSchedulerState(state: unknown): boolean {
    return this.parts.broadcaster.publish(state);
  }

  getHealth(): Promise<HealthReport> {
    return this.parts.health.getHealth();
  }

  async shutdown(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.log.info("Shutting down router");

    // 1. Stop feeding new state in
    this.parts.syncer?.stop();
    for (const unsubscribe of this.parts.unsubscribe) {
      unsubscribe();
    }

    // 2. Stop gossip, then the responders (they return stolen instances)
    await this.parts.gossip.disconnect();
    await this.dispatcher.shutdown();

    // 3. Stop the remaining actors
    await this.system.shutdown();
    this.interstitialState.dispose();

    // 4. Disconnect transport
    await this.transport.disconnect();
  }
}

/**
 * Creates a router. Without a transport and cluster it runs alone,
 * in process.
 *
 * @example
 * ```typescript
 * const router = await createRouter({ routerId: "router-1", scheduler });
 * const { instance } = await router.acquireInstance("svc-a");
 * // ... proxy the request to instance.host:instance.port ...
 * router.releaseInstance("svc-a", instance.id, "success");
 * ```
 */
export async function createRouter(options: RouterOptions = {}): Promise<Router> {
  const routerId = options.routerId ?? `router-${uuidv4().slice(0, 8)}`;
  const config = resolveRouterConfig(options.config);
  const clock = options.clock ?? Date.now;
  const metrics = options.metrics ?? new PromMetricsSink();
  const descriptions = options.descriptions ?? new InMemoryServiceDescriptionStore();
  const cluster = options.cluster ?? new StaticCluster(routerId);
  const transport = options.transport ?? new InMemoryTransport(routerId);
  const log = createLogger("Router", routerId);

  await transport.connect();

  const system = new ActorSystem(routerId, { mailboxCapacity: config.mailboxCapacity });

  const dispatcher = new ServiceDispatcher({
    routerId,
    system,
    cluster,
    descriptions,
    config,
    metrics,
    clock,
    onStolenInstanceReleased: (release) => {
      rpc.sendRelease(release).catch((err: unknown) => {
        log.warn("Failed to hand instance back to its router", {
          cid: release.cid,
          peerId: release.routerId,
          error: toError(err).message,
        });
      });
    },
    onOfferLeaseExpired: (lease) => {
      rpc.checkLease(lease, config.reserveTimeoutMs).then(
        (outcome) => dispatcher.completeOffer(lease.serviceId, lease.cid, outcome),
        (err: unknown) => log.error("Lease check failed", err, { cid: lease.cid }),
      );
    },
  });

  const rpc = new RouterRpc(routerId, transport, dispatcher);
  rpc.start();

  const gossip = new RouterLoadGossip(routerId, transport, cluster, { ttlMs: config.peerLoadTtlMs, clock });
  await gossip.connect();

  const interstitialState = new InterstitialState({ metrics, routerId, clock });
  const maintainer: MaintainerRef = system.spawn(InterstitialMaintainer, {
    name: "interstitial-maintainer",
    args: [
      {
        routerId,
        state: interstitialState,
        interstitialSecsOf: (serviceId: string) =>
          resolveServiceDescription(descriptions, serviceId, config).interstitialSecs,
        metrics,
      },
    ],
  });

  const balancer: BalancerRef = system.spawn(WorkStealingBalancer, {
    name: "work-stealing-balancer",
    args: [{ routerId, config, dispatcher, gossip, rpc, metrics, clock }],
  });

  const broadcaster = new SchedulerStateBroadcaster(routerId);
  const unsubscribe = [
    broadcaster.subscribe((state) => dispatcher.handleSchedulerState(state)),
    broadcaster.subscribe((state) => {
      if (!maintainer.cast({ type: "scheduler-state", state })) {
        log.warn("Interstitial maintainer dropped scheduler state", { time: state.time });
      }
    }),
  ];

  const syncer = options.scheduler
    ? new SchedulerSyncer(
        options.scheduler,
        broadcaster,
        { intervalSecs: config.schedulerSyncerIntervalSecs },
        routerId,
        clock,
      )
    : undefined;

  const health = new HealthAggregator(routerId, clock);
  health.register("actorSystem", system);
  health.register("dispatcher", dispatcher);
  if (isHealthCheckable(transport)) {
    health.register("transport", transport);
  }
  if (isHealthCheckable(cluster)) {
    health.register("cluster", cluster);
  }
  if (syncer) {
    health.register("schedulerSyncer", syncer);
  }

  syncer?.start();
  log.info("Router started", { members: cluster.getMembers().join(",") });

  return new RouterImpl({
    routerId,
    config,
    system,
    dispatcher,
    transport,
    cluster,
    metrics,
    interstitialState,
    descriptions,
    broadcaster,
    gossip,
    maintainer,
    balancer,
    health,
    scheduler: options.scheduler,
    syncer,
    unsubscribe,
  });
}

/**
 * Creates a router talking to its peers over ZeroMQ. The peer list is
 * static; membership changes go through the returned router's cluster.
 *
 * @example
 * ```typescript
 * const router = await createDistributedRouter({
 *   routerId: "router-1",
 *   rpcPort: 7000,
 *   peers: [["router-2", "tcp://10.0.0.2:7000"]],
 *   scheduler,
 * });
 * ```
 */
export async function createDistributedRouter(options: DistributedRouterOptions): Promise<Router> {
  const routerId = options.routerId ?? `router-${uuidv4().slice(0, 8)}`;
  const peers = options.peers ?? [];

  const transport = new ZeroMQTransport({
    routerId,
    rpcPort: options.rpcPort,
    bindAddress: options.bindAddress,
  });
  transport.updatePeers(peers);

  const cluster = new StaticCluster(
    routerId,
    peers.map(([peerId]) => peerId),
  );

  return createRouter({ ...options, routerId, transport, cluster });
}
