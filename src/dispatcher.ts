// src/dispatcher.ts

import { v4 as uuidv4 } from "uuid";
import { ActorSystem } from "./actor_system";
import { Cluster } from "./cluster";
import { DistributionScheme, RouterConfig } from "./config";
import { ownedInstances } from "./distribution";
import { ActorStoppedError, toError } from "./errors";
import { ComponentHealth, HealthCheckable } from "./health";
import { Logger, createLogger } from "./logger";
import { MetricsSink, routerMetric } from "./metrics";
import {
  BlacklistStatus,
  InboundOffer,
  InstanceSelection,
  OfferLease,
  OfferOutcome,
  OfferResponse,
  RequestOutcome,
  Responder,
  ResponderCall,
  ResponderRef,
  ResponderReply,
  ResponderStateSnapshot,
  RevokeStatus,
  ServiceSchedulerUpdate,
  StolenInstanceRelease,
  expectReply,
} from "./responder";
import { ServiceLoad } from "./router_load_gossip";
import { SchedulerState } from "./scheduler";
import { ServiceDescriptionSource, resolveServiceDescription } from "./service_description";
import { ServiceInstance } from "./service_instance";

export interface ServiceDispatcherOptions {
  routerId: string;
  system: ActorSystem;
  cluster: Cluster;
  descriptions: ServiceDescriptionSource;
  config: RouterConfig;
  metrics: MetricsSink;
  clock: () => number;
  onStolenInstanceReleased: (release: StolenInstanceRelease) => void;
  onOfferLeaseExpired: (lease: OfferLease) => void;
}

export interface AcquireOptions {
  requestId?: string;
  /** Higher is served first (default 0). */
  priority?: number;
}

export type ServiceStateResult = ResponderStateSnapshot | { error: string };

/**
 * Maps service ids to their Responder. Responders are created on the first
 * request or query for a service and retired once the service has left
 * scheduler state and they hold nothing; the next request creates a fresh
 * one. Blacklisting and peer offers never create a Responder.
 *
 * Creation is synchronous, so two concurrent first requests for a service
 * observe the same Responder.
 */
export class ServiceDispatcher implements HealthCheckable {
  private readonly responders = new Map<string, ResponderRef>();
  private availableServiceIds = new Set<string>();
  private lastState?: SchedulerState;
  private generation = 0;
  private readonly log: Logger;
  private readonly onRouterLeft = (routerId: string) => this.handleRouterLeft(routerId);
  private readonly onRouterJoined = () => this.redistribute();

  constructor(private readonly options: ServiceDispatcherOptions) {
    this.log = createLogger("ServiceDispatcher", options.routerId);
    options.cluster.on("member_leave", this.onRouterLeft);
    options.cluster.on("member_join", this.onRouterJoined);
  }

  /**
   * The live Responder of a service, created if there is none.
   */
  responderFor(serviceId: string): ResponderRef {
    const existing = this.responders.get(serviceId);
    if (existing && existing.isAlive()) {
      return existing;
    }

    const { config, metrics, clock, descriptions, routerId } = this.options;
    const ref: ResponderRef = this.options.system.spawn(Responder, {
      name: `responder:${serviceId}#${++this.generation}`,
      mailboxCapacity: config.mailboxCapacity,
      args: [
        {
          serviceId,
          routerId,
          config,
          metrics,
          clock,
          description: () => resolveServiceDescription(descriptions, serviceId, config),
          retire: (retiring: ResponderRef) => this.retire(serviceId, retiring),
          onStolenInstanceReleased: this.options.onStolenInstanceReleased,
          onOfferLeaseExpired: this.options.onOfferLeaseExpired,
        },
      ],
    });
    this.responders.set(serviceId, ref);
    metrics.incCounter(routerMetric("dispatcher", "counters", "responders-created"));
    this.log.debug("Created responder", { serviceId });

    if (this.lastState && this.availableServiceIds.has(serviceId)) {
      ref.cast({ type: "scheduler-update", update: this.sliceFor(this.lastState, serviceId) });
    }
    return ref;
  }

  /**
   * Fans a scheduler snapshot out to the Responders. Services that left the
   * available set are told to drain; Responders of services never listed
   * retire when idle.
   */
  handleSchedulerState(state: SchedulerState): void {
    const next = new Set(state.availableServiceIds);
    this.lastState = state;
    const previous = this.availableServiceIds;
    this.availableServiceIds = next;

    for (const serviceId of next) {
      this.responderFor(serviceId).cast({
        type: "scheduler-update",
        update: this.sliceFor(state, serviceId),
      });
    }
    for (const serviceId of previous) {
      if (!next.has(serviceId)) {
        this.responders.get(serviceId)?.cast({ type: "service-removed" });
      }
    }
    for (const [serviceId, ref] of this.responders) {
      if (!next.has(serviceId) && !previous.has(serviceId)) {
        ref.cast({ type: "unscheduled" });
      }
    }
  }

  private sliceFor(state: SchedulerState, serviceId: string): ServiceSchedulerUpdate {
    const healthy = state.serviceIdToHealthyInstances[serviceId] ?? [];
    return {
      healthyInstances: ownedInstances(healthy, this.options.routerId, this.options.cluster.getMembers()),
      allHealthyInstanceIds: healthy.map((instance) => instance.id),
      unhealthyInstances: state.serviceIdToUnhealthyInstances[serviceId] ?? [],
      killedInstances: state.serviceIdToKilledInstances[serviceId] ?? [],
      time: state.time,
    };
  }

  private retire(serviceId: string, ref: ResponderRef): void {
    if (this.responders.get(serviceId) !== ref) {
      return;
    }
    this.responders.delete(serviceId);
    this.log.info("Retiring idle responder of removed service", { serviceId });
    this.options.system.stop(ref).catch((err: unknown) => {
      this.log.error("Failed to stop responder", err, { serviceId });
    });
  }

  /**
   * Calls a service's Responder, retrying once on a fresh Responder when
   * the call raced with retirement.
   */
  private async callResponder(serviceId: string, message: ResponderCall, timeout: number): Promise<ResponderReply> {
    try {
      return await this.responderFor(serviceId).call(message, timeout);
    } catch (err) {
      if (err instanceof ActorStoppedError) {
        return this.responderFor(serviceId).call(message, timeout);
      }
      throw err;
    }
  }

  /**
   * Calls the Responder of a service only if it already exists; undefined
   * when there is none or it stopped meanwhile.
   */
  private async callExisting(
    serviceId: string,
    message: ResponderCall,
    timeout: number,
  ): Promise<ResponderReply | undefined> {
    const ref = this.responders.get(serviceId);
    if (!ref || !ref.isAlive()) {
      return undefined;
    }
    try {
      return await ref.call(message, timeout);
    } catch (err) {
      if (err instanceof ActorStoppedError) {
        return undefined;
      }
      throw err;
    }
  }

  async selectInstance(serviceId: string, requestId: string = uuidv4()): Promise<InstanceSelection> {
    const reply = await this.callResponder(
      serviceId,
      { type: "select-instance", requestId },
      this.options.config.queryTimeoutMs,
    );
    return expectReply(reply, "instance").selection;
  }

  /**
   * Like selectInstance, but waits in the service's queue (up to
   * queueTimeoutMs) when no slot is free.
   */
  async acquireInstance(serviceId: string, options: AcquireOptions = {}): Promise<InstanceSelection> {
    const { config } = this.options;
    const reply = await this.callResponder(
      serviceId,
      { type: "acquire-instance", requestId: options.requestId ?? uuidv4(), priority: options.priority ?? 0 },
      config.queueTimeoutMs + config.queryTimeoutMs,
    );
    return expectReply(reply, "instance").selection;
  }

  releaseInstance(serviceId: string, instanceId: string, outcome: RequestOutcome): boolean {
    const ref = this.responders.get(serviceId);
    if (!ref) {
      this.log.debug("Release for service without responder", { serviceId, instanceId });
      return false;
    }
    return ref.cast({ type: "release-instance", instanceId, outcome });
  }

  async blacklistInstance(
    serviceId: string,
    instanceId: string,
    periodMs: number,
    reason: string,
  ): Promise<BlacklistStatus> {
    const reply = await this.callExisting(
      serviceId,
      { type: "blacklist-instance", instanceId, periodMs, reason },
      this.options.config.blacklistTimeoutMs,
    );
    return reply ? expectReply(reply, "blacklist").status : "no-such-instance";
  }

  async offerInstance(offer: InboundOffer): Promise<OfferResponse> {
    const reply = await this.callExisting(
      offer.serviceId,
      { type: "offer-instance", offer },
      this.options.config.reserveTimeoutMs,
    );
    return reply ? expectReply(reply, "offer").status : "declined";
  }

  async revokeOffer(serviceId: string, cid: string): Promise<RevokeStatus> {
    const reply = await this.callExisting(
      serviceId,
      { type: "revoke-offer", cid },
      this.options.config.reserveTimeoutMs,
    );
    return reply ? expectReply(reply, "revoke").status : "unknown-offer";
  }

  /**
   * Marks an idle instance of the service as offered to `targetRouterId`.
   * Null when the service has nothing to spare.
   */
  async reserveOffer(serviceId: string, targetRouterId: string, cid: string): Promise<ServiceInstance | null> {
    const reply = await this.callExisting(
      serviceId,
      { type: "reserve-offer", targetRouterId, cid },
      this.options.config.queryTimeoutMs,
    );
    return reply ? expectReply(reply, "reserved").instance : null;
  }

  completeOffer(serviceId: string, cid: string, outcome: OfferOutcome): void {
    this.responders.get(serviceId)?.cast({ type: "complete-offer", cid, outcome });
  }

  releaseOffer(serviceId: string, cid: string): void {
    const ref = this.responders.get(serviceId);
    if (!ref) {
      this.log.debug("Offer release for service without responder", { serviceId, cid });
      return;
    }
    ref.cast({ type: "release-offer", cid });
  }

  async queryState(serviceId: string): Promise<ResponderStateSnapshot> {
    const reply = await this.callResponder(serviceId, { type: "query-state" }, this.options.config.queryTimeoutMs);
    return expectReply(reply, "state").state;
  }

  /**
   * Queries every Responder in parallel. One that fails or times out is
   * reported as an error entry.
   */
  async queryAllStates(): Promise<Record<string, ServiceStateResult>> {
    const entries = await Promise.all(
      Array.from(this.responders.entries()).map(async ([serviceId, ref]) => {
        try {
          const reply = await ref.call({ type: "query-state" }, this.options.config.queryTimeoutMs);
          const result: ServiceStateResult = expectReply(reply, "state").state;
          return [serviceId, result] as const;
        } catch (err) {
          const result: ServiceStateResult = { error: toError(err).message };
          return [serviceId, result] as const;
        }
      }),
    );
    return Object.fromEntries(entries);
  }

  /**
   * Per-service load of this router, for gossip and work-stealing.
   */
  async queryLoads(): Promise<ServiceLoad[]> {
    const states = await this.queryAllStates();
    const loads: ServiceLoad[] = [];
    for (const [serviceId, state] of Object.entries(states)) {
      if ("error" in state) {
        continue;
      }
      loads.push({
        serviceId,
        slotsAvailable: state.slotsAvailable,
        slotsInUse: state.slotsInUse,
        slotsOffered: state.slotsOffered,
        outstanding: state.pendingRequests,
      });
    }
    return loads;
  }

  serviceIds(): string[] {
    return Array.from(this.responders.keys());
  }

  distributionSchemeOf(serviceId: string): DistributionScheme {
    return resolveServiceDescription(this.options.descriptions, serviceId, this.options.config).distributionScheme;
  }

  private handleRouterLeft(routerId: string): void {
    this.log.info("Router left, reverting its offers", { peerId: routerId });
    for (const ref of this.responders.values()) {
      ref.cast({ type: "router-left", routerId });
    }
    this.redistribute();
  }

  /**
   * Instance ownership follows membership; re-slices the last snapshot.
   */
  private redistribute(): void {
    if (this.lastState) {
      this.handleSchedulerState(this.lastState);
    }
  }

  getHealth(): ComponentHealth {
    return {
      name: "ServiceDispatcher",
      status: "healthy",
      details: {
        responderCount: this.responders.size,
        availableServiceCount: this.availableServiceIds.size,
        lastSchedulerStateTime: this.lastState?.time,
      },
    };
  }

  async shutdown(): Promise<void> {
    this.options.cluster.removeListener("member_leave", this.onRouterLeft);
    this.options.cluster.removeListener("member_join", this.onRouterJoined);
    const refs = Array.from(this.responders.values());
    this.responders.clear();
    await Promise.all(refs.map((ref) => this.options.system.stop(ref, { type: "shutdown" })));
  }
}
