// src/responder.ts

import { Actor, ActorRef, CallResult, DeferredReply, TerminationReason, TimerRef, noReply } from "./actor";
import { BlacklistTracker } from "./blacklist";
import { RouterConfig } from "./config";
import { UnexpectedReplyError } from "./errors";
import { Logger, createLogger } from "./logger";
import { MetricsSink, serviceMetric } from "./metrics";
import { PendingComparator, PendingRequestQueue, Prioritized } from "./pending_queue";
import { ServiceDescription, allowsWorkStealing } from "./service_description";
import { ServiceInstance } from "./service_instance";

export type RequestOutcome = "success" | "instance-busy" | "instance-error";
export type BlacklistStatus = "blacklisted" | "in-use" | "no-such-instance";
export type OfferResponse = "accepted" | "declined";
export type RevokeStatus = "revoked" | "in-use" | "unknown-offer";

/**
 * How an outbound offer ended, as seen by the offering router.
 */
export type OfferOutcome = OfferResponse | RevokeStatus | "unreachable";

export type InstanceSelection =
  | { status: "selected"; instance: ServiceInstance; stolen: boolean }
  | { status: "no-instance-available" }
  | { status: "max-queue-length-exceeded"; maxQueueLength: number };

/**
 * One service's slice of a scheduler snapshot, as delivered by the
 * dispatcher. `healthyInstances` only holds the instances this router owns.
 */
export interface ServiceSchedulerUpdate {
  healthyInstances: ServiceInstance[];
  allHealthyInstanceIds: string[];
  unhealthyInstances: ServiceInstance[];
  killedInstances: ServiceInstance[];
  time: number;
}

/**
 * A peer router's offer of one of its idle instances.
 */
export interface InboundOffer {
  cid: string;
  requestId: string;
  routerId: string;
  serviceId: string;
  instance: ServiceInstance;
}

/**
 * Sent back to the offering router once an accepted instance is no longer
 * held here.
 */
export interface StolenInstanceRelease {
  cid: string;
  routerId: string;
  serviceId: string;
  instanceId: string;
  reason: "used" | "unused" | "instance-gone";
}

export type ResponderCast =
  | { type: "scheduler-update"; update: ServiceSchedulerUpdate }
  | { type: "service-removed" }
  | { type: "release-instance"; instanceId: string; outcome: RequestOutcome }
  | { type: "complete-offer"; cid: string; outcome: OfferOutcome }
  | { type: "release-offer"; cid: string }
  | { type: "router-left"; routerId: string }
  | { type: "blacklist-expiry" }
  | { type: "queue-timeout"; seq: number }
  | { type: "offer-lease-expiry"; cid: string }
  | { type: "unscheduled" };

/**
 * An accepted offer whose lease ran out; the offering router asks the peer
 * whether it still holds the instance.
 */
export interface OfferLease {
  cid: string;
  peerId: string;
  serviceId: string;
  instanceId: string;
  heldMs: number;
}

export type ResponderCall =
  | { type: "select-instance"; requestId: string }
  | { type: "acquire-instance"; requestId: string; priority: number }
  | { type: "blacklist-instance"; instanceId: string; periodMs: number; reason: string }
  | { type: "offer-instance"; offer: InboundOffer }
  | { type: "reserve-offer"; targetRouterId: string; cid: string }
  | { type: "revoke-offer"; cid: string }
  | { type: "query-state" };

export interface ResponderStateSnapshot {
  serviceId: string;
  routerId: string;
  status: "active" | "draining";
  availableInstanceIds: string[];
  inUseInstanceIds: Record<string, number>;
  offeredInstanceIds: string[];
  stolenInstanceIds: string[];
  unhealthyInstanceIds: string[];
  blacklistedInstances: Record<string, { expiryTime: number; consecutiveFailures: number; reason: string }>;
  slotsAvailable: number;
  slotsInUse: number;
  slotsOffered: number;
  pendingRequests: number;
  lastSchedulerUpdateTime: number | null;
}

export type ResponderReply =
  | { type: "instance"; selection: InstanceSelection }
  | { type: "blacklist"; status: BlacklistStatus }
  | { type: "offer"; status: OfferResponse }
  | { type: "reserved"; instance: ServiceInstance | null }
  | { type: "revoke"; status: RevokeStatus }
  | { type: "state"; state: ResponderStateSnapshot };

export type ResponderRef = ActorRef<ResponderCast, ResponderCall, ResponderReply>;

function isReply<K extends ResponderReply["type"]>(
  reply: ResponderReply,
  type: K,
): reply is Extract<ResponderReply, { type: K }> {
  return reply.type === type;
}

/**
 * Narrows a responder reply to the kind the call expects.
 * @throws UnexpectedReplyError on any other kind
 */
export function expectReply<K extends ResponderReply["type"]>(
  reply: ResponderReply,
  type: K,
): Extract<ResponderReply, { type: K }> {
  if (isReply(reply, type)) {
    return reply;
  }
  throw new UnexpectedReplyError(type, reply.type);
}

export interface ResponderOptions {
  serviceId: string;
  routerId: string;
  config: RouterConfig;
  /** Re-read on every use so description changes take effect. */
  description: () => ServiceDescription;
  metrics: MetricsSink;
  clock: () => number;
  /** Called once a draining responder holds nothing. */
  retire: (ref: ResponderRef) => void;
  onStolenInstanceReleased: (release: StolenInstanceRelease) => void;
  /** Answered with a complete-offer cast carrying the peer's revoke status. */
  onOfferLeaseExpired: (lease: OfferLease) => void;
  comparator?: PendingComparator<PendingAcquire>;
}

interface StolenMarker {
  cid: string;
  fromRouterId: string;
  used: boolean;
}

interface TrackedInstance {
  instance: ServiceInstance;
  inUse: number;
  /** Use sequence of the last assignment; 0 when never used. */
  lastUsed: number;
  /** No longer healthy or owned; dropped once idle. */
  retired: boolean;
  stolen?: StolenMarker;
}

interface OutboundOffer {
  cid: string;
  instanceId: string;
  routerId: string;
  accepted: boolean;
  offeredAt: number;
  lease?: TimerRef;
}

export interface PendingAcquire extends Prioritized {
  requestId: string;
  enqueuedAt: number;
  reply: DeferredReply<ResponderReply>;
  timer: TimerRef;
}

/**
 * The per-service actor. It alone owns the service's slot state: which
 * instances are available, in use, offered to peers, stolen from peers or
 * blacklisted, plus the queue of requests waiting for a slot.
 */
export class Responder extends Actor<ResponderCast, ResponderCall, ResponderReply> {
  private readonly instances = new Map<string, TrackedInstance>();
  private readonly offers = new Map<string, OutboundOffer>();
  private readonly blacklist: BlacklistTracker;
  private readonly pending: PendingRequestQueue<PendingAcquire>;
  private readonly log: Logger;
  private unhealthyInstanceIds: string[] = [];
  private status: "active" | "draining" = "active";
  private retireRequested = false;
  private useSeq = 0;
  private arrivalSeq = 0;
  private blacklistTimer?: TimerRef;
  private lastSchedulerUpdateTime: number | null = null;

  constructor(private readonly options: ResponderOptions) {
    super();
    this.blacklist = new BlacklistTracker(options.config);
    this.pending = new PendingRequestQueue(options.comparator);
    this.log = createLogger("Responder", options.routerId).child({ serviceId: options.serviceId });
  }

  handleCast(message: ResponderCast): void {
    switch (message.type) {
      case "scheduler-update":
        this.applySchedulerUpdate(message.update);
        break;
      case "service-removed":
        this.beginDraining();
        break;
      case "release-instance":
        this.releaseInstance(message.instanceId, message.outcome);
        break;
      case "complete-offer":
        this.completeOffer(message.cid, message.outcome);
        break;
      case "release-offer":
        this.releaseOffer(message.cid);
        break;
      case "router-left":
        this.handleRouterLeft(message.routerId);
        break;
      case "blacklist-expiry":
        this.expireBlacklist();
        break;
      case "queue-timeout":
        this.timeoutPending(message.seq);
        break;
      case "offer-lease-expiry":
        this.expireOfferLease(message.cid);
        break;
      case "unscheduled":
        this.retireIfIdle();
        break;
      default:
        this.log.warn("Dropping unknown message", { message: JSON.stringify(message) });
        return;
    }
    this.afterMessage();
  }

  handleCall(message: ResponderCall): CallResult<ResponderReply> {
    const reply = this.answer(message);
    this.afterMessage();
    return reply;
  }

  terminate(reason: TerminationReason): void {
    for (const waiting of this.pending.drain()) {
      waiting.reply.resolve({ type: "instance", selection: { status: "no-instance-available" } });
    }
    for (const tracked of Array.from(this.instances.values())) {
      if (tracked.stolen && tracked.inUse === 0) {
        this.returnStolen(tracked, "unused");
      }
    }
    this.log.debug("Responder terminated", { reason: reason.type });
  }

  private answer(message: ResponderCall): CallResult<ResponderReply> {
    switch (message.type) {
      case "select-instance":
        return { type: "instance", selection: this.selectForRequest(message.requestId) };
      case "acquire-instance":
        return this.acquire(message.requestId, message.priority);
      case "blacklist-instance":
        return {
          type: "blacklist",
          status: this.blacklistInstance(message.instanceId, message.periodMs, message.reason),
        };
      case "offer-instance":
        return { type: "offer", status: this.acceptOffer(message.offer) };
      case "reserve-offer":
        return { type: "reserved", instance: this.reserveOffer(message.targetRouterId, message.cid) };
      case "revoke-offer":
        return { type: "revoke", status: this.revokeOffer(message.cid) };
      case "query-state":
        return { type: "state", state: this.snapshot() };
      default:
        throw new Error(`Unknown responder call: ${JSON.stringify(message)}`);
    }
  }

  private get serviceId(): string {
    return this.options.serviceId;
  }

  private now(): number {
    return this.options.clock();
  }

  private description(): ServiceDescription {
    return this.options.description();
  }

  private slotsOf(tracked: TrackedInstance): number {
    return tracked.stolen ? 1 : this.description().concurrencyLevel;
  }

  private offerFor(instanceId: string): OutboundOffer | undefined {
    for (const offer of this.offers.values()) {
      if (offer.instanceId === instanceId) {
        return offer;
      }
    }
    return undefined;
  }

  private isSelectable(tracked: TrackedInstance, now: number): boolean {
    return (
      !tracked.retired &&
      !(tracked.stolen?.used ?? false) &&
      tracked.inUse < this.slotsOf(tracked) &&
      this.offerFor(tracked.instance.id) === undefined &&
      !this.blacklist.isBlacklisted(tracked.instance.id, now)
    );
  }

  /**
   * Least recently used selectable instance; the first inserted wins ties.
   */
  private pickInstance(): TrackedInstance | undefined {
    const now = this.now();
    let best: TrackedInstance | undefined;
    for (const tracked of this.instances.values()) {
      if (this.isSelectable(tracked, now) && (best === undefined || tracked.lastUsed < best.lastUsed)) {
        best = tracked;
      }
    }
    return best;
  }

  private assign(tracked: TrackedInstance): InstanceSelection {
    tracked.inUse++;
    tracked.lastUsed = ++this.useSeq;
    if (tracked.stolen) {
      tracked.stolen.used = true;
    }
    return { status: "selected", instance: tracked.instance, stolen: tracked.stolen !== undefined };
  }

  private selectForRequest(requestId: string): InstanceSelection {
    if (this.status === "draining") {
      return { status: "no-instance-available" };
    }
    const tracked = this.pickInstance();
    if (!tracked) {
      this.log.debug("No instance available", { requestId });
      return { status: "no-instance-available" };
    }
    return this.assign(tracked);
  }

  private acquire(requestId: string, priority: number): CallResult<ResponderReply> {
    const selection = this.selectForRequest(requestId);
    if (selection.status === "selected" || this.status === "draining") {
      return { type: "instance", selection };
    }

    this.prunePending();
    const { maxQueueLength } = this.description();
    if (this.pending.size >= maxQueueLength) {
      this.options.metrics.markMeter(serviceMetric(this.serviceId, "meters", "max-queue-length-exceeded"));
      this.log.warn("Max queue length exceeded", { requestId, maxQueueLength });
      return { type: "instance", selection: { status: "max-queue-length-exceeded", maxQueueLength } };
    }

    const seq = ++this.arrivalSeq;
    this.pending.enqueue({
      requestId,
      priority,
      seq,
      enqueuedAt: this.now(),
      reply: this.deferReply(),
      timer: this.sendAfter({ type: "queue-timeout", seq }, this.options.config.queueTimeoutMs),
    });
    return noReply;
  }

  private prunePending(): void {
    for (const settled of this.pending.removeWhere((waiting) => !waiting.reply.isPending)) {
      this.discardWaiting(settled);
    }
  }

  private discardWaiting(waiting: PendingAcquire): void {
    this.cancelTimer(waiting.timer);
    if (waiting.reply.isAbandoned) {
      this.options.metrics.markMeter(serviceMetric(this.serviceId, "meters", "queue-abandoned"));
      this.log.debug("Caller gave up waiting", { requestId: waiting.requestId });
    }
  }

  /**
   * Hands free slots to waiting requests in queue order.
   */
  private servePending(): void {
    for (;;) {
      const head = this.pending.peek();
      if (!head) {
        return;
      }
      if (!head.reply.isPending) {
        this.pending.dequeue();
        this.discardWaiting(head);
        continue;
      }
      const tracked = this.pickInstance();
      if (!tracked) {
        return;
      }
      this.pending.dequeue();
      this.cancelTimer(head.timer);
      const selection = this.assign(tracked);
      this.options.metrics.recordTimer(
        serviceMetric(this.serviceId, "timers", "queue-wait"),
        this.now() - head.enqueuedAt,
      );
      head.reply.resolve({ type: "instance", selection });
    }
  }

  private timeoutPending(seq: number): void {
    const expired = this.pending.remove((waiting) => waiting.seq === seq);
    if (!expired) {
      return;
    }
    this.options.metrics.markMeter(serviceMetric(this.serviceId, "meters", "queue-timeout"));
    this.log.info("Request timed out waiting for an instance", { requestId: expired.requestId });
    expired.reply.resolve({ type: "instance", selection: { status: "no-instance-available" } });
  }

  private releaseInstance(instanceId: string, outcome: RequestOutcome): void {
    const tracked = this.instances.get(instanceId);
    if (!tracked) {
      this.log.debug("Release for untracked instance", { instanceId, outcome });
      return;
    }
    tracked.inUse = Math.max(0, tracked.inUse - 1);

    if (outcome === "success") {
      this.blacklist.recordSuccess(instanceId);
    } else {
      this.addToBlacklist(instanceId, 0, outcome);
    }

    if (tracked.inUse > 0) {
      return;
    }
    if (tracked.stolen) {
      this.returnStolen(tracked, "used");
    } else if (tracked.retired) {
      this.instances.delete(instanceId);
    }
  }

  private blacklistInstance(instanceId: string, periodMs: number, reason: string): BlacklistStatus {
    const tracked = this.instances.get(instanceId);
    if (!tracked) {
      return "no-such-instance";
    }
    if (tracked.inUse > 0 && !this.options.config.blacklistBusyInstances) {
      this.log.info("Not blacklisting instance with in-flight requests", { instanceId, reason });
      return "in-use";
    }
    this.addToBlacklist(instanceId, periodMs, reason);
    return "blacklisted";
  }

  private addToBlacklist(instanceId: string, periodMs: number, reason: string): void {
    const entry = this.blacklist.blacklist(instanceId, this.now(), periodMs, reason);
    this.options.metrics.markMeter(serviceMetric(this.serviceId, "meters", "blacklist", reason));
    this.log.info("Instance blacklisted", {
      instanceId,
      reason,
      expiryTime: entry.expiryTime,
      consecutiveFailures: entry.consecutiveFailures,
    });
    this.scheduleBlacklistExpiry();
  }

  private scheduleBlacklistExpiry(): void {
    if (this.blacklistTimer) {
      this.cancelTimer(this.blacklistTimer);
      this.blacklistTimer = undefined;
    }
    const next = this.blacklist.nextExpiry();
    if (next !== undefined) {
      this.blacklistTimer = this.sendAfter({ type: "blacklist-expiry" }, Math.max(0, next - this.now()));
    }
  }

  private expireBlacklist(): void {
    this.blacklistTimer = undefined;
    const expired = this.blacklist.expire(this.now());
    if (expired.length > 0) {
      this.log.debug("Blacklist entries expired", { instanceIds: expired.join(",") });
    }
    this.scheduleBlacklistExpiry();
  }

  private applySchedulerUpdate(update: ServiceSchedulerUpdate): void {
    const killed = new Set(update.killedInstances.map((instance) => instance.id));
    for (const instanceId of killed) {
      this.purge(instanceId);
    }

    const owned = new Map<string, ServiceInstance>();
    for (const instance of update.healthyInstances) {
      if (!killed.has(instance.id)) {
        owned.set(instance.id, instance);
      }
    }
    const allHealthy = new Set(update.allHealthyInstanceIds);

    for (const [instanceId, instance] of owned) {
      const tracked = this.instances.get(instanceId);
      if (!tracked) {
        this.instances.set(instanceId, { instance, inUse: 0, lastUsed: 0, retired: false });
        continue;
      }
      if (tracked.stolen) {
        // ownership moved here after a membership change
        const { cid, fromRouterId } = tracked.stolen;
        tracked.stolen = undefined;
        this.options.onStolenInstanceReleased({
          cid,
          routerId: fromRouterId,
          serviceId: this.serviceId,
          instanceId,
          reason: "instance-gone",
        });
      }
      tracked.instance = instance;
      tracked.retired = false;
    }

    for (const [instanceId, tracked] of Array.from(this.instances)) {
      if (tracked.stolen) {
        if (!allHealthy.has(instanceId)) {
          this.retireStolen(tracked, "instance-gone");
        }
      } else if (!owned.has(instanceId)) {
        if (tracked.inUse > 0) {
          tracked.retired = true;
        } else {
          this.instances.delete(instanceId);
        }
      }
    }

    const known = new Set([...allHealthy, ...update.unhealthyInstances.map((instance) => instance.id)]);
    for (const instanceId of this.blacklist.retainOnly(known)) {
      this.log.debug("Dropped blacklist entry of departed instance", { instanceId });
    }
    this.scheduleBlacklistExpiry();

    this.unhealthyInstanceIds = update.unhealthyInstances.map((instance) => instance.id);
    this.lastSchedulerUpdateTime = update.time;
    if (this.status === "draining") {
      this.log.info("Service is available again, reactivating");
      this.status = "active";
      this.retireRequested = false;
    }
  }

  /**
   * Removes every trace of an instance: tracked slots, offers and blacklist.
   */
  private purge(instanceId: string): void {
    this.instances.delete(instanceId);
    for (const offer of Array.from(this.offers.values())) {
      if (offer.instanceId === instanceId) {
        this.dropOffer(offer);
      }
    }
    this.blacklist.remove(instanceId);
  }

  private beginDraining(): void {
    if (this.status === "draining") {
      return;
    }
    this.status = "draining";
    this.log.info("Service removed, draining", { pendingRequests: this.pending.size });
    for (const waiting of this.pending.drain()) {
      this.cancelTimer(waiting.timer);
      waiting.reply.resolve({ type: "instance", selection: { status: "no-instance-available" } });
    }
    for (const tracked of Array.from(this.instances.values())) {
      if (tracked.stolen) {
        this.retireStolen(tracked, "unused");
      }
    }
  }

  /**
   * A responder created for a service the scheduler never listed retires
   * once it holds nothing.
   */
  private retireIfIdle(): void {
    this.prunePending();
    if (this.status !== "active" || this.pending.size > 0 || this.instances.size > 0 || this.offers.size > 0) {
      return;
    }
    this.log.debug("Idle responder of unscheduled service, retiring");
    this.status = "draining";
  }

  private maybeRetire(): void {
    if (this.status !== "draining" || this.retireRequested) {
      return;
    }
    const busy = Array.from(this.instances.values()).some((tracked) => tracked.inUse > 0 || tracked.stolen);
    if (busy || this.offers.size > 0) {
      return;
    }
    this.retireRequested = true;
    this.options.retire(this.self);
  }

  private acceptOffer(offer: InboundOffer): OfferResponse {
    const instanceId = offer.instance.id;
    this.prunePending();
    let declineReason: string | undefined;
    if (offer.serviceId !== this.serviceId || offer.instance.serviceId !== this.serviceId) {
      declineReason = "service mismatch";
    } else if (this.status !== "active") {
      declineReason = "draining";
    } else if (!allowsWorkStealing(this.description().distributionScheme)) {
      declineReason = "work-stealing disabled";
    } else if (this.pending.size === 0) {
      declineReason = "no queued requests";
    } else if (this.instances.has(instanceId) || this.blacklist.isBlacklisted(instanceId, this.now())) {
      declineReason = "instance already known";
    }

    if (declineReason !== undefined) {
      this.options.metrics.markMeter(serviceMetric(this.serviceId, "meters", "work-stealing", "declined"));
      this.log.debug("Declined work-stealing offer", {
        cid: offer.cid,
        instanceId,
        peerId: offer.routerId,
        reason: declineReason,
      });
      return "declined";
    }

    // handed to the head of the queue when this message completes
    this.instances.set(instanceId, {
      instance: offer.instance,
      inUse: 0,
      lastUsed: 0,
      retired: false,
      stolen: { cid: offer.cid, fromRouterId: offer.routerId, used: false },
    });
    this.options.metrics.markMeter(serviceMetric(this.serviceId, "meters", "work-stealing", "accepted"));
    this.log.info("Accepted work-stealing offer", { cid: offer.cid, instanceId, peerId: offer.routerId });
    return "accepted";
  }

  private findStolen(cid: string): TrackedInstance | undefined {
    for (const tracked of this.instances.values()) {
      if (tracked.stolen?.cid === cid) {
        return tracked;
      }
    }
    return undefined;
  }

  private returnStolen(tracked: TrackedInstance, reason: StolenInstanceRelease["reason"]): void {
    const stolen = tracked.stolen;
    if (!stolen) {
      return;
    }
    this.instances.delete(tracked.instance.id);
    this.options.onStolenInstanceReleased({
      cid: stolen.cid,
      routerId: stolen.fromRouterId,
      serviceId: this.serviceId,
      instanceId: tracked.instance.id,
      reason,
    });
  }

  /**
   * Returns a stolen instance now when idle, otherwise after its request.
   */
  private retireStolen(tracked: TrackedInstance, reason: StolenInstanceRelease["reason"]): void {
    if (tracked.inUse === 0) {
      this.returnStolen(tracked, reason);
    } else {
      tracked.retired = true;
    }
  }

  /**
   * A held stolen instance is always serving or finishing a request; once
   * released it is forgotten, so the offer is unknown.
   */
  private revokeOffer(cid: string): RevokeStatus {
    return this.findStolen(cid) ? "in-use" : "unknown-offer";
  }

  private reserveOffer(targetRouterId: string, cid: string): ServiceInstance | null {
    if (this.status !== "active" || !allowsWorkStealing(this.description().distributionScheme)) {
      return null;
    }
    this.prunePending();
    if (this.pending.size > 0) {
      return null;
    }

    const now = this.now();
    let candidate: TrackedInstance | undefined;
    for (const tracked of this.instances.values()) {
      if (
        !tracked.stolen &&
        tracked.inUse === 0 &&
        this.isSelectable(tracked, now) &&
        (candidate === undefined || tracked.lastUsed < candidate.lastUsed)
      ) {
        candidate = tracked;
      }
    }
    if (!candidate) {
      return null;
    }

    this.offers.set(cid, {
      cid,
      instanceId: candidate.instance.id,
      routerId: targetRouterId,
      accepted: false,
      offeredAt: now,
    });
    this.log.debug("Reserved instance for offer", {
      cid,
      instanceId: candidate.instance.id,
      peerId: targetRouterId,
    });
    return candidate.instance;
  }

  private completeOffer(cid: string, outcome: OfferOutcome): void {
    const offer = this.offers.get(cid);
    if (!offer) {
      this.log.debug("Outcome for unknown offer", { cid, outcome });
      return;
    }
    if (outcome === "accepted" || outcome === "in-use") {
      if (!offer.accepted) {
        offer.accepted = true;
        this.options.metrics.markMeter(serviceMetric(this.serviceId, "meters", "work-stealing", "offer-accepted"));
      }
      if (offer.lease) {
        this.cancelTimer(offer.lease);
      }
      offer.lease = this.sendAfter({ type: "offer-lease-expiry", cid }, this.options.config.reserveTimeoutMs);
      return;
    }
    this.dropOffer(offer);
    this.log.debug("Offered instance returned", { cid, instanceId: offer.instanceId, outcome });
  }

  private expireOfferLease(cid: string): void {
    const offer = this.offers.get(cid);
    if (!offer || !offer.accepted) {
      return;
    }
    offer.lease = undefined;
    const heldMs = this.now() - offer.offeredAt;
    this.log.debug("Lease of lent instance expired, checking with peer", {
      cid,
      instanceId: offer.instanceId,
      peerId: offer.routerId,
      heldMs,
    });
    this.options.onOfferLeaseExpired({
      cid,
      peerId: offer.routerId,
      serviceId: this.serviceId,
      instanceId: offer.instanceId,
      heldMs,
    });
  }

  private dropOffer(offer: OutboundOffer): void {
    if (offer.lease) {
      this.cancelTimer(offer.lease);
    }
    this.offers.delete(offer.cid);
  }

  private releaseOffer(cid: string): void {
    const offer = this.offers.get(cid);
    if (!offer) {
      this.log.debug("Release for unknown offer", { cid });
      return;
    }
    this.dropOffer(offer);
    this.log.debug("Peer released offered instance", { cid, instanceId: offer.instanceId });
  }

  private handleRouterLeft(routerId: string): void {
    for (const offer of Array.from(this.offers.values())) {
      if (offer.routerId === routerId) {
        this.dropOffer(offer);
      }
    }
    for (const tracked of Array.from(this.instances.values())) {
      if (tracked.stolen?.fromRouterId !== routerId) {
        continue;
      }
      if (tracked.inUse === 0) {
        this.instances.delete(tracked.instance.id);
      } else {
        tracked.retired = true;
      }
    }
  }

  private afterMessage(): void {
    this.servePending();
    this.publishMetrics();
    this.maybeRetire();
  }

  private snapshot(): ResponderStateSnapshot {
    const now = this.now();
    const availableInstanceIds: string[] = [];
    const inUseInstanceIds: Record<string, number> = {};
    const stolenInstanceIds: string[] = [];
    let slotsAvailable = 0;
    let slotsInUse = 0;

    for (const tracked of this.instances.values()) {
      const instanceId = tracked.instance.id;
      if (this.isSelectable(tracked, now)) {
        availableInstanceIds.push(instanceId);
        slotsAvailable += this.slotsOf(tracked) - tracked.inUse;
      }
      if (tracked.inUse > 0) {
        inUseInstanceIds[instanceId] = tracked.inUse;
        slotsInUse += tracked.inUse;
      }
      if (tracked.stolen) {
        stolenInstanceIds.push(instanceId);
      }
    }

    return {
      serviceId: this.serviceId,
      routerId: this.options.routerId,
      status: this.status,
      availableInstanceIds,
      inUseInstanceIds,
      offeredInstanceIds: Array.from(this.offers.values()).map((offer) => offer.instanceId),
      stolenInstanceIds,
      unhealthyInstanceIds: [...this.unhealthyInstanceIds],
      blacklistedInstances: this.blacklist.snapshot(),
      slotsAvailable,
      slotsInUse,
      slotsOffered: this.offers.size,
      pendingRequests: this.pending.size,
      lastSchedulerUpdateTime: this.lastSchedulerUpdateTime,
    };
  }

  private publishMetrics(): void {
    const state = this.snapshot();
    const counter = (name: string, value: number) =>
      this.options.metrics.setCounter(serviceMetric(this.serviceId, "counters", ...name.split(".")), value);

    counter("instance-counts.slots-available", state.slotsAvailable);
    counter("instance-counts.slots-in-use", state.slotsInUse);
    counter("instance-counts.slots-offered", state.slotsOffered);
    counter("instance-counts.healthy", this.instances.size - state.stolenInstanceIds.length);
    counter("instance-counts.unhealthy", state.unhealthyInstanceIds.length);
    counter("instance-counts.blacklisted", this.blacklist.size);
    counter("instance-counts.stolen", state.stolenInstanceIds.length);
    counter("request-counts.waiting-for-available-instance", state.pendingRequests);
  }
}
