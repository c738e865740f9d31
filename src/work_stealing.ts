// src/work_stealing.ts

import { v4 as uuidv4 } from "uuid";
import { Actor } from "./actor";
import { RouterConfig } from "./config";
import { ServiceDispatcher } from "./dispatcher";
import { toError } from "./errors";
import { Logger, createLogger } from "./logger";
import { MetricsSink, routerMetric } from "./metrics";
import { InboundOffer, OfferOutcome } from "./responder";
import { RouterLoadGossip } from "./router_load_gossip";
import { RouterRpc } from "./router_rpc";
import { allowsWorkStealing } from "./service_description";

export type WorkStealingCast =
  | { type: "tick" }
  | { type: "offer-finished"; key: string; outcome: OfferOutcome };

export type WorkStealingCall = { type: "query-state" };

export interface InFlightOffer {
  cid: string;
  serviceId: string;
  peerId: string;
  instanceId: string;
  sentAt: number;
}

export interface WorkStealingState {
  routerId: string;
  iterations: number;
  offersSent: number;
  outcomes: Partial<Record<OfferOutcome, number>>;
  inFlightOffers: InFlightOffer[];
}

export interface WorkStealingBalancerOptions {
  routerId: string;
  config: RouterConfig;
  dispatcher: ServiceDispatcher;
  gossip: RouterLoadGossip;
  rpc: RouterRpc;
  metrics: MetricsSink;
  clock: () => number;
}

/**
 * Every offerHelpIntervalMs: publishes this router's loads, then offers idle
 * instances of balanced services to peers reporting queued requests for the
 * same service. At most one offer per (service, peer) is in flight.
 *
 * Offers are negotiated off the actor's message loop; their outcome is
 * handed to the offering Responder and then cast back here.
 */
export class WorkStealingBalancer extends Actor<WorkStealingCast, WorkStealingCall, WorkStealingState> {
  private readonly inFlight = new Map<string, InFlightOffer>();
  private readonly outcomes: Partial<Record<OfferOutcome, number>> = {};
  private readonly log: Logger;
  private iterations = 0;
  private offersSent = 0;

  constructor(private readonly options: WorkStealingBalancerOptions) {
    super();
    this.log = createLogger("WorkStealingBalancer", options.routerId);
  }

  init(): void {
    this.sendInterval({ type: "tick" }, this.options.config.offerHelpIntervalMs);
  }

  async handleCast(message: WorkStealingCast): Promise<void> {
    switch (message.type) {
      case "tick":
        await this.tick();
        break;
      case "offer-finished":
        this.inFlight.delete(message.key);
        this.outcomes[message.outcome] = (this.outcomes[message.outcome] ?? 0) + 1;
        break;
    }
  }

  handleCall(message: WorkStealingCall): WorkStealingState {
    switch (message.type) {
      case "query-state":
        return {
          routerId: this.options.routerId,
          iterations: this.iterations,
          offersSent: this.offersSent,
          outcomes: { ...this.outcomes },
          inFlightOffers: Array.from(this.inFlight.values()),
        };
    }
  }

  private async tick(): Promise<void> {
    const { dispatcher, gossip } = this.options;
    this.iterations++;

    const loads = await dispatcher.queryLoads();
    try {
      await gossip.publish(loads);
    } catch (err) {
      this.log.warn("Failed to publish router loads", { error: toError(err).message });
    }

    for (const load of loads) {
      if (load.outstanding > 0 || load.slotsAvailable === 0) {
        continue;
      }
      if (!allowsWorkStealing(dispatcher.distributionSchemeOf(load.serviceId))) {
        continue;
      }
      for (const peerId of gossip.peersNeedingHelp(load.serviceId)) {
        const key = `${load.serviceId}|${peerId}`;
        if (this.inFlight.has(key)) {
          continue;
        }
        const cid = uuidv4();
        const instance = await dispatcher.reserveOffer(load.serviceId, peerId, cid);
        if (!instance) {
          break;
        }
        this.inFlight.set(key, {
          cid,
          serviceId: load.serviceId,
          peerId,
          instanceId: instance.id,
          sentAt: this.options.clock(),
        });
        this.offersSent++;
        void this.deliverOffer(key, peerId, {
          cid,
          requestId: uuidv4(),
          routerId: this.options.routerId,
          serviceId: load.serviceId,
          instance,
        });
      }
    }
  }

  private async deliverOffer(key: string, peerId: string, offer: InboundOffer): Promise<void> {
    let outcome: OfferOutcome = "unreachable";
    try {
      outcome = await this.negotiate(peerId, offer);
    } catch (err) {
      this.log.error("Offer negotiation failed", err, { cid: offer.cid, peerId });
    }
    this.options.metrics.markMeter(routerMetric("work-stealing", "meters", "offers", outcome));
    this.log.debug("Offer finished", { cid: offer.cid, peerId, serviceId: offer.serviceId, outcome });
    this.options.dispatcher.completeOffer(offer.serviceId, offer.cid, outcome);
    this.self.cast({ type: "offer-finished", key, outcome });
  }

  /**
   * Sends the offer; without an answer in time, asks the peer to revoke it.
   * The instance only comes back when the peer confirms it is unused or
   * cannot be reached at all.
   */
  private async negotiate(peerId: string, offer: InboundOffer): Promise<OfferOutcome> {
    const { rpc, config } = this.options;
    try {
      return await rpc.sendOffer(peerId, offer, config.reserveTimeoutMs);
    } catch (err) {
      this.log.info("Offer unanswered, revoking", {
        cid: offer.cid,
        peerId,
        error: toError(err).message,
      });
    }
    try {
      return await rpc.revokeOffer(peerId, offer.serviceId, offer.cid, config.reserveTimeoutMs);
    } catch (err) {
      this.log.warn("Revoke failed, treating peer as unreachable", {
        cid: offer.cid,
        peerId,
        error: toError(err).message,
      });
      return "unreachable";
    }
  }
}
