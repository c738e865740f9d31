// src/router_rpc.ts

import { z } from "zod";
import { formatIssues } from "./config";
import { ServiceDispatcher } from "./dispatcher";
import { BadRequestError, TransportError, toError } from "./errors";
import { Logger, createLogger } from "./logger";
import {
  InboundOffer,
  OfferLease,
  OfferOutcome,
  OfferResponse,
  RevokeStatus,
  StolenInstanceRelease,
} from "./responder";
import { serviceInstanceSchema } from "./service_instance";
import { Transport } from "./transport";

const nonBlank = z.string().trim().min(1);

export const offerRequestSchema = z.object({
  type: z.literal("work-stealing:offer"),
  cid: nonBlank,
  requestId: nonBlank,
  routerId: nonBlank,
  serviceId: nonBlank,
  instance: serviceInstanceSchema,
});

const revokeRequestSchema = z.object({
  type: z.literal("work-stealing:revoke"),
  cid: nonBlank,
  routerId: nonBlank,
  serviceId: nonBlank,
});

const inboundRequestSchema = z.discriminatedUnion("type", [offerRequestSchema, revokeRequestSchema]);

const releaseMessageSchema = z.object({
  type: z.literal("work-stealing:release"),
  cid: nonBlank,
  routerId: nonBlank,
  serviceId: nonBlank,
  instanceId: nonBlank,
  reason: z.enum(["used", "unused", "instance-gone"]),
});

export const offerReplySchema = z.object({
  cid: z.string(),
  requestId: z.string(),
  routerId: z.string(),
  serviceId: z.string(),
  responseStatus: z.enum(["accepted", "declined"]),
});

export type OfferReply = z.infer<typeof offerReplySchema>;

const revokeReplySchema = z.object({
  cid: z.string(),
  status: z.enum(["revoked", "in-use", "unknown-offer"]),
});

/**
 * The inter-router protocol: work-stealing offers, revocations and releases,
 * carried over the Transport. Inbound payloads are validated before they
 * reach a Responder; malformed ones are rejected without touching state.
 */
export class RouterRpc {
  private readonly log: Logger;

  constructor(
    private readonly routerId: string,
    private readonly transport: Transport,
    private readonly dispatcher: ServiceDispatcher,
  ) {
    this.log = createLogger("RouterRpc", routerId);
  }

  start(): void {
    this.transport.onRequest((message) => this.handleRequest(message));
    this.transport.onMessage((message) => this.handleMessage(message));
  }

  /**
   * Hands an offer to the local Responder of its service.
   */
  async receiveOffer(offer: InboundOffer): Promise<OfferReply> {
    const responseStatus = await this.dispatcher.offerInstance(offer);
    return {
      cid: offer.cid,
      requestId: offer.requestId,
      routerId: offer.routerId,
      serviceId: offer.serviceId,
      responseStatus,
    };
  }

  async handleRequest(message: unknown): Promise<unknown> {
    const parsed = inboundRequestSchema.safeParse(message);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      this.log.warn("Rejecting malformed router request", { issues: issues.join("; ") });
      throw new BadRequestError("Malformed router request", issues);
    }

    const request = parsed.data;
    switch (request.type) {
      case "work-stealing:offer": {
        const { type: _type, ...offer } = request;
        return this.receiveOffer(offer);
      }
      case "work-stealing:revoke": {
        const status = await this.dispatcher.revokeOffer(request.serviceId, request.cid);
        return { cid: request.cid, status };
      }
    }
  }

  handleMessage(message: unknown): void {
    const parsed = releaseMessageSchema.safeParse(message);
    if (!parsed.success) {
      this.log.warn("Dropping malformed router message", {
        issues: formatIssues(parsed.error).join("; "),
      });
      return;
    }
    const release = parsed.data;
    this.log.debug("Peer released offered instance", {
      cid: release.cid,
      peerId: release.routerId,
      reason: release.reason,
    });
    this.dispatcher.releaseOffer(release.serviceId, release.cid);
  }

  /**
   * Offers one of this router's instances to a peer.
   * @throws TimeoutError when the peer does not answer in time
   */
  async sendOffer(peerId: string, offer: InboundOffer, timeoutMs: number): Promise<OfferResponse> {
    const reply = await this.transport.request(
      peerId,
      { type: "work-stealing:offer", ...offer },
      timeoutMs,
    );
    const parsed = offerReplySchema.safeParse(reply);
    if (!parsed.success || parsed.data.cid !== offer.cid) {
      throw new TransportError(`Malformed offer reply from ${peerId}`, peerId);
    }
    return parsed.data.responseStatus;
  }

  async revokeOffer(peerId: string, serviceId: string, cid: string, timeoutMs: number): Promise<RevokeStatus> {
    const reply = await this.transport.request(
      peerId,
      { type: "work-stealing:revoke", cid, routerId: this.routerId, serviceId },
      timeoutMs,
    );
    const parsed = revokeReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new TransportError(`Malformed revoke reply from ${peerId}`, peerId);
    }
    return parsed.data.status;
  }

  /**
   * Asks the peer holding a lent instance whether it still uses it. A peer
   * that cannot answer is reported as unreachable.
   */
  async checkLease(lease: OfferLease, timeoutMs: number): Promise<OfferOutcome> {
    try {
      return await this.revokeOffer(lease.peerId, lease.serviceId, lease.cid, timeoutMs);
    } catch (err) {
      this.log.warn("Lease check failed, treating peer as unreachable", {
        cid: lease.cid,
        peerId: lease.peerId,
        error: toError(err).message,
      });
      return "unreachable";
    }
  }

  /**
   * Tells the offering router it can have its instance back.
   */
  async sendRelease(release: StolenInstanceRelease): Promise<void> {
    await this.transport.send(release.routerId, { type: "work-stealing:release", ...release });
  }
}
