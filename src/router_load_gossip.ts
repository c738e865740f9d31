// src/router_load_gossip.ts

import { EventEmitter } from "events";
import { z } from "zod";
import { Cluster } from "./cluster";
import { Logger, createLogger } from "./logger";
import { Subscription, Transport } from "./transport";

export const ROUTER_LOADS_TOPIC = "router:loads";

export const serviceLoadSchema = z.object({
  serviceId: z.string().min(1),
  slotsAvailable: z.number().int().nonnegative(),
  slotsInUse: z.number().int().nonnegative(),
  slotsOffered: z.number().int().nonnegative(),
  /** Requests queued waiting for a slot. */
  outstanding: z.number().int().nonnegative(),
});

export type ServiceLoad = z.infer<typeof serviceLoadSchema>;

export const routerLoadReportSchema = z.object({
  routerId: z.string().min(1),
  timestamp: z.number(),
  services: z.array(serviceLoadSchema),
});

export type RouterLoadReport = z.infer<typeof routerLoadReportSchema>;

export interface RouterLoadGossipConfig {
  /** Reports older than this are ignored. */
  ttlMs: number;
  clock?: () => number;
}

/**
 * Spreads each router's per-service load to its peers over the transport's
 * pub/sub channel. Work-stealing reads the latest report of each peer to
 * find routers with queued requests.
 *
 * Events:
 * - 'report': a peer report was accepted
 */
export class RouterLoadGossip extends EventEmitter {
  private readonly reports = new Map<string, RouterLoadReport>();
  private readonly log: Logger;
  private readonly clock: () => number;
  private subscription?: Subscription;
  private readonly onMemberLeave = (routerId: string) => this.forget(routerId);

  constructor(
    private readonly routerId: string,
    private readonly transport: Transport,
    private readonly cluster: Cluster,
    private readonly config: RouterLoadGossipConfig,
  ) {
    super();
    this.clock = config.clock ?? Date.now;
    this.log = createLogger("RouterLoadGossip", routerId);
  }

  async connect(): Promise<void> {
    this.subscription = await this.transport.subscribe(ROUTER_LOADS_TOPIC, (message) =>
      this.handleReport(message),
    );
    this.cluster.on("member_leave", this.onMemberLeave);
  }

  async disconnect(): Promise<void> {
    this.cluster.removeListener("member_leave", this.onMemberLeave);
    await this.subscription?.unsubscribe();
    this.subscription = undefined;
    this.reports.clear();
  }

  async publish(services: ServiceLoad[]): Promise<void> {
    const report: RouterLoadReport = {
      routerId: this.routerId,
      timestamp: this.clock(),
      services,
    };
    await this.transport.publish(ROUTER_LOADS_TOPIC, report);
  }

  /**
   * Peers whose latest fresh report shows queued requests for the service,
   * most outstanding first.
   */
  peersNeedingHelp(serviceId: string): string[] {
    const members = new Set(this.cluster.getMembers());
    const now = this.clock();
    const needy: Array<{ routerId: string; outstanding: number }> = [];
    for (const report of this.reports.values()) {
      if (!members.has(report.routerId) || now - report.timestamp > this.config.ttlMs) {
        continue;
      }
      const load = report.services.find((s) => s.serviceId === serviceId);
      if (load && load.outstanding > 0) {
        needy.push({ routerId: report.routerId, outstanding: load.outstanding });
      }
    }
    return needy
      .sort((a, b) => b.outstanding - a.outstanding || a.routerId.localeCompare(b.routerId))
      .map((entry) => entry.routerId);
  }

  getPeerReports(): RouterLoadReport[] {
    return Array.from(this.reports.values());
  }

  private handleReport(message: unknown): void {
    const parsed = routerLoadReportSchema.safeParse(message);
    if (!parsed.success) {
      this.log.warn("Ignoring malformed load report");
      return;
    }
    const report = parsed.data;
    if (report.routerId === this.routerId) {
      return;
    }
    const known = this.reports.get(report.routerId);
    if (known && known.timestamp > report.timestamp) {
      return;
    }
    this.reports.set(report.routerId, report);
    this.emit("report", report);
  }

  private forget(routerId: string): void {
    if (this.reports.delete(routerId)) {
      this.log.debug("Dropped load report of departed router", { peerId: routerId });
    }
  }
}
