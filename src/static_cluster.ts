// src/static_cluster.ts

import { EventEmitter } from "events";
import { Cluster } from "./cluster";
import { ComponentHealth, HealthCheckable } from "./health";
import { Logger, createLogger } from "./logger";

/**
 * Cluster with an explicitly managed member list, for single-router
 * deployments, fixed router sets and tests. Emits member_join and
 * member_leave as members are added or removed.
 */
export class StaticCluster extends EventEmitter implements Cluster, HealthCheckable {
  public readonly routerId: string;
  private readonly members = new Set<string>();
  private readonly log: Logger;

  constructor(routerId: string, peers: string[] = []) {
    super();
    this.routerId = routerId;
    this.log = createLogger("StaticCluster", routerId);
    this.members.add(routerId);
    for (const peer of peers) {
      this.members.add(peer);
    }
  }

  getMembers(): string[] {
    return Array.from(this.members).sort();
  }

  addMember(routerId: string): void {
    if (this.members.has(routerId)) {
      return;
    }
    this.members.add(routerId);
    this.log.info("Router joined", { peerId: routerId });
    this.emit("member_join", routerId);
  }

  removeMember(routerId: string): void {
    if (routerId === this.routerId || !this.members.delete(routerId)) {
      return;
    }
    this.log.info("Router left", { peerId: routerId });
    this.emit("member_leave", routerId);
  }

  getHealth(): ComponentHealth {
    return {
      name: "StaticCluster",
      status: "healthy",
      details: {
        routerId: this.routerId,
        memberCount: this.members.size,
      },
    };
  }
}
