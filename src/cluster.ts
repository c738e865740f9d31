// src/cluster.ts

export type ClusterEvent = "member_join" | "member_leave";

/**
 * Membership of the router cluster. Instance ownership and work-stealing
 * peers are both derived from getMembers().
 */
export interface Cluster {
  readonly routerId: string;

  /**
   * All known member router ids, including this router.
   */
  getMembers(): string[];

  on(event: ClusterEvent, listener: (routerId: string) => void): this;

  removeListener(event: ClusterEvent, listener: (routerId: string) => void): this;
}
