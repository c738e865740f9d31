// src/distribution.ts

import crypto from "crypto";
import { ServiceInstance } from "./service_instance";

function score(routerId: string, instanceId: string): string {
  return crypto.createHash("sha1").update(`${routerId}|${instanceId}`).digest("hex");
}

/**
 * The router responsible for an instance's slots: highest rendezvous hash
 * of (router, instance) over the members. Every router computes the same
 * owner from the same member list, so each instance belongs to exactly one
 * router, and a membership change only moves the instances of the routers
 * involved.
 */
export function ownerOf(instanceId: string, routerIds: readonly string[]): string | undefined {
  let owner: string | undefined;
  let best = "";
  for (const routerId of routerIds) {
    const candidate = score(routerId, instanceId);
    if (owner === undefined || candidate > best || (candidate === best && routerId < owner)) {
      owner = routerId;
      best = candidate;
    }
  }
  return owner;
}

/**
 * The subset of `instances` owned by `routerId`. A router missing from the
 * member list still owns its share as if it were a member.
 */
export function ownedInstances(
  instances: readonly ServiceInstance[],
  routerId: string,
  members: readonly string[],
): ServiceInstance[] {
  const routerIds = members.includes(routerId) ? members : [...members, routerId];
  return instances.filter((instance) => ownerOf(instance.id, routerIds) === routerId);
}
