// src/blacklist.ts

export interface BlacklistPolicy {
  blacklistBackoffBaseTimeMs: number;
  maxBlacklistTimeMs: number;
}

export interface BlacklistEntry {
  instanceId: string;
  expiryTime: number;
  consecutiveFailures: number;
  reason: string;
}

/**
 * Exponential backoff for the n-th consecutive failure:
 * base * 2^(n-1), capped at the policy maximum. Zero for n < 1.
 */
export function computeBackoff(consecutiveFailures: number, policy: BlacklistPolicy): number {
  if (consecutiveFailures < 1) {
    return 0;
  }
  const backoff = policy.blacklistBackoffBaseTimeMs * Math.pow(2, consecutiveFailures - 1);
  return Math.min(backoff, policy.maxBlacklistTimeMs);
}

/**
 * Blacklist state of one service's instances. Owned by the service's
 * Responder, so it is never touched concurrently.
 *
 * Failure counts outlive the entries: an instance that fails again after its
 * blacklist expired backs off longer. The count resets on a successful
 * request or when the instance goes away.
 */
export class BlacklistTracker {
  private readonly entries = new Map<string, BlacklistEntry>();
  private readonly failures = new Map<string, number>();

  constructor(private readonly policy: BlacklistPolicy) {}

  /**
   * Blacklists (or re-blacklists) an instance. The duration is the requested
   * period or the backoff for the new failure count, whichever is longer,
   * never beyond the policy maximum.
   */
  blacklist(instanceId: string, now: number, periodMs: number, reason: string): BlacklistEntry {
    const consecutiveFailures = (this.failures.get(instanceId) ?? 0) + 1;
    this.failures.set(instanceId, consecutiveFailures);

    const duration = Math.min(
      Math.max(periodMs, computeBackoff(consecutiveFailures, this.policy)),
      this.policy.maxBlacklistTimeMs,
    );
    const entry: BlacklistEntry = {
      instanceId,
      expiryTime: now + duration,
      consecutiveFailures,
      reason,
    };
    this.entries.set(instanceId, entry);
    return entry;
  }

  isBlacklisted(instanceId: string, now: number): boolean {
    const entry = this.entries.get(instanceId);
    return entry !== undefined && entry.expiryTime > now;
  }

  get(instanceId: string): BlacklistEntry | undefined {
    return this.entries.get(instanceId);
  }

  consecutiveFailures(instanceId: string): number {
    return this.failures.get(instanceId) ?? 0;
  }

  recordSuccess(instanceId: string): void {
    this.failures.delete(instanceId);
  }

  /**
   * Drops entries whose expiry has passed and returns their instance ids.
   */
  expire(now: number): string[] {
    const expired: string[] = [];
    for (const [instanceId, entry] of Array.from(this.entries)) {
      if (entry.expiryTime <= now) {
        this.entries.delete(instanceId);
        expired.push(instanceId);
      }
    }
    return expired;
  }

  /**
   * Forgets an instance entirely (killed or gone from the scheduler).
   */
  remove(instanceId: string): boolean {
    this.failures.delete(instanceId);
    return this.entries.delete(instanceId);
  }

  /**
   * Forgets every instance not in `instanceIds`; returns the ids dropped.
   */
  retainOnly(instanceIds: ReadonlySet<string>): string[] {
    const dropped: string[] = [];
    for (const instanceId of Array.from(this.entries.keys())) {
      if (!instanceIds.has(instanceId)) {
        this.entries.delete(instanceId);
        dropped.push(instanceId);
      }
    }
    for (const instanceId of Array.from(this.failures.keys())) {
      if (!instanceIds.has(instanceId)) {
        this.failures.delete(instanceId);
      }
    }
    return dropped;
  }

  nextExpiry(): number | undefined {
    let next: number | undefined;
    for (const entry of this.entries.values()) {
      if (next === undefined || entry.expiryTime < next) {
        next = entry.expiryTime;
      }
    }
    return next;
  }

  instanceIds(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): Record<string, { expiryTime: number; consecutiveFailures: number; reason: string }> {
    const result: Record<string, { expiryTime: number; consecutiveFailures: number; reason: string }> = {};
    for (const [instanceId, { expiryTime, consecutiveFailures, reason }] of this.entries) {
      result[instanceId] = { expiryTime, consecutiveFailures, reason };
    }
    return result;
  }
}
