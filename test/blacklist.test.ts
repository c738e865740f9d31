// test/blacklist.test.ts

import { describe, it, expect, beforeEach } from "vitest";
import { BlacklistTracker, computeBackoff } from "../src";

const policy = { blacklistBackoffBaseTimeMs: 1000, maxBlacklistTimeMs: 10000 };

describe("computeBackoff", () => {
  it("should double per consecutive failure", () => {
    expect(computeBackoff(1, policy)).toBe(1000);
    expect(computeBackoff(2, policy)).toBe(2000);
    expect(computeBackoff(3, policy)).toBe(4000);
    expect(computeBackoff(4, policy)).toBe(8000);
  });

  it("should cap at the maximum", () => {
    expect(computeBackoff(5, policy)).toBe(10000);
    expect(computeBackoff(50, policy)).toBe(10000);
  });

  it("should be zero without failures", () => {
    expect(computeBackoff(0, policy)).toBe(0);
  });

  it("should never decrease as failures grow", () => {
    for (let n = 1; n < 40; n++) {
      expect(computeBackoff(n + 1, policy)).toBeGreaterThanOrEqual(computeBackoff(n, policy));
    }
  });
});

describe("BlacklistTracker", () => {
  let tracker: BlacklistTracker;

  beforeEach(() => {
    tracker = new BlacklistTracker(policy);
  });

  it("should use the longer of the requested period and the backoff", () => {
    expect(tracker.blacklist("i-1", 0, 5000, "killed").expiryTime).toBe(5000);
    expect(tracker.blacklist("i-2", 0, 0, "instance-error").expiryTime).toBe(1000);
  });

  it("should never exceed the maximum blacklist time", () => {
    expect(tracker.blacklist("i-1", 100, 60000, "killed").expiryTime).toBe(10100);
  });

  it("should count every blacklisting of the same instance", () => {
    tracker.blacklist("i-1", 0, 0, "instance-error");
    const entry = tracker.blacklist("i-1", 500, 0, "instance-error");

    expect(entry.consecutiveFailures).toBe(2);
    expect(entry.expiryTime).toBe(2500);
    expect(tracker.consecutiveFailures("i-1")).toBe(2);
  });

  it("should treat an entry as blacklisted until its expiry", () => {
    tracker.blacklist("i-1", 0, 0, "instance-error");

    expect(tracker.isBlacklisted("i-1", 999)).toBe(true);
    expect(tracker.isBlacklisted("i-1", 1000)).toBe(false);
    expect(tracker.isBlacklisted("i-2", 0)).toBe(false);
  });

  it("should keep failure counts past expiry until a success", () => {
    tracker.blacklist("i-1", 0, 0, "instance-error");
    expect(tracker.expire(1000)).toEqual(["i-1"]);
    expect(tracker.size).toBe(0);

    expect(tracker.blacklist("i-1", 2000, 0, "instance-error").consecutiveFailures).toBe(2);

    tracker.recordSuccess("i-1");
    expect(tracker.consecutiveFailures("i-1")).toBe(0);
  });

  it("should report the earliest expiry", () => {
    tracker.blacklist("i-1", 0, 4000, "a");
    tracker.blacklist("i-2", 0, 2000, "b");

    expect(tracker.nextExpiry()).toBe(2000);
    tracker.expire(2000);
    expect(tracker.nextExpiry()).toBe(4000);
    expect(tracker.instanceIds()).toEqual(["i-1"]);
  });

  it("should forget instances that left the scheduler", () => {
    tracker.blacklist("i-1", 0, 0, "a");
    tracker.blacklist("i-2", 0, 0, "b");

    expect(tracker.retainOnly(new Set(["i-2"]))).toEqual(["i-1"]);
    expect(tracker.consecutiveFailures("i-1")).toBe(0);
    expect(Object.keys(tracker.snapshot())).toEqual(["i-2"]);
  });

  it("should forget a removed instance entirely", () => {
    tracker.blacklist("i-1", 0, 0, "killed");

    expect(tracker.remove("i-1")).toBe(true);
    expect(tracker.get("i-1")).toBeUndefined();
    expect(tracker.consecutiveFailures("i-1")).toBe(0);
  });
});
