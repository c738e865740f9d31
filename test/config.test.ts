// test/config.test.ts

import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  DEFAULT_ROUTER_CONFIG,
  resolveRouterConfig,
  routerConfigFromEnv,
} from "../src";

function configurationIssues(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return err.context?.issues;
    }
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("router configuration", () => {
  it("should fall back to the defaults", () => {
    expect(resolveRouterConfig()).toEqual(DEFAULT_ROUTER_CONFIG);
  });

  it("should apply overrides", () => {
    const config = resolveRouterConfig({ defaultMaxQueueLength: 5, defaultDistributionScheme: "simple" });

    expect(config.defaultMaxQueueLength).toBe(5);
    expect(config.defaultDistributionScheme).toBe("simple");
    expect(config.offerHelpIntervalMs).toBe(DEFAULT_ROUTER_CONFIG.offerHelpIntervalMs);
  });

  it("should list every invalid field", () => {
    const issues = configurationIssues(() =>
      resolveRouterConfig({ defaultConcurrencyLevel: 0, queueTimeoutMs: 1.5 }),
    );

    expect(issues).toEqual([
      "defaultConcurrencyLevel: Number must be greater than 0",
      "queueTimeoutMs: Expected integer, received float",
    ]);
  });

  it("should reject a maximum blacklist time below the backoff base", () => {
    const issues = configurationIssues(() =>
      resolveRouterConfig({ blacklistBackoffBaseTimeMs: 5000, maxBlacklistTimeMs: 1000 }),
    );

    expect(issues).toEqual([
      "maxBlacklistTimeMs: maxBlacklistTimeMs must not be lower than blacklistBackoffBaseTimeMs",
    ]);
  });

  it("should read ROUTER_ variables from the environment", () => {
    const config = routerConfigFromEnv({
      ROUTER_DEFAULT_MAX_QUEUE_LENGTH: "12",
      ROUTER_BLACKLIST_BUSY_INSTANCES: "true",
      ROUTER_DEFAULT_DISTRIBUTION_SCHEME: "simple",
      UNRELATED: "x",
    });

    expect(config.defaultMaxQueueLength).toBe(12);
    expect(config.blacklistBusyInstances).toBe(true);
    expect(config.defaultDistributionScheme).toBe("simple");
  });

  it("should let explicit overrides win over the environment", () => {
    const config = routerConfigFromEnv({ ROUTER_QUEUE_TIMEOUT_MS: "100" }, { queueTimeoutMs: 200 });

    expect(config.queueTimeoutMs).toBe(200);
  });

  it("should reject unparseable environment values", () => {
    expect(() => routerConfigFromEnv({ ROUTER_MAILBOX_CAPACITY: "lots" })).toThrow(ConfigurationError);
  });
});
