// src/config.ts

import { z } from "zod";
import { ConfigurationError } from "./errors";

export type DistributionScheme = "balanced" | "simple";

export interface RouterConfig {
  /** Backoff for the first consecutive failure; doubles per failure. */
  blacklistBackoffBaseTimeMs: number;
  maxBlacklistTimeMs: number;
  /** When false, blacklisting an instance with in-flight requests answers in-use. */
  blacklistBusyInstances: boolean;
  offerHelpIntervalMs: number;
  reserveTimeoutMs: number;
  schedulerSyncerIntervalSecs: number;
  defaultInterstitialSecs: number;
  defaultMaxQueueLength: number;
  defaultConcurrencyLevel: number;
  defaultDistributionScheme: DistributionScheme;
  /** How long an acquire may wait in a service's pending queue. */
  queueTimeoutMs: number;
  queryTimeoutMs: number;
  blacklistTimeoutMs: number;
  mailboxCapacity: number;
  /** Peer load reports older than this are ignored by work-stealing. */
  peerLoadTtlMs: number;
}

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  blacklistBackoffBaseTimeMs: 10000,
  maxBlacklistTimeMs: 300000,
  blacklistBusyInstances: false,
  offerHelpIntervalMs: 100,
  reserveTimeoutMs: 1000,
  schedulerSyncerIntervalSecs: 5,
  defaultInterstitialSecs: 0,
  defaultMaxQueueLength: 1000000,
  defaultConcurrencyLevel: 1,
  defaultDistributionScheme: "balanced",
  queueTimeoutMs: 30000,
  queryTimeoutMs: 10000,
  blacklistTimeoutMs: 30000,
  mailboxCapacity: 1024,
  peerLoadTtlMs: 5000,
};

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const routerConfigSchema = z
  .object({
    blacklistBackoffBaseTimeMs: positiveInt,
    maxBlacklistTimeMs: positiveInt,
    blacklistBusyInstances: z.boolean(),
    offerHelpIntervalMs: positiveInt,
    reserveTimeoutMs: positiveInt,
    schedulerSyncerIntervalSecs: z.number().positive(),
    defaultInterstitialSecs: nonNegativeInt,
    defaultMaxQueueLength: positiveInt,
    defaultConcurrencyLevel: positiveInt,
    defaultDistributionScheme: z.enum(["balanced", "simple"]),
    queueTimeoutMs: positiveInt,
    queryTimeoutMs: positiveInt,
    blacklistTimeoutMs: positiveInt,
    mailboxCapacity: positiveInt,
    peerLoadTtlMs: positiveInt,
  })
  .refine((c) => c.maxBlacklistTimeMs >= c.blacklistBackoffBaseTimeMs, {
    message: "maxBlacklistTimeMs must not be lower than blacklistBackoffBaseTimeMs",
    path: ["maxBlacklistTimeMs"],
  });

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Merges overrides onto the defaults and validates the result.
 * @throws ConfigurationError listing every invalid field
 */
export function resolveRouterConfig(overrides: Partial<RouterConfig> = {}): RouterConfig {
  const parsed = routerConfigSchema.safeParse({ ...DEFAULT_ROUTER_CONFIG, ...overrides });
  if (!parsed.success) {
    throw new ConfigurationError("Invalid router configuration", formatIssues(parsed.error));
  }
  return parsed.data;
}

const ENV_KEYS: Record<string, keyof RouterConfig> = {
  ROUTER_BLACKLIST_BACKOFF_BASE_TIME_MS: "blacklistBackoffBaseTimeMs",
  ROUTER_MAX_BLACKLIST_TIME_MS: "maxBlacklistTimeMs",
  ROUTER_BLACKLIST_BUSY_INSTANCES: "blacklistBusyInstances",
  ROUTER_OFFER_HELP_INTERVAL_MS: "offerHelpIntervalMs",
  ROUTER_RESERVE_TIMEOUT_MS: "reserveTimeoutMs",
  ROUTER_SCHEDULER_SYNCER_INTERVAL_SECS: "schedulerSyncerIntervalSecs",
  ROUTER_DEFAULT_INTERSTITIAL_SECS: "defaultInterstitialSecs",
  ROUTER_DEFAULT_MAX_QUEUE_LENGTH: "defaultMaxQueueLength",
  ROUTER_DEFAULT_CONCURRENCY_LEVEL: "defaultConcurrencyLevel",
  ROUTER_DEFAULT_DISTRIBUTION_SCHEME: "defaultDistributionScheme",
  ROUTER_QUEUE_TIMEOUT_MS: "queueTimeoutMs",
  ROUTER_QUERY_TIMEOUT_MS: "queryTimeoutMs",
  ROUTER_BLACKLIST_TIMEOUT_MS: "blacklistTimeoutMs",
  ROUTER_MAILBOX_CAPACITY: "mailboxCapacity",
  ROUTER_PEER_LOAD_TTL_MS: "peerLoadTtlMs",
};

function coerceEnvValue(raw: string): string | number | boolean {
  if (raw === "true" || raw === "false") {
    return raw === "true";
  }
  const numeric = Number(raw);
  return raw.trim() !== "" && Number.isFinite(numeric) ? numeric : raw;
}

/**
 * Reads `ROUTER_*` variables, then validates them merged with the defaults
 * and any explicit overrides (which win over the environment).
 */
export function routerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<RouterConfig> = {},
): RouterConfig {
  const fromEnv: Record<string, string | number | boolean> = {};
  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw !== undefined) {
      fromEnv[key] = coerceEnvValue(raw);
    }
  }

  const parsed = routerConfigSchema.safeParse({
    ...DEFAULT_ROUTER_CONFIG,
    ...fromEnv,
    ...overrides,
  });
  if (!parsed.success) {
    throw new ConfigurationError("Invalid router configuration", formatIssues(parsed.error));
  }
  return parsed.data;
}
