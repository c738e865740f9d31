// src/interstitial.ts

import fs from "fs";
import path from "path";
import { Actor } from "./actor";
import { Logger, createLogger } from "./logger";
import { MetricsSink, routerMetric, serviceMetric } from "./metrics";
import { SchedulerState } from "./scheduler";
import { ServiceDescription } from "./service_description";

export type InterstitialResolution = "healthy-instance-found" | "interstitial-timeout";
export type InterstitialValue = InterstitialResolution | "not-realized";

/**
 * Must be the last query parameter; it is stripped before the request
 * continues.
 */
export const BYPASS_INTERSTITIAL_PARAM = "x-router-bypass-interstitial=1";
export const INTERSTITIAL_PATH_PREFIX = "/router-interstitial";

/**
 * Write-once readiness cell of a service.
 */
export class InterstitialPromise {
  private value?: InterstitialResolution;
  private readonly waiters = new Set<(resolution: InterstitialResolution) => void>();

  constructor(
    readonly serviceId: string,
    readonly createdAt: number,
  ) {}

  get isResolved(): boolean {
    return this.value !== undefined;
  }

  get resolution(): InterstitialResolution | undefined {
    return this.value;
  }

  /**
   * Returns false when the promise was already resolved; the first
   * resolution sticks.
   */
  resolve(resolution: InterstitialResolution): boolean {
    if (this.value !== undefined) {
      return false;
    }
    this.value = resolution;
    for (const waiter of this.waiters) {
      waiter(resolution);
    }
    this.waiters.clear();
    return true;
  }

  /**
   * The resolution, or "not-realized" when none arrives within `timeoutMs`.
   */
  wait(timeoutMs: number): Promise<InterstitialValue> {
    if (this.value !== undefined) {
      return Promise.resolve(this.value);
    }
    if (timeoutMs <= 0) {
      return Promise.resolve("not-realized");
    }
    return new Promise((resolve) => {
      const waiter = (resolution: InterstitialResolution) => {
        clearTimeout(timer);
        resolve(resolution);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(waiter);
        resolve("not-realized");
      }, timeoutMs);
      this.waiters.add(waiter);
    });
  }

  peek(): InterstitialValue {
    return this.value ?? "not-realized";
  }
}

export interface InterstitialStateOptions {
  metrics: MetricsSink;
  routerId?: string;
  clock?: () => number;
}

export interface InterstitialStateSnapshot {
  initialized: boolean;
  serviceIdToInterstitialPromise: Record<string, InterstitialValue>;
}

/**
 * The shared map of service id to interstitial promise. Entries change only
 * through compareAndSet(); readers never hold a reference across an update.
 */
export class InterstitialState {
  private readonly promises = new Map<string, InterstitialPromise>();
  private readonly timeouts = new Map<InterstitialPromise, NodeJS.Timeout>();
  private initializedFlag = false;
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(private readonly options: InterstitialStateOptions) {
    this.log = createLogger("InterstitialState", options.routerId);
    this.clock = options.clock ?? Date.now;
  }

  get initialized(): boolean {
    return this.initializedFlag;
  }

  markInitialized(): boolean {
    if (this.initializedFlag) {
      return false;
    }
    this.initializedFlag = true;
    this.log.info("Interstitial state initialized from scheduler state");
    return true;
  }

  get(serviceId: string): InterstitialPromise | undefined {
    return this.promises.get(serviceId);
  }

  /**
   * Maps `serviceId` to `next` only if it currently maps to `expected`
   * (undefined meaning absent). `next` undefined removes the entry.
   */
  compareAndSet(
    serviceId: string,
    expected: InterstitialPromise | undefined,
    next: InterstitialPromise | undefined,
  ): boolean {
    if (this.promises.get(serviceId) !== expected) {
      return false;
    }
    if (next) {
      this.promises.set(serviceId, next);
    } else {
      this.promises.delete(serviceId);
    }
    return true;
  }

  /**
   * The promise of `serviceId`, created when missing. Only the caller whose
   * candidate got installed starts the timeout.
   */
  ensure(serviceId: string, interstitialSecs: number): InterstitialPromise {
    for (let iteration = 0; ; iteration++) {
      const existing = this.promises.get(serviceId);
      if (existing) {
        return existing;
      }
      const candidate = new InterstitialPromise(serviceId, this.clock());
      if (this.compareAndSet(serviceId, undefined, candidate)) {
        this.log.info("Created interstitial promise", { serviceId });
        this.options.metrics.incCounter(routerMetric("interstitial", "counters", "promise", "total"));
        this.installTimeout(candidate, interstitialSecs);
        return candidate;
      }
      this.log.debug("Interstitial promise changed concurrently, retrying", { serviceId, iteration });
    }
  }

  private installTimeout(promise: InterstitialPromise, interstitialSecs: number): void {
    if (interstitialSecs <= 0) {
      this.log.error("Service opted out of interstitial, not installing timeout", undefined, {
        serviceId: promise.serviceId,
      });
      return;
    }
    const timer = setTimeout(() => {
      this.timeouts.delete(promise);
      this.resolvePromise(promise, "interstitial-timeout");
    }, interstitialSecs * 1000);
    timer.unref();
    this.timeouts.set(promise, timer);
  }

  /**
   * Resolves the current promise of `serviceId`, if any.
   */
  resolve(serviceId: string, resolution: InterstitialResolution): boolean {
    const promise = this.promises.get(serviceId);
    return promise ? this.resolvePromise(promise, resolution) : false;
  }

  private resolvePromise(promise: InterstitialPromise, resolution: InterstitialResolution): boolean {
    if (!promise.resolve(resolution)) {
      return false;
    }
    const timer = this.timeouts.get(promise);
    if (timer) {
      clearTimeout(timer);
      this.timeouts.delete(promise);
    }
    this.log.info("Interstitial resolved", { serviceId: promise.serviceId, resolution });
    this.options.metrics.incCounter(routerMetric("interstitial", "counters", "promise", "resolved"));
    this.options.metrics.incCounter(routerMetric("interstitial", "counters", "resolution", resolution));
    return true;
  }

  /**
   * Drops the resolved promises of `serviceIds`; unresolved ones stay.
   * Returns the ids that no longer have a promise.
   */
  removeResolved(serviceIds: Iterable<string>): string[] {
    const gone: string[] = [];
    for (const serviceId of serviceIds) {
      const promise = this.promises.get(serviceId);
      if (promise && !promise.isResolved) {
        continue;
      }
      if (!promise || this.compareAndSet(serviceId, promise, undefined)) {
        gone.push(serviceId);
      }
    }
    return gone;
  }

  snapshot(): InterstitialStateSnapshot {
    const serviceIdToInterstitialPromise: Record<string, InterstitialValue> = {};
    for (const [serviceId, promise] of this.promises) {
      serviceIdToInterstitialPromise[serviceId] = promise.peek();
    }
    return { initialized: this.initializedFlag, serviceIdToInterstitialPromise };
  }

  /** Cancels every pending timeout. */
  dispose(): void {
    for (const timer of this.timeouts.values()) {
      clearTimeout(timer);
    }
    this.timeouts.clear();
  }
}

export type InterstitialMaintainerCast = { type: "scheduler-state"; state: SchedulerState };

export type InterstitialMaintainerCall = { type: "query-service"; serviceId: string } | { type: "query-all" };

export type InterstitialMaintainerReply =
  | { type: "service"; available: boolean; interstitial: InterstitialValue | null }
  | { type: "all"; interstitial: InterstitialStateSnapshot; maintainer: { availableServiceIds: string[] } };

export interface InterstitialMaintainerOptions {
  routerId: string;
  state: InterstitialState;
  interstitialSecsOf: (serviceId: string) => number;
  metrics: MetricsSink;
}

/**
 * Keeps the interstitial promises in step with scheduler state: creates them
 * for available services, resolves them once a healthy instance shows up and
 * purges resolved ones of services that went away.
 */
export class InterstitialMaintainer extends Actor<
  InterstitialMaintainerCast,
  InterstitialMaintainerCall,
  InterstitialMaintainerReply
> {
  private availableServiceIds = new Set<string>();
  private readonly log: Logger;

  constructor(private readonly options: InterstitialMaintainerOptions) {
    super();
    this.log = createLogger("InterstitialMaintainer", options.routerId);
  }

  handleCast(message: InterstitialMaintainerCast): void {
    switch (message.type) {
      case "scheduler-state":
        this.process(message.state);
        break;
      default:
        this.log.warn("Dropping unknown message", { message: JSON.stringify(message) });
    }
  }

  handleCall(message: InterstitialMaintainerCall): InterstitialMaintainerReply {
    const { state } = this.options;
    switch (message.type) {
      case "query-service":
        return {
          type: "service",
          available: this.availableServiceIds.has(message.serviceId),
          interstitial: state.get(message.serviceId)?.peek() ?? null,
        };
      case "query-all":
        return {
          type: "all",
          interstitial: state.snapshot(),
          maintainer: { availableServiceIds: Array.from(this.availableServiceIds).sort() },
        };
    }
  }

  private process(schedulerState: SchedulerState): void {
    const { state, interstitialSecsOf, metrics } = this.options;
    const available = new Set(schedulerState.availableServiceIds);
    const withHealthy = Object.entries(schedulerState.serviceIdToHealthyInstances)
      .filter(([, instances]) => instances.length > 0)
      .map(([serviceId]) => serviceId);

    const leaving = Array.from(this.availableServiceIds).filter((serviceId) => !available.has(serviceId));
    const removed = new Set(state.removeResolved(leaving));

    for (const serviceId of available) {
      const interstitialSecs = interstitialSecsOf(serviceId);
      if (interstitialSecs > 0) {
        state.ensure(serviceId, interstitialSecs);
      }
    }
    for (const serviceId of withHealthy) {
      state.resolve(serviceId, "healthy-instance-found");
    }

    const next = new Set<string>();
    for (const serviceId of this.availableServiceIds) {
      if (!removed.has(serviceId)) {
        next.add(serviceId);
      }
    }
    for (const serviceId of [...available, ...withHealthy]) {
      next.add(serviceId);
    }
    this.availableServiceIds = next;

    state.markInitialized();
    metrics.setCounter(routerMetric("interstitial", "counters", "available-services"), next.size);
  }
}

export interface InterstitialRequest {
  serviceId: string;
  /** Path, starting with "/". */
  uri: string;
  queryString?: string;
  headers: Record<string, string | undefined>;
  /** The service was resolved from request headers rather than a token. */
  onTheFly?: boolean;
}

export type InterstitialDecision =
  | { action: "proceed"; queryString?: string }
  | { action: "redirect"; status: 303; headers: { location: string; "x-router-interstitial": "true" } };

/**
 * Removes the trailing bypass parameter, and the separator before it.
 */
export function stripBypassParam(queryString: string): string {
  return queryString.slice(0, Math.max(0, queryString.length - BYPASS_INTERSTITIAL_PARAM.length - 1));
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

/**
 * Decides whether a request continues to the backend or is sent to the
 * holding page. A promise that timed out does not let requests through;
 * only a healthy instance or the bypass parameter does.
 */
export function evaluateInterstitial(
  request: InterstitialRequest,
  state: InterstitialState,
  interstitialSecs: number,
  metrics?: MetricsSink,
): InterstitialDecision {
  const queryString = request.queryString ?? "";
  const bypass = queryString.endsWith(BYPASS_INTERSTITIAL_PARAM);
  const accept = request.headers["accept"] ?? "";

  if (
    bypass ||
    request.onTheFly ||
    interstitialSecs === 0 ||
    !accept.includes("text/html") ||
    !state.initialized ||
    state.ensure(request.serviceId, interstitialSecs).resolution === "healthy-instance-found"
  ) {
    return {
      action: "proceed",
      queryString: bypass ? stripBypassParam(queryString) : request.queryString,
    };
  }

  metrics?.incCounter(serviceMetric(request.serviceId, "counters", "request-counts", "interstitial"));
  metrics?.markMeter(routerMetric("interstitial", "meters", "redirect"));
  const location = `${INTERSTITIAL_PATH_PREFIX}${request.uri}${isBlank(request.queryString) ? "" : `?${queryString}`}`;
  return {
    action: "redirect",
    status: 303,
    headers: { location, "x-router-interstitial": "true" },
  };
}

const TEMPLATE_PATH = path.join(__dirname, "..", "resources", "interstitial.html");
let template: string | undefined;

function loadTemplate(): string {
  template ??= fs.readFileSync(TEMPLATE_PATH, "utf8");
  return template;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function truncate(value: string, maxLength: number): string {
  return value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;
}

/**
 * Where the holding page sends the browser: the original path and query
 * with the bypass parameter appended last.
 */
export function interstitialTargetUrl(pathParam: string, queryString?: string): string {
  const pathPart = pathParam.replace(/^\/+/, "");
  const query = isBlank(queryString) ? "" : `${queryString}&`;
  return `/${pathPart}?${query}${BYPASS_INTERSTITIAL_PARAM}`;
}

export interface InterstitialPage {
  serviceId: string;
  description: ServiceDescription;
  /** The path after the interstitial prefix. */
  path: string;
  queryString?: string;
}

export function renderInterstitialPage(page: InterstitialPage): string {
  const values: Record<string, string> = {
    serviceId: page.serviceId,
    serviceName: page.description.name ?? page.serviceId,
    cmd: truncate(page.description.cmd ?? "", 100),
    interstitialSecs: String(page.description.interstitialSecs),
    targetUrl: interstitialTargetUrl(page.path, page.queryString),
  };
  return loadTemplate().replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    key in values ? escapeHtml(values[key]) : match,
  );
}
