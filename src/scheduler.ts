// src/scheduler.ts

import { EventEmitter } from "events";
import { z } from "zod";
import { formatIssues } from "./config";
import { ComponentHealth, HealthCheckable } from "./health";
import { Logger, createLogger } from "./logger";
import { ServiceInstance, serviceInstanceSchema } from "./service_instance";

const instancesByService = z.record(z.string(), z.array(serviceInstanceSchema));

export const schedulerStateSchema = z
  .object({
    availableServiceIds: z.array(z.string().min(1)),
    serviceIdToHealthyInstances: instancesByService,
    serviceIdToUnhealthyInstances: instancesByService,
    serviceIdToKilledInstances: instancesByService.default({}),
    time: z.number(),
  })
  .superRefine((state, ctx) => {
    for (const [field, byService] of [
      ["serviceIdToHealthyInstances", state.serviceIdToHealthyInstances],
      ["serviceIdToUnhealthyInstances", state.serviceIdToUnhealthyInstances],
      ["serviceIdToKilledInstances", state.serviceIdToKilledInstances],
    ] as const) {
      for (const [serviceId, instances] of Object.entries(byService)) {
        instances.forEach((instance, index) => {
          if (instance.serviceId !== serviceId) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [field, serviceId, index, "serviceId"],
              message: `instance ${instance.id} belongs to ${instance.serviceId}`,
            });
          }
        });
      }
    }
  });

/**
 * A point-in-time view of every service the scheduler knows about.
 */
export type SchedulerState = z.infer<typeof schedulerStateSchema>;

/**
 * The orchestrator-facing collaborator. Retries against the orchestrator
 * are its concern; the router only sees the resulting snapshots.
 */
export interface Scheduler {
  getSchedulerState(): Promise<SchedulerState>;

  /**
   * Told when an instance is blacklisted with reason "killed".
   */
  processInstanceKilled?(instance: ServiceInstance): void | Promise<void>;
}

export type SchedulerStateListener = (state: SchedulerState) => void;

/**
 * Read-only fan-out of scheduler snapshots. Snapshots are validated on the
 * way in; a malformed one is logged and dropped, leaving subscribers on the
 * previous state.
 */
export class SchedulerStateBroadcaster {
  private readonly emitter = new EventEmitter();
  private readonly log: Logger;
  private latestState?: SchedulerState;

  constructor(routerId?: string) {
    this.log = createLogger("SchedulerStateBroadcaster", routerId);
    this.emitter.setMaxListeners(0);
  }

  /**
   * Returns an unsubscribe function. A late subscriber receives the latest
   * snapshot straight away.
   */
  subscribe(listener: SchedulerStateListener): () => void {
    const wrapped = (state: SchedulerState) => {
      try {
        listener(state);
      } catch (err) {
        this.log.error("Scheduler state listener failed", err);
      }
    };
    this.emitter.on("state", wrapped);
    if (this.latestState) {
      wrapped(this.latestState);
    }
    return () => {
      this.emitter.off("state", wrapped);
    };
  }

  publish(raw: unknown): boolean {
    const parsed = schedulerStateSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn("Ignoring malformed scheduler state", {
        issues: formatIssues(parsed.error).join("; "),
      });
      return false;
    }
    this.latestState = parsed.data;
    this.emitter.emit("state", parsed.data);
    return true;
  }

  latest(): SchedulerState | undefined {
    return this.latestState;
  }
}

export interface SchedulerSyncerConfig {
  intervalSecs: number;
}

/**
 * Polls the scheduler and publishes each snapshot. A failed poll is logged
 * and the previous snapshot stays in effect.
 */
export class SchedulerSyncer implements HealthCheckable {
  private timer?: NodeJS.Timeout;
  private inFlight = false;
  private lastSuccessAt?: number;
  private consecutiveFailures = 0;
  private readonly log: Logger;

  constructor(
    private readonly scheduler: Scheduler,
    private readonly broadcaster: SchedulerStateBroadcaster,
    private readonly config: SchedulerSyncerConfig,
    routerId?: string,
    private readonly clock: () => number = Date.now,
  ) {
    this.log = createLogger("SchedulerSyncer", routerId);
  }

  start(): void {
    if (this.timer) {
      return;
    }
    void this.syncOnce();
    this.timer = setInterval(() => {
      void this.syncOnce();
    }, this.config.intervalSecs * 1000);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Fetches and publishes one snapshot. Overlapping polls are skipped.
   */
  async syncOnce(): Promise<boolean> {
    if (this.inFlight) {
      return false;
    }
    this.inFlight = true;
    try {
      const state = await this.scheduler.getSchedulerState();
      const published = this.broadcaster.publish(state);
      if (published) {
        this.lastSuccessAt = this.clock();
        this.consecutiveFailures = 0;
      } else {
        this.consecutiveFailures++;
      }
      return published;
    } catch (err) {
      this.consecutiveFailures++;
      this.log.error("Failed to fetch scheduler state", err, {
        consecutiveFailures: this.consecutiveFailures,
      });
      return false;
    } finally {
      this.inFlight = false;
    }
  }

  getHealth(): ComponentHealth {
    const status =
      this.consecutiveFailures === 0 ? "healthy" : this.consecutiveFailures < 3 ? "degraded" : "unhealthy";
    return {
      name: "SchedulerSyncer",
      status,
      details: {
        running: this.timer !== undefined,
        lastSuccessAt: this.lastSuccessAt,
        consecutiveFailures: this.consecutiveFailures,
      },
    };
  }
}
