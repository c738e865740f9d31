// src/health.ts

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface ComponentHealth {
  name: string;
  status: HealthStatus;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Health of a whole router: the worst status of its components.
 */
export interface HealthReport {
  status: HealthStatus;
  timestamp: Date;
  routerId: string;
  components: ComponentHealth[];
  uptimeMs: number;
}

export interface HealthCheckable {
  getHealth(): ComponentHealth | Promise<ComponentHealth>;
}

export function isHealthCheckable(value: object): value is HealthCheckable {
  return "getHealth" in value && typeof value.getHealth === "function";
}

const SEVERITY: Record<HealthStatus, number> = {
  healthy: 0,
  degraded: 1,
  unhealthy: 2,
};

/**
 * Returns the worst of the given statuses (healthy when empty).
 */
export function combineHealthStatus(statuses: HealthStatus[]): HealthStatus {
  return statuses.reduce<HealthStatus>(
    (worst, status) => (SEVERITY[status] > SEVERITY[worst] ? status : worst),
    "healthy",
  );
}

/**
 * Collects health from the router's registered components. A component whose
 * check throws is reported as unhealthy instead of failing the report.
 */
export class HealthAggregator {
  private readonly startTime: number;
  private readonly components = new Map<string, HealthCheckable>();

  constructor(
    private readonly routerId: string,
    private readonly clock: () => number = Date.now,
  ) {
    this.startTime = clock();
  }

  register(name: string, component: HealthCheckable): void {
    this.components.set(name, component);
  }

  unregister(name: string): void {
    this.components.delete(name);
  }

  async getHealth(): Promise<HealthReport> {
    const components = await Promise.all(
      Array.from(this.components.entries()).map(async ([name, component]) => {
        try {
          return await component.getHealth();
        } catch (err) {
          const health: ComponentHealth = {
            name,
            status: "unhealthy",
            message: `Health check failed: ${err instanceof Error ? err.message : String(err)}`,
          };
          return health;
        }
      }),
    );

    return {
      status: combineHealthStatus(components.map((c) => c.status)),
      timestamp: new Date(this.clock()),
      routerId: this.routerId,
      components,
      uptimeMs: this.clock() - this.startTime,
    };
  }

  async isReady(): Promise<boolean> {
    const report = await this.getHealth();
    return report.status !== "unhealthy";
  }
}
