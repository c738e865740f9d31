// src/service_description.ts

import { z } from "zod";
import { DistributionScheme, RouterConfig, formatIssues } from "./config";
import { BadRequestError } from "./errors";

export const serviceDescriptionSchema = z.object({
  interstitialSecs: z.number().int().nonnegative(),
  maxQueueLength: z.number().int().positive(),
  concurrencyLevel: z.number().int().positive(),
  distributionScheme: z.enum(["balanced", "simple"]),
  name: z.string().optional(),
  cmd: z.string().optional(),
});

export type ServiceDescription = z.infer<typeof serviceDescriptionSchema>;

/**
 * Read-mostly lookup of service descriptions. Values may change between
 * calls; readers re-resolve rather than cache.
 */
export interface ServiceDescriptionSource {
  get(serviceId: string): Partial<ServiceDescription> | undefined;
}

export function defaultServiceDescription(config: RouterConfig): ServiceDescription {
  return {
    interstitialSecs: config.defaultInterstitialSecs,
    maxQueueLength: config.defaultMaxQueueLength,
    concurrencyLevel: config.defaultConcurrencyLevel,
    distributionScheme: config.defaultDistributionScheme,
  };
}

/**
 * The description of `serviceId` with config defaults filled in. Fields a
 * source leaves undefined keep their default.
 */
export function resolveServiceDescription(
  source: ServiceDescriptionSource,
  serviceId: string,
  config: RouterConfig,
): ServiceDescription {
  const defaults = defaultServiceDescription(config);
  const overrides = source.get(serviceId) ?? {};
  return {
    interstitialSecs: overrides.interstitialSecs ?? defaults.interstitialSecs,
    maxQueueLength: overrides.maxQueueLength ?? defaults.maxQueueLength,
    concurrencyLevel: overrides.concurrencyLevel ?? defaults.concurrencyLevel,
    distributionScheme: overrides.distributionScheme ?? defaults.distributionScheme,
    name: overrides.name,
    cmd: overrides.cmd,
  };
}

export function allowsWorkStealing(scheme: DistributionScheme): boolean {
  return scheme === "balanced";
}

/**
 * In-process description store used by single-node setups and tests.
 */
export class InMemoryServiceDescriptionStore implements ServiceDescriptionSource {
  private readonly descriptions = new Map<string, Partial<ServiceDescription>>();

  /**
   * @throws BadRequestError when a provided field is invalid
   */
  put(serviceId: string, description: Partial<ServiceDescription>): void {
    const parsed = serviceDescriptionSchema.partial().safeParse(description);
    if (!parsed.success) {
      throw new BadRequestError(
        `Invalid service description for ${serviceId}`,
        formatIssues(parsed.error),
      );
    }
    this.descriptions.set(serviceId, parsed.data);
  }

  get(serviceId: string): Partial<ServiceDescription> | undefined {
    return this.descriptions.get(serviceId);
  }

  delete(serviceId: string): boolean {
    return this.descriptions.delete(serviceId);
  }
}
