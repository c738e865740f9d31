// src/service_instance.ts

import { z } from "zod";

export const serviceInstanceSchema = z.object({
  id: z.string().min(1),
  serviceId: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  logDirectory: z.string().optional(),
  startedAt: z.number().optional(),
});

/**
 * A running backend process of a service, as reported by the scheduler.
 * Records are immutable; a changed record replaces the old one.
 */
export type ServiceInstance = z.infer<typeof serviceInstanceSchema>;

export function instanceEndpoint(instance: ServiceInstance): string {
  return `${instance.host}:${instance.port}`;
}
