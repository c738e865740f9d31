// src/handlers.ts

import { z } from "zod";
import { formatIssues } from "./config";
import { Router } from "./create_router";
import { BadRequestError, RouterError, TimeoutError, toError } from "./errors";
import { INTERSTITIAL_PATH_PREFIX, InterstitialRequest, renderInterstitialPage } from "./interstitial";
import { createLogger } from "./logger";
import { offerRequestSchema } from "./router_rpc";

/**
 * Framework-neutral response. The HTTP layer serializes `body` as JSON,
 * except for string bodies, which are sent as they are.
 */
export interface HandlerResponse {
  status: number;
  headers?: Record<string, string>;
  body: unknown;
}

const log = createLogger("Handlers");

const nonBlank = z.string().trim().min(1);

const blacklistRequestSchema = z.object({
  instance: z.object({ id: nonBlank, serviceId: nonBlank }).passthrough(),
  periodInMs: z.number().int().nonnegative(),
  reason: nonBlank,
});

const workStealingRequestSchema = offerRequestSchema.omit({ type: true });

function json(body: unknown, status = 200): HandlerResponse {
  return { status, body };
}

/**
 * Maps an error to a response: router errors answer with their own status
 * and code, anything else with 500.
 */
export function errorToResponse(err: unknown, message?: string): HandlerResponse {
  if (err instanceof RouterError) {
    return json(
      {
        error: {
          message: message ?? err.message,
          code: err.code,
          details: err.message,
          ...err.context,
        },
      },
      err.status,
    );
  }
  const error = toError(err);
  log.error(message ?? "Request failed", error);
  return json({ error: { message: message ?? error.message, code: "INTERNAL_ERROR" } }, 500);
}

/**
 * Blacklists an instance at this router.
 * Body: `{ instance: { id, serviceId, ... }, periodInMs, reason }`.
 */
export async function blacklistInstanceHandler(router: Router, body: unknown): Promise<HandlerResponse> {
  const parsed = blacklistRequestSchema.safeParse(body);
  if (!parsed.success) {
    return json(
      {
        message: "Must provide the service-id, the instance id, the reason, and a positive period",
        issues: formatIssues(parsed.error),
        inputData: body,
      },
      400,
    );
  }

  const { instance, periodInMs, reason } = parsed.data;
  let status: string;
  try {
    status = await router.blacklistInstance(instance.serviceId, instance.id, periodInMs, reason);
  } catch (err) {
    if (!(err instanceof TimeoutError)) {
      return errorToResponse(err, "Blacklisting instance failed.");
    }
    status = "timeout";
  }

  if (status === "blacklisted") {
    log.info("Blacklisted instance", { serviceId: instance.serviceId, instanceId: instance.id, reason });
    return json({ instanceId: instance.id, blacklistPeriod: periodInMs });
  }
  log.warn("Unable to blacklist instance", { serviceId: instance.serviceId, instanceId: instance.id, status });
  return json(
    { message: "Unable to blacklist instance.", instanceId: instance.id, reason: status },
    status === "in-use" ? 423 : 503,
  );
}

export async function blacklistedInstancesHandler(
  router: Router,
  serviceId: string | undefined,
): Promise<HandlerResponse> {
  if (serviceId === undefined || serviceId.trim() === "") {
    return errorToResponse(new BadRequestError("Missing service-id!"));
  }
  try {
    const state = await router.queryState(serviceId);
    const blacklistedInstances = Object.keys(state.blacklistedInstances);
    log.debug("Blacklisted instances", { serviceId, count: blacklistedInstances.length });
    return json({ blacklistedInstances });
  } catch (err) {
    return errorToResponse(err);
  }
}

/**
 * Receives a peer's work-stealing offer.
 * Body: `{ cid, requestId, routerId, serviceId, instance }`.
 */
export async function workStealingHandler(router: Router, body: unknown): Promise<HandlerResponse> {
  const parsed = workStealingRequestSchema.safeParse(body);
  if (!parsed.success) {
    const error = new BadRequestError(
      "Missing one of cid, instance, request-id, router-id or service-id!",
      formatIssues(parsed.error),
    );
    return errorToResponse(error);
  }

  const offer = parsed.data;
  log.info("Received work-stealing offer", {
    cid: offer.cid,
    instanceId: offer.instance.id,
    serviceId: offer.serviceId,
    peerId: offer.routerId,
  });
  try {
    const responseStatus = await router.offerInstance(offer.serviceId, offer);
    return json({
      cid: offer.cid,
      requestId: offer.requestId,
      routerId: offer.routerId,
      serviceId: offer.serviceId,
      responseStatus,
    });
  } catch (err) {
    return errorToResponse(err);
  }
}

export async function serviceStateHandler(router: Router, serviceId: string | undefined): Promise<HandlerResponse> {
  if (serviceId === undefined || serviceId.trim() === "") {
    return errorToResponse(new BadRequestError("Missing service-id!"));
  }
  try {
    const state = await router.queryServiceState(serviceId);
    return json({ routerId: router.routerId, state });
  } catch (err) {
    return errorToResponse(err);
  }
}

export async function interstitialStateHandler(router: Router): Promise<HandlerResponse> {
  try {
    return json({ routerId: router.routerId, state: await router.queryAllInterstitialState() });
  } catch (err) {
    return errorToResponse(err);
  }
}

export type RequestHandlerFn = (request: InterstitialRequest) => Promise<HandlerResponse>;

/**
 * Sends browsers to the holding page while their service starts; every
 * other request reaches `handler`, with the bypass parameter stripped.
 */
export function wrapInterstitial(router: Router, handler: RequestHandlerFn): RequestHandlerFn {
  return async (request) => {
    const decision = router.evaluateInterstitial(request);
    if (decision.action === "redirect") {
      return { status: decision.status, headers: decision.headers, body: "" };
    }
    return handler({ ...request, queryString: decision.queryString });
  };
}

export interface DisplayInterstitialRequest {
  serviceId: string;
  /** Request path, starting with the interstitial prefix. */
  uri: string;
  queryString?: string;
}

/**
 * Renders the holding page for a path under the interstitial prefix.
 */
export function displayInterstitialHandler(router: Router, request: DisplayInterstitialRequest): HandlerResponse {
  if (!request.uri.startsWith(INTERSTITIAL_PATH_PREFIX)) {
    return errorToResponse(new BadRequestError(`Not an interstitial path: ${request.uri}`));
  }
  const body = renderInterstitialPage({
    serviceId: request.serviceId,
    description: router.describeService(request.serviceId),
    path: request.uri.slice(INTERSTITIAL_PATH_PREFIX.length),
    queryString: request.queryString,
  });
  return { status: 200, headers: { "content-type": "text/html; charset=utf-8" }, body };
}
