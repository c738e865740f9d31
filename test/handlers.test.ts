// test/handlers.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  BadRequestError,
  InMemoryServiceDescriptionStore,
  Router,
  blacklistInstanceHandler,
  blacklistedInstancesHandler,
  createRouter,
  displayInterstitialHandler,
  errorToResponse,
  interstitialStateHandler,
  serviceStateHandler,
  workStealingHandler,
  wrapInterstitial,
} from "../src";
import { RecordingMetrics, makeInstance, schedulerState } from "./fixtures";

describe("handlers", () => {
  let router: Router;
  let descriptions: InMemoryServiceDescriptionStore;

  beforeEach(async () => {
    descriptions = new InMemoryServiceDescriptionStore();
    router = await createRouter({ routerId: "router-1", descriptions, metrics: new RecordingMetrics() });
    router.publishSchedulerState(schedulerState({ "svc-a": { healthy: [makeInstance("i-1")] } }));
  });

  afterEach(async () => {
    await router.shutdown();
  });

  describe("errorToResponse", () => {
    it("should answer router errors with their status and code", () => {
      expect(errorToResponse(new BadRequestError("Missing service-id!"))).toEqual({
        status: 400,
        body: {
          error: { message: "Missing service-id!", code: "BAD_REQUEST", details: "Missing service-id!", issues: [] },
        },
      });
    });

    it("should answer anything else with 500", () => {
      expect(errorToResponse(new Error("boom"), "Request failed.")).toEqual({
        status: 500,
        body: { error: { message: "Request failed.", code: "INTERNAL_ERROR" } },
      });
    });
  });

  describe("blacklistInstanceHandler", () => {
    it("should blacklist an instance", async () => {
      const response = await blacklistInstanceHandler(router, {
        instance: { id: "i-1", serviceId: "svc-a", host: "127.0.0.1" },
        periodInMs: 5000,
        reason: "instance-error",
      });

      expect(response).toEqual({ status: 200, body: { instanceId: "i-1", blacklistPeriod: 5000 } });
      const blacklisted = await blacklistedInstancesHandler(router, "svc-a");
      expect(blacklisted).toEqual({ status: 200, body: { blacklistedInstances: ["i-1"] } });
    });

    it("should reject incomplete input", async () => {
      const body = { instance: { id: "i-1" }, periodInMs: -1 };

      const response = await blacklistInstanceHandler(router, body);

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        message: "Must provide the service-id, the instance id, the reason, and a positive period",
        inputData: body,
      });
    });

    it("should answer 423 for an instance serving requests", async () => {
      await router.selectInstanceForRequest("svc-a");

      const response = await blacklistInstanceHandler(router, {
        instance: { id: "i-1", serviceId: "svc-a" },
        periodInMs: 0,
        reason: "killed",
      });

      expect(response).toEqual({
        status: 423,
        body: { message: "Unable to blacklist instance.", instanceId: "i-1", reason: "in-use" },
      });
    });

    it("should answer 503 for an unknown instance", async () => {
      const response = await blacklistInstanceHandler(router, {
        instance: { id: "i-9", serviceId: "svc-a" },
        periodInMs: 0,
        reason: "killed",
      });

      expect(response).toEqual({
        status: 503,
        body: { message: "Unable to blacklist instance.", instanceId: "i-9", reason: "no-such-instance" },
      });
    });
  });

  describe("blacklistedInstancesHandler", () => {
    it("should require a service id", async () => {
      const response = await blacklistedInstancesHandler(router, " ");

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: { message: "Missing service-id!", code: "BAD_REQUEST", details: "Missing service-id!", issues: [] },
      });
    });
  });

  describe("workStealingHandler", () => {
    it("should pass a valid offer to the responder", async () => {
      const response = await workStealingHandler(router, {
        cid: "c-1",
        requestId: "req-1",
        routerId: "router-2",
        serviceId: "svc-a",
        instance: makeInstance("i-9"),
      });

      expect(response).toEqual({
        status: 200,
        body: { cid: "c-1", requestId: "req-1", routerId: "router-2", serviceId: "svc-a", responseStatus: "declined" },
      });
    });

    it("should reject an offer with missing fields", async () => {
      const response = await workStealingHandler(router, { cid: "c-1", serviceId: "svc-a" });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: { message: "Missing one of cid, instance, request-id, router-id or service-id!", code: "BAD_REQUEST" },
      });
    });
  });

  describe("state handlers", () => {
    it("should report a service's state with the router id", async () => {
      const response = await serviceStateHandler(router, "svc-a");

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        routerId: "router-1",
        state: { responderState: { serviceId: "svc-a" } },
      });
    });

    it("should report interstitial state", async () => {
      const response = await interstitialStateHandler(router);

      expect(response).toEqual({
        status: 200,
        body: {
          routerId: "router-1",
          state: {
            interstitial: { initialized: true, serviceIdToInterstitialPromise: {} },
            maintainer: { availableServiceIds: ["svc-a"] },
          },
        },
      });
    });
  });

  describe("interstitial gate", () => {
    it("should redirect browsers and let others through with the bypass stripped", async () => {
      descriptions.put("svc-b", { interstitialSecs: 5 });
      router.publishSchedulerState(schedulerState({ "svc-b": {} }));
      await router.queryAllInterstitialState();
      const backend = vi.fn(async () => ({ status: 200, body: "ok" }));
      const handler = wrapInterstitial(router, backend);

      const redirected = await handler({
        serviceId: "svc-b",
        uri: "/app",
        queryString: "a=1",
        headers: { accept: "text/html" },
      });
      expect(redirected).toEqual({
        status: 303,
        headers: { location: "/router-interstitial/app?a=1", "x-router-interstitial": "true" },
        body: "",
      });
      expect(backend).not.toHaveBeenCalled();

      await handler({
        serviceId: "svc-b",
        uri: "/app",
        queryString: "a=1&x-router-bypass-interstitial=1",
        headers: { accept: "text/html" },
      });
      expect(backend).toHaveBeenCalledWith({
        serviceId: "svc-b",
        uri: "/app",
        queryString: "a=1",
        headers: { accept: "text/html" },
      });
    });

    it("should render the holding page", () => {
      descriptions.put("svc-a", { interstitialSecs: 4, name: "Demo" });

      const response = displayInterstitialHandler(router, {
        serviceId: "svc-a",
        uri: "/router-interstitial/app/page",
        queryString: "a=1",
      });

      expect(response.status).toBe(200);
      expect(response.headers).toEqual({ "content-type": "text/html; charset=utf-8" });
      expect(response.body).toContain('href="/app/page?a=1&amp;x-router-bypass-interstitial=1"');
      expect(response.body).toContain("<title>Starting Demo</title>");
    });

    it("should refuse paths outside the interstitial prefix", () => {
      const response = displayInterstitialHandler(router, { serviceId: "svc-a", uri: "/app" });

      expect(response.status).toBe(400);
    });
  });
});
