// test/distribution.test.ts

import { describe, it, expect } from "vitest";
import { ownedInstances, ownerOf } from "../src";
import { makeInstance } from "./fixtures";

const instances = Array.from({ length: 40 }, (_, i) => makeInstance(`i-${i}`));

describe("instance distribution", () => {
  it("should partition instances over the members", () => {
    const members = ["r1", "r2", "r3"];
    const slices = members.map((routerId) => ownedInstances(instances, routerId, members));

    const assigned = slices.flat().map((instance) => instance.id).sort();
    expect(assigned).toEqual(instances.map((instance) => instance.id).sort());
    expect(new Set(assigned).size).toBe(instances.length);
  });

  it("should not depend on member order", () => {
    for (const instance of instances) {
      expect(ownerOf(instance.id, ["r1", "r2", "r3"])).toBe(ownerOf(instance.id, ["r3", "r1", "r2"]));
    }
  });

  it("should only move the departed router's instances", () => {
    const before = ["r1", "r2", "r3"];
    const after = ["r1", "r2"];
    for (const instance of instances) {
      const owner = ownerOf(instance.id, before);
      if (owner !== "r3") {
        expect(ownerOf(instance.id, after)).toBe(owner);
      }
    }
  });

  it("should give everything to a lone router", () => {
    expect(ownedInstances(instances, "r1", ["r1"])).toHaveLength(instances.length);
    expect(ownedInstances(instances, "r1", [])).toHaveLength(instances.length);
  });

  it("should have no owner without members", () => {
    expect(ownerOf("i-1", [])).toBeUndefined();
  });
});
