import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  isConnectionSource,
  isConnectionTarget,
  TargetIP,
} from "../src/index.js";
import { FakeWorkload } from "./utils.js";

describe("TargetIP", () => {
  it("resolves with the explicit port", () => {
    expect(new TargetIP("10.0.0.9").toMatcher(8080)).toEqual({
      ip: "10.0.0.9",
      port: 8080,
      targetName: "10.0.0.9:8080",
    });
  });

  it("leaves the protocol to the checker", () => {
    expect(new TargetIP("10.0.0.9").toMatcher(53).protocol).toBeUndefined();
  });

  it("requires a port", () => {
    expect(() => new TargetIP("10.0.0.9").toMatcher()).toThrow(
      ConfigurationError,
    );
  });

  it("rejects more than one port", () => {
    expect(() => new TargetIP("10.0.0.9").toMatcher(80, 443)).toThrow(
      "Explicit port needed with IP as a connectivity target",
    );
  });
});

describe("capability checks", () => {
  it("recognises an endpoint with both roles", () => {
    const workload = new FakeWorkload("w", "10.0.0.1");
    expect(isConnectionSource(workload)).toBe(true);
    expect(isConnectionTarget(workload)).toBe(true);
  });

  it("treats a bare IP as a target only", () => {
    const ip = new TargetIP("10.0.0.9");
    expect(isConnectionSource(ip)).toBe(false);
    expect(isConnectionTarget(ip)).toBe(true);
  });

  it("rejects non-objects", () => {
    expect(isConnectionSource("10.0.0.1")).toBe(false);
    expect(isConnectionTarget(null)).toBe(false);
  });
});
