import { describe, it, expect } from "vitest";
import { assertAllCheckersActivated, CheckerRegistry } from "../src/index.js";

describe("CheckerRegistry", () => {
  it("tracks additions and discards", () => {
    const registry = new CheckerRegistry();
    const a = {};
    const b = {};
    registry.add(a);
    registry.add(a);
    registry.add(b);
    expect(registry.size).toBe(2);
    registry.discard(a);
    expect(registry.has(a)).toBe(false);
    expect(registry.entries()).toEqual([b]);
  });

  it("ignores discarding an unknown checker", () => {
    const registry = new CheckerRegistry();
    registry.discard({});
    expect(registry.size).toBe(0);
  });
});

describe("assertAllCheckersActivated", () => {
  it("passes when every checker ran", () => {
    expect(() => assertAllCheckersActivated(new CheckerRegistry())).not.toThrow();
  });

  it("reports leaked checkers once", () => {
    const registry = new CheckerRegistry();
    registry.add({});
    expect(() => assertAllCheckersActivated(registry)).toThrow(
      "1 connectivity checker(s) recorded expectations but never checked them",
    );
    expect(registry.size).toBe(0);
  });
});
