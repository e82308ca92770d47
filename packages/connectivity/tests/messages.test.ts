import { describe, it, expect } from "vitest";
import {
  ConnConfig,
  isMessagePartOfStream,
  newRequest,
  requestsEqual,
} from "../src/index.js";

describe("ConnConfig", () => {
  const config = new ConnConfig("stream", "abc");

  it("numbers test messages", () => {
    expect(config.getTestMessage(7).payload).toBe("stream:abc~7");
  });

  it("reads the sequence back, ignoring surrounding whitespace", () => {
    expect(config.getTestMessageSequence("  stream:abc~42\n")).toBe(42);
  });

  it("rejects another connection's prefix", () => {
    expect(() => config.getTestMessageSequence("ping:abc~1")).toThrow(
      "invalid message prefix format:ping:abc~1",
    );
  });

  it("rejects a negative or non-numeric sequence", () => {
    expect(() => config.getTestMessageSequence("stream:abc~-1")).toThrow(
      "invalid message sequence format:stream:abc~-1",
    );
    expect(() => config.getTestMessageSequence("stream:abc~x")).toThrow(
      "invalid message sequence format:stream:abc~x",
    );
  });
});

describe("isMessagePartOfStream", () => {
  it("checks the connection type", () => {
    expect(isMessagePartOfStream(" stream:abc~1")).toBe(true);
    expect(isMessagePartOfStream("ping:abc~1")).toBe(false);
  });
});

describe("requests", () => {
  it("gives every request its own id", () => {
    const a = newRequest("x");
    const b = newRequest("x");
    expect(a.id).not.toBe(b.id);
    expect(requestsEqual(a, a)).toBe(true);
    expect(requestsEqual(a, b)).toBe(false);
  });
});
