import { describe, it, expect } from "vitest";
import { ConfigurationError, createConfig } from "../src/index.js";

describe("createConfig", () => {
  it("uses defaults with an empty environment", () => {
    expect(createConfig({ processEnv: {} })).toEqual({
      timeoutMs: 10_000,
      protocol: "tcp",
      silent: false,
      verbose: false,
    });
  });

  it("reads the environment", () => {
    const config = createConfig({
      processEnv: {
        CONNECTIVITY_TIMEOUT_MS: "2500",
        CONNECTIVITY_PROTOCOL: "udp",
        CONNECTIVITY_SILENT: "1",
        CONNECTIVITY_VERBOSE: "true",
      },
    });
    expect(config).toEqual({
      timeoutMs: 2500,
      protocol: "udp",
      silent: true,
      verbose: true,
    });
  });

  it("prefers explicit overrides", () => {
    const config = createConfig({
      processEnv: { CONNECTIVITY_PROTOCOL: "udp" },
      protocol: "sctp",
      silent: true,
    });
    expect(config.protocol).toBe("sctp");
    expect(config.silent).toBe(true);
  });

  it("rejects an unknown protocol", () => {
    expect(() =>
      createConfig({ processEnv: { CONNECTIVITY_PROTOCOL: "icmp" } }),
    ).toThrow(ConfigurationError);
  });

  it("rejects a non-numeric timeout", () => {
    expect(() =>
      createConfig({ processEnv: { CONNECTIVITY_TIMEOUT_MS: "soon" } }),
    ).toThrow(ConfigurationError);
  });
});
