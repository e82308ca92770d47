import { vi } from "vitest";
import {
  createConfig,
  formatResultLine,
  Logger,
  type Result,
} from "@reachcheck/connectivity";
import type { CommandExecutor, CommandOutput } from "../src/exec.js";
import type { DockerProbeConfig } from "../src/config.js";

export const dockerConfig: DockerProbeConfig = {
  dockerBinary: "docker",
  probeBinary: "/test-connection",
};

export const silentLogger = new Logger(
  createConfig({ processEnv: {}, silent: true }),
);

export function createExecutor(output: Partial<CommandOutput> = {}) {
  return vi.fn<CommandExecutor>(async () => ({
    exitCode: 0,
    stdout: "",
    stderr: "",
    ...output,
  }));
}

export function sampleResult(): Result {
  const timestamp = new Date("2024-01-01T00:00:00Z");
  return {
    lastResponse: {
      timestamp,
      sourceAddr: "10.65.0.2:40000",
      serverAddr: "10.65.1.3:8055",
      request: {
        timestamp,
        id: "req-1",
        payload: "ping:abc~0",
        sendSize: 0,
        responseSize: 0,
      },
    },
    stats: { requestsSent: 1, responsesReceived: 1 },
    clientMTU: { start: 0, end: 0 },
  };
}

export function resultOutput(result: Result = sampleResult()): string {
  return `probing...\n${formatResultLine(result)}`;
}
