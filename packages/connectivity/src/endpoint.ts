/**
 * Endpoint capabilities.
 *
 * A source can run a probe; a target can describe where a probe should go.
 * Workloads and containers are usually both, a bare IP is only a target.
 */

import type { Protocol } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { Result } from "./result.js";

export interface ProbeOptions {
  /** Length of a timed (packet loss) run; 0 for a single exchange. */
  durationMs?: number;
  /** Extra bytes sent on top of the request. */
  sendLen?: number;
  /** Extra bytes requested on top of the response. */
  recvLen?: number;
  sourceIP?: string;
  sourcePort?: number;
  namespacePath?: string;
}

export interface ConnectionSource {
  /** Resolves to null when the source could not connect. */
  canConnectTo(
    ip: string,
    port: number,
    protocol: Protocol,
    options?: ProbeOptions,
  ): Promise<Result | null>;
  sourceName(): string;
  sourceIPs(): string[];
}

/**
 * A resolved probe destination.
 */
export interface Matcher {
  ip: string;
  port: number;
  targetName: string;
  /** Overrides the checker's protocol when set. */
  protocol?: Protocol;
}

export interface ConnectionTarget {
  toMatcher(...explicitPort: number[]): Matcher;
}

export function isConnectionSource(value: unknown): value is ConnectionSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "canConnectTo" in value &&
    typeof value.canConnectTo === "function" &&
    "sourceName" in value &&
    typeof value.sourceName === "function" &&
    "sourceIPs" in value &&
    typeof value.sourceIPs === "function"
  );
}

export function isConnectionTarget(value: unknown): value is ConnectionTarget {
  return (
    typeof value === "object" &&
    value !== null &&
    "toMatcher" in value &&
    typeof value.toMatcher === "function"
  );
}

/**
 * A raw address. There is no sensible default port for one, so exactly one
 * explicit port is required.
 */
export class TargetIP implements ConnectionTarget {
  readonly ip: string;

  constructor(ip: string) {
    this.ip = ip;
  }

  toMatcher(...explicitPort: number[]): Matcher {
    const [port] = explicitPort;
    if (explicitPort.length !== 1 || port === undefined) {
      throw new ConfigurationError(
        "Explicit port needed with IP as a connectivity target",
      );
    }
    return {
      ip: this.ip,
      port,
      targetName: `${this.ip}:${port}`,
    };
  }

  toString(): string {
    return this.ip;
  }
}
