import {
  Checker,
  CheckerRegistry,
  createConfig,
  type ConnectionSource,
  type ConnectionTarget,
  type Matcher,
  type ProbeOptions,
  type Protocol,
  type Result,
} from "../src/index.js";

export interface ProbeCall {
  ip: string;
  port: number;
  protocol: Protocol;
  options: ProbeOptions | undefined;
}

export type Responder = (call: ProbeCall) => Result | null | Promise<Result | null>;

/**
 * An in-process endpoint that answers probes with whatever `respond` returns.
 */
export class FakeWorkload implements ConnectionSource, ConnectionTarget {
  name: string;
  ip: string;
  ips: string[];
  defaultPort: number;
  calls: ProbeCall[] = [];
  respond: Responder;

  constructor(
    name: string,
    ip: string,
    respond: Responder = () => null,
    defaultPort = 8055,
  ) {
    this.name = name;
    this.ip = ip;
    this.ips = [ip];
    this.defaultPort = defaultPort;
    this.respond = respond;
  }

  async canConnectTo(
    ip: string,
    port: number,
    protocol: Protocol,
    options?: ProbeOptions,
  ): Promise<Result | null> {
    const call = { ip, port, protocol, options };
    this.calls.push(call);
    return this.respond(call);
  }

  sourceName(): string {
    return this.name;
  }

  sourceIPs(): string[] {
    return this.ips;
  }

  toMatcher(...explicitPort: number[]): Matcher {
    const port = explicitPort[0] ?? this.defaultPort;
    return { ip: this.ip, port, targetName: `${this.name}:${port}` };
  }
}

export function makeResult(
  overrides: {
    sourceAddr?: string;
    sent?: number;
    received?: number;
    mtuStart?: number;
    mtuEnd?: number;
  } = {},
): Result {
  const timestamp = new Date("2024-01-01T00:00:00Z");
  return {
    lastResponse: {
      timestamp,
      sourceAddr: overrides.sourceAddr ?? "10.0.0.1:40000",
      serverAddr: "10.0.0.2:8055",
      request: {
        timestamp,
        id: "req-1",
        payload: "hello",
        sendSize: 0,
        responseSize: 0,
      },
    },
    stats: {
      requestsSent: overrides.sent ?? 1,
      responsesReceived: overrides.received ?? 1,
    },
    clientMTU: {
      start: overrides.mtuStart ?? 0,
      end: overrides.mtuEnd ?? 0,
    },
  };
}

export const silentConfig = createConfig({ processEnv: {}, silent: true });

export function createTestChecker(
  registry: CheckerRegistry = new CheckerRegistry(),
): { checker: Checker; failures: string[]; registry: CheckerRegistry } {
  const checker = new Checker({ config: silentConfig, registry });
  const failures: string[] = [];
  checker.onFail = (message) => {
    failures.push(message);
  };
  return { checker, failures, registry };
}
