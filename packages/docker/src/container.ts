import {
  ConfigurationError,
  type ConnectionSource,
  type ConnectionTarget,
  type Matcher,
  type ProbeOptions,
  type Protocol,
  type Result,
} from "@reachcheck/connectivity";
import { check, type CheckDependencies } from "./check.js";

export interface ContainerOptions extends CheckDependencies {
  name: string;
  ip: string;
  /** Every address the container may send from; defaults to `[ip]`. */
  ips?: string[];
  /** Port used when a check names none. */
  defaultPort?: number;
  /** Overrides the checker's protocol when this container is the target. */
  protocol?: Protocol;
  namespacePath?: string;
}

/**
 * A running container that can both probe and be probed.
 */
export class Container implements ConnectionSource, ConnectionTarget {
  readonly name: string;
  readonly ip: string;
  readonly ips: string[];
  readonly defaultPort?: number;
  readonly protocol?: Protocol;
  readonly namespacePath?: string;
  private readonly deps: CheckDependencies;

  constructor(options: ContainerOptions) {
    const { name, ip, ips, defaultPort, protocol, namespacePath, ...deps } =
      options;
    this.name = name;
    this.ip = ip;
    this.ips = ips ?? [ip];
    this.defaultPort = defaultPort;
    this.protocol = protocol;
    this.namespacePath = namespacePath;
    this.deps = deps;
  }

  canConnectTo(
    ip: string,
    port: number,
    protocol: Protocol,
    options: ProbeOptions = {},
  ): Promise<Result | null> {
    const probeOptions: ProbeOptions = { ...options };
    if (this.namespacePath && probeOptions.namespacePath === undefined) {
      probeOptions.namespacePath = this.namespacePath;
    }
    return check(this.name, ip, port, protocol, probeOptions, this.deps);
  }

  sourceName(): string {
    return this.name;
  }

  sourceIPs(): string[] {
    return [...this.ips];
  }

  toMatcher(...explicitPort: number[]): Matcher {
    if (explicitPort.length > 1) {
      throw new ConfigurationError(
        `At most one explicit port may be given for ${this.name}`,
      );
    }
    const port = explicitPort[0] ?? this.defaultPort;
    if (port === undefined) {
      throw new ConfigurationError(
        `${this.name} has no default port; pass one explicitly`,
      );
    }

    const matcher: Matcher = {
      ip: this.ip,
      port,
      targetName: `${this.name}:${port}`,
    };
    if (this.protocol) {
      matcher.protocol = this.protocol;
    }
    return matcher;
  }
}
