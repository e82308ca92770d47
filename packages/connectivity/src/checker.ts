import { createConfig, type Config, type Protocol } from "./config.js";
import { dispatchProbes, type Dispatch } from "./dispatch.js";
import {
  isConnectionSource,
  isConnectionTarget,
  type ConnectionSource,
  type ConnectionTarget,
} from "./endpoint.js";
import { ConfigurationError, ConnectivityError } from "./errors.js";
import {
  createExpectation,
  expectWithLoss,
  expectWithSrcIPs,
  type Expectation,
  type ExpectationOption,
} from "./expectation.js";
import { Logger } from "./logger.js";
import { expectationMatches } from "./match.js";
import { CheckerRegistry, unactivatedCheckers } from "./registry.js";
import {
  describeExpected,
  EXPECTED_MARKER,
  formatFailureMessage,
  WRONG_MARKER,
} from "./report.js";

/** Attempts made before giving up, however short the timeout. */
const MIN_ATTEMPTS = 2;
const MIN_EXPLICIT_TIMEOUT_MS = 100;

export interface CheckerOptions {
  config?: Config;
  logger?: Logger;
  registry?: CheckerRegistry;
}

/**
 * Records connectivity expectations and checks them against what the
 * sources actually observe:
 *
 *     const cc = new Checker();
 *     cc.expectNone(w[2], w[0], 1234);
 *     cc.expectSome(w[1], w[0], 5678);
 *     await cc.checkConnectivity();
 *
 * Registration is not safe to interleave with a running check.
 */
export class Checker {
  /** Swap source and target at registration time. */
  reverseDirection = false;
  protocol: Protocol;
  checkSNAT = false;
  retriesDisabled = false;
  /** Called instead of throwing when a check fails. */
  onFail?: (message: string) => void;

  readonly config: Config;
  readonly logger: Logger;
  private readonly registry: CheckerRegistry;
  private expectations: Expectation[] = [];

  constructor(options: CheckerOptions = {}) {
    this.config = options.config ?? createConfig();
    this.logger = options.logger ?? new Logger(this.config);
    this.registry = options.registry ?? unactivatedCheckers;
    this.protocol = this.config.protocol;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  expectSome(
    from: ConnectionSource,
    to: ConnectionTarget,
    ...explicitPort: number[]
  ): void {
    this.expect(true, from, to, explicitPort);
  }

  expectSNAT(
    from: ConnectionSource,
    srcIP: string,
    to: ConnectionTarget,
    ...explicitPort: number[]
  ): void {
    this.checkSNAT = true;
    this.expect(true, from, to, explicitPort, [expectWithSrcIPs(srcIP)]);
  }

  expectNone(
    from: ConnectionSource,
    to: ConnectionTarget,
    ...explicitPort: number[]
  ): void {
    this.expect(false, from, to, explicitPort);
  }

  /**
   * Expects connectivity with the details given by `options`; a superset of
   * {@link expectSome}.
   */
  expectConnectivity(
    from: ConnectionSource,
    to: ConnectionTarget,
    ports: number[],
    ...options: ExpectationOption[]
  ): void {
    this.expect(true, from, to, ports, options);
  }

  /**
   * Expects a timed run with bounded loss. A loss measurement is a single
   * run, so this turns retries off for the whole checker.
   */
  expectLoss(
    from: ConnectionSource,
    to: ConnectionTarget,
    durationMs: number,
    maxPercent: number,
    maxNumber: number,
    ...explicitPort: number[]
  ): void {
    const lossOption = expectWithLoss(durationMs, maxPercent, maxNumber);
    this.retriesDisabled = true;
    this.expect(true, from, to, explicitPort, [lossOption]);
  }

  private expect(
    connectivity: boolean,
    from: ConnectionSource,
    to: ConnectionTarget,
    explicitPort: number[],
    options: ExpectationOption[] = [],
  ): void {
    this.registry.add(this);

    let source = from;
    let target = to;
    if (this.reverseDirection) {
      if (!isConnectionSource(to) || !isConnectionTarget(from)) {
        throw new ConfigurationError(
          "Reversed checks need a target that can probe and a source that can be probed",
        );
      }
      source = to;
      target = from;
    }

    this.expectations.push(
      createExpectation(
        connectivity,
        source,
        target.toMatcher(...explicitPort),
        options,
      ),
    );
  }

  resetExpectations(): void {
    this.expectations = [];
    this.checkSNAT = false;
    this.retriesDisabled = false;
  }

  get recordedExpectations(): readonly Expectation[] {
    return this.expectations;
  }

  // ==========================================================================
  // Probing
  // ==========================================================================

  /**
   * Probes every recorded expectation once, concurrently. The returned
   * arrays line up with the expectations in registration order.
   */
  async actualConnectivity(): Promise<Dispatch> {
    this.registry.discard(this);
    return dispatchProbes(this.expectations, {
      protocol: this.protocol,
      checkSNAT: this.checkSNAT,
      logger: this.logger,
    });
  }

  expectedConnectivityPretty(): string[] {
    return this.expectations.map((expectation) =>
      describeExpected(expectation, this.checkSNAT),
    );
  }

  // ==========================================================================
  // Checking
  // ==========================================================================

  async checkConnectivity(description?: string): Promise<void> {
    await this.checkConnectivityWithTimeoutOffset(
      2,
      this.config.timeoutMs,
      description,
    );
  }

  async checkConnectivityOffset(
    offset: number,
    description?: string,
  ): Promise<void> {
    await this.checkConnectivityWithTimeoutOffset(
      offset + 2,
      this.config.timeoutMs,
      description,
    );
  }

  /** Loss checks are never retried, so no timeout applies. */
  async checkConnectivityPacketLoss(description?: string): Promise<void> {
    await this.checkConnectivityWithTimeoutOffset(2, 0, description);
  }

  async checkConnectivityWithTimeout(
    timeoutMs: number,
    description?: string,
  ): Promise<void> {
    if (!(timeoutMs > MIN_EXPLICIT_TIMEOUT_MS)) {
      throw new ConfigurationError(
        `Very low timeout (${timeoutMs}ms), did you mean to pass milliseconds?`,
      );
    }
    await this.checkConnectivityWithTimeoutOffset(2, timeoutMs, description);
  }

  /**
   * Probes until every expectation matches. Keeps going while retries are
   * enabled and the timeout has not elapsed, and always makes at least two
   * attempts so one slow first probe cannot fail the check on its own.
   * Elapsed time is sampled before the attempt floor on every pass.
   */
  async checkConnectivityWithTimeoutOffset(
    callerSkip: number,
    timeoutMs: number,
    description?: string,
  ): Promise<void> {
    const start = Date.now();
    let completedAttempts = 0;
    let actualPretty: string[] = [];
    let expectedPretty: string[] = [];

    while (
      (!this.retriesDisabled && Date.now() - start < timeoutMs) ||
      completedAttempts < MIN_ATTEMPTS
    ) {
      const { results, pretty, faults } = await this.actualConnectivity();
      actualPretty = pretty;
      expectedPretty = this.expectedConnectivityPretty();

      let failed = faults.some((fault) => fault !== undefined);
      this.expectations.forEach((expectation, i) => {
        if (!expectationMatches(expectation, results[i] ?? null, this.checkSNAT)) {
          failed = true;
          actualPretty[i] += WRONG_MARKER;
          expectedPretty[i] += EXPECTED_MARKER;
        }
      });

      completedAttempts++;
      if (!failed) {
        this.logger.debug(
          `Connectivity correct after ${completedAttempts} attempt(s)`,
        );
        return;
      }
    }

    this.logger.warn(
      `Connectivity still incorrect after ${completedAttempts} attempt(s)`,
    );
    this.fail(
      formatFailureMessage(actualPretty, expectedPretty, description),
      callerSkip,
    );
  }

  private fail(message: string, callerSkip: number): void {
    if (this.onFail) {
      this.onFail(message);
      return;
    }
    throw new ConnectivityError(message, callerSkip, this.fail);
  }
}
