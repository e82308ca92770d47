import type { Protocol } from "./config.js";
import type { ProbeOptions } from "./endpoint.js";
import type { Expectation } from "./expectation.js";
import type { Logger } from "./logger.js";
import { describeActual } from "./report.js";
import type { Result } from "./result.js";

export interface DispatchOptions {
  protocol: Protocol;
  checkSNAT: boolean;
  logger: Logger;
}

/**
 * One iteration's observations. Every array is indexed like the expectations
 * that produced it.
 */
export interface Dispatch {
  results: (Result | null)[];
  pretty: string[];
  /** The error a probe threw, if it threw. */
  faults: (Error | undefined)[];
}

function probeOptions(expectation: Expectation): ProbeOptions {
  const options: ProbeOptions = {
    durationMs: expectation.expectedPacketLoss.durationMs,
  };
  if (expectation.sendLen > 0 || expectation.recvLen > 0) {
    options.sendLen = expectation.sendLen;
    options.recvLen = expectation.recvLen;
  }
  return options;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

/**
 * Runs every expectation's probe at once and waits for all of them. A probe
 * that throws is recorded as a fault and counts as "could not connect"; the
 * other probes still complete.
 */
export async function dispatchProbes(
  expectations: readonly Expectation[],
  options: DispatchOptions,
): Promise<Dispatch> {
  const { protocol, checkSNAT, logger } = options;
  const results = new Array<Result | null>(expectations.length).fill(null);
  const pretty = new Array<string>(expectations.length).fill("");
  const faults = new Array<Error | undefined>(expectations.length).fill(
    undefined,
  );

  const settled = await Promise.allSettled(
    expectations.map(async (expectation, i) => {
      const result = await expectation.from.canConnectTo(
        expectation.to.ip,
        expectation.to.port,
        expectation.to.protocol ?? protocol,
        probeOptions(expectation),
      );
      results[i] = result;
      pretty[i] = describeActual(expectation, result, checkSNAT);
    }),
  );

  settled.forEach((outcome, i) => {
    const expectation = expectations[i];
    if (outcome.status === "fulfilled" || !expectation) return;
    const fault = toError(outcome.reason);
    faults[i] = fault;
    results[i] = null;
    pretty[i] = describeActual(expectation, null, checkSNAT, fault);
    logger.error(
      `Probe ${expectation.from.sourceName()} -> ${expectation.to.targetName} faulted:`,
      fault,
    );
  });

  logger.debug("Connectivity", pretty);
  return { results, pretty, faults };
}
