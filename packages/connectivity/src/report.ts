import type { Expectation } from "./expectation.js";
import { lost, lostPercent, sourceIP, type Result } from "./result.js";

export const WRONG_MARKER = " <---- WRONG";
export const EXPECTED_MARKER = " <---- EXPECTED";

function header(expectation: Expectation, connected: boolean): string {
  return `${expectation.from.sourceName()} -> ${expectation.to.targetName} = ${connected}`;
}

/**
 * One line per probe: what the source saw, with the details the matcher
 * looked at.
 */
export function describeActual(
  expectation: Expectation,
  result: Result | null,
  checkSNAT: boolean,
  fault?: Error,
): string {
  let line = header(expectation, result !== null);

  if (result !== null) {
    if (checkSNAT) {
      line += ` (from ${sourceIP(result.lastResponse)})`;
    }
    if (result.clientMTU.start !== 0) {
      line += ` (client MTU ${result.clientMTU.start} -> ${result.clientMTU.end})`;
    }
    if (expectation.expectedPacketLoss.durationMs > 0) {
      const { requestsSent } = result.stats;
      const pct = lostPercent(result.stats).toFixed(1);
      line += ` (sent: ${requestsSent}, lost: ${lost(result.stats)} / ${pct}%)`;
    }
  }

  if (fault) {
    line += ` (probe fault: ${fault.message})`;
  }
  return line;
}

/**
 * The expected counterpart of {@link describeActual}, so the two columns line
 * up in a failure report.
 */
export function describeExpected(
  expectation: Expectation,
  checkSNAT: boolean,
): string {
  let line = header(expectation, expectation.expected);

  if (expectation.expected) {
    if (checkSNAT) {
      line += ` (from ${expectation.expSrcIPs.join("|")})`;
    }
    if (expectation.clientMTUStart !== 0 || expectation.clientMTUEnd !== 0) {
      line += ` (client MTU ${expectation.clientMTUStart} -> ${expectation.clientMTUEnd})`;
    }
  }

  const loss = expectation.expectedPacketLoss;
  if (loss.durationMs > 0) {
    if (loss.maxNumber >= 0) {
      line += ` (maxLoss: ${loss.maxNumber} packets)`;
    }
    if (loss.maxPercent >= 0) {
      line += ` (maxLoss: ${loss.maxPercent.toFixed(1)}%)`;
    }
  }
  return line;
}

export function formatFailureMessage(
  actual: string[],
  expected: string[],
  description?: string,
): string {
  const message = [
    "Connectivity was incorrect:",
    "",
    "Expected",
    `    ${actual.join("\n    ")}`,
    "to match",
    `    ${expected.join("\n    ")}`,
  ].join("\n");

  return description ? `${message}\n\n${description}` : message;
}
