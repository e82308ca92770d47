import type { Expectation } from "./expectation.js";
import { lost, lostPercent, sourceIP, type Result } from "./result.js";

/**
 * Decides whether one probe result satisfies one expectation. A null result
 * means the source could not connect.
 */
export function expectationMatches(
  expectation: Expectation,
  result: Result | null,
  checkSNAT: boolean,
): boolean {
  if (!expectation.expected) {
    return result === null;
  }
  if (result === null) {
    return false;
  }

  if (
    checkSNAT &&
    !expectation.expSrcIPs.includes(sourceIP(result.lastResponse))
  ) {
    return false;
  }

  if (
    expectation.clientMTUStart !== 0 &&
    expectation.clientMTUStart !== result.clientMTU.start
  ) {
    return false;
  }
  if (
    expectation.clientMTUEnd !== 0 &&
    expectation.clientMTUEnd !== result.clientMTU.end
  ) {
    return false;
  }

  const loss = expectation.expectedPacketLoss;
  if (loss.durationMs > 0) {
    if (loss.maxNumber >= 0 && lost(result.stats) > loss.maxNumber) {
      return false;
    }
    if (loss.maxPercent >= 0 && lostPercent(result.stats) > loss.maxPercent) {
      return false;
    }
  }

  return true;
}
