// Checker
export { Checker } from "./checker.js";
export type { CheckerOptions } from "./checker.js";

// Endpoints
export {
  TargetIP,
  isConnectionSource,
  isConnectionTarget,
} from "./endpoint.js";
export type {
  ConnectionSource,
  ConnectionTarget,
  Matcher,
  ProbeOptions,
} from "./endpoint.js";

// Expectations
export {
  createExpectation,
  expectWithSrcIPs,
  expectWithSendLen,
  expectWithRecvLen,
  expectWithClientAdjustedMTU,
  expectWithLoss,
  PacketLossExpectationSchema,
  NO_PACKET_LOSS_EXPECTATION,
} from "./expectation.js";
export type {
  Expectation,
  ExpectationDraft,
  ExpectationOption,
  PacketLossExpectation,
} from "./expectation.js";

// Probing and matching
export { dispatchProbes } from "./dispatch.js";
export type { Dispatch, DispatchOptions } from "./dispatch.js";
export { expectationMatches } from "./match.js";
export {
  describeActual,
  describeExpected,
  formatFailureMessage,
  WRONG_MARKER,
  EXPECTED_MARKER,
} from "./report.js";

// Results
export {
  ResultSchema,
  lost,
  lostPercent,
  sourceIP,
  parseResultLine,
  encodeResult,
  formatResultLine,
} from "./result.js";
export type { Result, Response, Request, Stats, MTUPair } from "./result.js";

// Test messages
export {
  ConnConfig,
  newRequest,
  requestsEqual,
  isMessagePartOfStream,
  CONNECTION_TYPE_STREAM,
  CONNECTION_TYPE_PING,
} from "./messages.js";
export type { ConnectionType } from "./messages.js";

// Registry
export {
  CheckerRegistry,
  unactivatedCheckers,
  assertAllCheckersActivated,
} from "./registry.js";

// Ambient
export { createConfig, ProtocolSchema } from "./config.js";
export type { Config, Protocol } from "./config.js";
export { Logger } from "./logger.js";
export {
  ConfigurationError,
  ProbeContractError,
  ConnectivityError,
} from "./errors.js";
