import { z } from "zod";
import type { ConnectionSource, Matcher } from "./endpoint.js";
import { ConfigurationError } from "./errors.js";

// ============================================================================
// Packet loss
// ============================================================================

/**
 * `maxPercent` of 10 means 10%, `maxNumber` of 10 means 10 packets; -1 leaves
 * that axis unbounded.
 */
export const PacketLossExpectationSchema = z
  .object({
    durationMs: z.number().positive("Packet loss test must have a duration"),
    maxPercent: z.number().max(100, "Loss percentage should be <=100"),
    maxNumber: z.number().int(),
  })
  .refine((loss) => loss.maxPercent >= 0 || loss.maxNumber >= 0, {
    message: "Either loss count or percent must be specified",
  });

export type PacketLossExpectation = z.infer<typeof PacketLossExpectationSchema>;

export const NO_PACKET_LOSS_EXPECTATION: PacketLossExpectation = Object.freeze({
  durationMs: 0,
  maxPercent: -1,
  maxNumber: -1,
});

// ============================================================================
// Expectation
// ============================================================================

export interface Expectation {
  readonly from: ConnectionSource;
  readonly to: Matcher;
  readonly expected: boolean;
  /** Only consulted when the checker verifies SNAT. */
  readonly expSrcIPs: readonly string[];
  readonly expectedPacketLoss: PacketLossExpectation;
  readonly sendLen: number;
  readonly recvLen: number;
  /** 0 leaves the bound unchecked. */
  readonly clientMTUStart: number;
  readonly clientMTUEnd: number;
}

export type ExpectationDraft = {
  -readonly [K in keyof Expectation]: Expectation[K];
};

export type ExpectationOption = (draft: ExpectationDraft) => void;

export function createExpectation(
  expected: boolean,
  from: ConnectionSource,
  to: Matcher,
  options: ExpectationOption[] = [],
): Expectation {
  const draft: ExpectationDraft = {
    from,
    to,
    expected,
    // Without an SNAT option the probe should arrive from the source itself.
    expSrcIPs: expected ? from.sourceIPs() : [],
    expectedPacketLoss: NO_PACKET_LOSS_EXPECTATION,
    sendLen: 0,
    recvLen: 0,
    clientMTUStart: 0,
    clientMTUEnd: 0,
  };

  for (const option of options) {
    option(draft);
  }

  return Object.freeze({
    ...draft,
    to: Object.freeze({ ...draft.to }),
    expSrcIPs: Object.freeze([...draft.expSrcIPs]),
  });
}

// ============================================================================
// Options
// ============================================================================

export function expectWithSrcIPs(...ips: string[]): ExpectationOption {
  return (draft) => {
    draft.expSrcIPs = ips;
  };
}

/**
 * Extra data on top of the request that must be sent successfully.
 */
export function expectWithSendLen(length: number): ExpectationOption {
  return (draft) => {
    draft.sendLen = length;
  };
}

/**
 * Extra data on top of the response that must be received successfully.
 */
export function expectWithRecvLen(length: number): ExpectationOption {
  return (draft) => {
    draft.recvLen = length;
  };
}

/**
 * The client's path MTU must move from `start` to `end` during the transfer.
 */
export function expectWithClientAdjustedMTU(
  start: number,
  end: number,
): ExpectationOption {
  return (draft) => {
    draft.clientMTUStart = start;
    draft.clientMTUEnd = end;
  };
}

/**
 * Bounds the loss of a timed run. Validated here rather than when the check
 * runs, so a bad declaration fails before any probe is sent.
 */
export function expectWithLoss(
  durationMs: number,
  maxPercent: number,
  maxNumber: number,
): ExpectationOption {
  const parsed = PacketLossExpectationSchema.safeParse({
    durationMs,
    maxPercent,
    maxNumber,
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  const loss = Object.freeze(parsed.data);

  return (draft) => {
    draft.expectedPacketLoss = loss;
  };
}
