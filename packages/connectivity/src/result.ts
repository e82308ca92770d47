/**
 * Probe results.
 *
 * The probe tool prints its result as a single `RESULT=<json>` line using
 * PascalCase keys; the schemas here decode that wire form into the camelCase
 * shapes the checker works with.
 */

import { z } from "zod";
import { ProbeContractError } from "./errors.js";

// ============================================================================
// Wire schemas
// ============================================================================

const WireRequestSchema = z.object({
  Timestamp: z.coerce.date(),
  ID: z.string(),
  Payload: z.string(),
  SendSize: z.number().int().nonnegative().default(0),
  ResponseSize: z.number().int().nonnegative().default(0),
});

const WireResponseSchema = z.object({
  Timestamp: z.coerce.date(),
  SourceAddr: z.string(),
  ServerAddr: z.string(),
  Request: WireRequestSchema,
});

const WireStatsSchema = z.object({
  RequestsSent: z.number().int().nonnegative(),
  ResponsesReceived: z.number().int().nonnegative(),
});

const WireMTUPairSchema = z.object({
  Start: z.number().int().nonnegative(),
  End: z.number().int().nonnegative(),
});

export const ResultSchema = z
  .object({
    LastResponse: WireResponseSchema,
    Stats: WireStatsSchema.default({ RequestsSent: 0, ResponsesReceived: 0 }),
    ClientMTU: WireMTUPairSchema.default({ Start: 0, End: 0 }),
  })
  .transform(({ LastResponse, Stats, ClientMTU }) => ({
    lastResponse: {
      timestamp: LastResponse.Timestamp,
      sourceAddr: LastResponse.SourceAddr,
      serverAddr: LastResponse.ServerAddr,
      request: {
        timestamp: LastResponse.Request.Timestamp,
        id: LastResponse.Request.ID,
        payload: LastResponse.Request.Payload,
        sendSize: LastResponse.Request.SendSize,
        responseSize: LastResponse.Request.ResponseSize,
      },
    },
    stats: {
      requestsSent: Stats.RequestsSent,
      responsesReceived: Stats.ResponsesReceived,
    },
    clientMTU: {
      start: ClientMTU.Start,
      end: ClientMTU.End,
    },
  }));

// ============================================================================
// Types
// ============================================================================

export type Result = z.output<typeof ResultSchema>;
export type Response = Result["lastResponse"];
export type Request = Response["request"];
export type Stats = Result["stats"];
/** MTU recorded before and after the transfer. */
export type MTUPair = Result["clientMTU"];

// ============================================================================
// Helpers
// ============================================================================

export function lost(stats: Stats): number {
  return stats.requestsSent - stats.responsesReceived;
}

/**
 * NaN when nothing was sent; loss probes always send at least one request.
 */
export function lostPercent(stats: Stats): number {
  return (lost(stats) * 100) / stats.requestsSent;
}

/**
 * The response's source address without its port. Bracketed IPv6 addresses
 * (`[fd00::1]:80`) lose their brackets.
 */
export function sourceIP(response: Response): string {
  const addr = response.sourceAddr;
  const colon = addr.lastIndexOf(":");
  const host = colon === -1 ? addr : addr.slice(0, colon);
  return host.startsWith("[") && host.endsWith("]") ? host.slice(1, -1) : host;
}

const RESULT_LINE_REGEX = /RESULT=([^\n]*)\n/;

/**
 * Finds the `RESULT=` line in probe output. Returns null when the probe
 * printed none; throws when the line is there but does not decode.
 */
export function parseResultLine(output: string): Result | null {
  const match = RESULT_LINE_REGEX.exec(output);
  if (!match) return null;

  const encoded = (match[1] ?? "").trim();
  let json: unknown;
  try {
    json = JSON.parse(encoded);
  } catch (error) {
    throw new ProbeContractError(
      `Failed to parse connection check response: ${String(error)}`,
      output,
    );
  }

  const parsed = ResultSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProbeContractError(
      `Failed to parse connection check response: ${parsed.error.message}`,
      output,
    );
  }
  return parsed.data;
}

export function encodeResult(result: Result): string {
  const { lastResponse, stats, clientMTU } = result;
  return JSON.stringify({
    LastResponse: {
      Timestamp: lastResponse.timestamp.toISOString(),
      SourceAddr: lastResponse.sourceAddr,
      ServerAddr: lastResponse.serverAddr,
      Request: {
        Timestamp: lastResponse.request.timestamp.toISOString(),
        ID: lastResponse.request.id,
        Payload: lastResponse.request.payload,
        SendSize: lastResponse.request.sendSize,
        ResponseSize: lastResponse.request.responseSize,
      },
    },
    Stats: {
      RequestsSent: stats.requestsSent,
      ResponsesReceived: stats.responsesReceived,
    },
    ClientMTU: {
      Start: clientMTU.start,
      End: clientMTU.end,
    },
  });
}

export function formatResultLine(result: Result): string {
  return `RESULT=${encodeResult(result)}\n`;
}
