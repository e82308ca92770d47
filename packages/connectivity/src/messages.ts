import { randomUUID } from "node:crypto";
import type { Request } from "./result.js";

export const CONNECTION_TYPE_STREAM = "stream";
export const CONNECTION_TYPE_PING = "ping";

export type ConnectionType =
  | typeof CONNECTION_TYPE_STREAM
  | typeof CONNECTION_TYPE_PING;

export function newRequest(payload: string): Request {
  return {
    timestamp: new Date(),
    id: randomUUID(),
    payload,
    sendSize: 0,
    responseSize: 0,
  };
}

export function requestsEqual(a: Request, b: Request): boolean {
  return a.id === b.id && a.timestamp.getTime() === b.timestamp.getTime();
}

/**
 * Numbered test messages exchanged over one probe connection, formatted as
 * `<type>:<id>~<sequence>`.
 */
export class ConnConfig {
  connType: ConnectionType;
  connID: string;

  constructor(connType: ConnectionType, connID: string) {
    this.connType = connType;
    this.connID = connID;
  }

  private get prefix(): string {
    return `${this.connType}:${this.connID}~`;
  }

  getTestMessage(sequence: number): Request {
    return newRequest(`${this.prefix}${sequence}`);
  }

  getTestMessageSequence(message: string): number {
    const trimmed = message.trim();
    if (!trimmed.startsWith(this.prefix)) {
      throw new Error(`invalid message prefix format:${trimmed}`);
    }

    const sequence = trimmed.slice(this.prefix.length);
    if (!/^\+?\d+$/.test(sequence)) {
      throw new Error(`invalid message sequence format:${trimmed}`);
    }
    return Number.parseInt(sequence, 10);
  }
}

export function isMessagePartOfStream(message: string): boolean {
  return message.trim().startsWith(CONNECTION_TYPE_STREAM);
}
