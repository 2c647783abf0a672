import type { ErrorCode } from "../lib/errors/types.js";

export type OperationKind = "ping" | "open";

/**
 * One parsed relay request. Built per request, dropped after the response.
 */
export type InboundRequest =
  | { kind: "ping"; source: string }
  | { kind: "open"; url: unknown; source: string };

export interface PingAck {
  ok: true;
  service: string;
  version: string;
}

export interface OpenAck {
  ok: true;
  url: string;
  dryRun: boolean;
  elapsedMs: number;
}

export interface ErrorBody {
  ok: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: string;
  };
}

export type ResponseBody = PingAck | OpenAck | ErrorBody;

/**
 * Transport-neutral request handed from the listener to the pipeline.
 */
export interface WireRequest {
  method: string;
  path: string;
  headers: Record<string, string | string[] | undefined>;
  /** Peer address as reported by the socket */
  source: string | undefined;
  /** Reads the body under the listener's size and time limits */
  readBody(): Promise<Buffer>;
}

export interface WireResponse {
  status: number;
  body?: ResponseBody;
  /** Ask the listener to drop the connection after responding */
  close?: boolean;
}
