// src/errors.ts
import type { HttpClientErrorKind } from "./types.js";
import { ResultCode } from "./transport/types.js";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ProtocolParseError extends Error {
  constructor(readonly line: string) {
    super(`malformed status line: ${JSON.stringify(line)}`);
    this.name = "ProtocolParseError";
  }
}

/**
 * Engine or pool bookkeeping went out of sync. Indicates a bug; the client
 * reports it and recycles the affected connection instead of stopping.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export class HttpRequestError extends Error {
  constructor(readonly kind: Exclude<HttpClientErrorKind, "None">, readonly url: string) {
    super(`request to ${url} failed: ${kind}`);
    this.name = "HttpRequestError";
  }
}

export class RequestTimeoutError extends HttpRequestError {
  constructor(url: string, readonly timeoutSeconds: number) {
    super("Timeout", url);
    this.message = `request to ${url} timed out after ${timeoutSeconds}s`;
    this.name = "RequestTimeoutError";
  }
}

const KNOWN_RESULTS: Record<string, HttpClientErrorKind> = {
  [ResultCode.OK]: "None",
  [ResultCode.OPERATION_TIMEDOUT]: "Timeout",
  [ResultCode.COULDNT_RESOLVE_HOST]: "HostNotFound",
  [ResultCode.COULDNT_CONNECT]: "CouldNotConnect",
  [ResultCode.SEND_ERROR]: "SendError",
  [ResultCode.RECV_ERROR]: "RecvError",
};

/**
 * Map a transport result code onto the client's error kinds.
 * Every code maps to exactly one kind; anything unrecognised is "Unknown".
 */
export function translateResult(code: string): HttpClientErrorKind {
  return Object.hasOwn(KNOWN_RESULTS, code) ? KNOWN_RESULTS[code] : "Unknown";
}
