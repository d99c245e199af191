import type { TransportEngine } from "./transport/types.js";

/**
 * Standard verbs get dedicated handling; any other token is sent as a custom method.
 */
export type HttpVerb = "GET" | "HEAD" | "POST" | "PUT" | "PATCH" | "DELETE" | "OPTIONS" | (string & {});

/**
 * Outcome of a request as delivered to `onDone`.
 * "None" means the exchange completed; the HTTP status is reported separately.
 */
export type HttpClientErrorKind =
  | "None"
  | "Timeout"
  | "HostNotFound"
  | "CouldNotConnect"
  | "SendError"
  | "RecvError"
  | "Unknown"
  | "ProtocolParseError";

export type HeaderField = readonly [name: string, value: string];

/** Query parameters or header fields, in the order they should be sent. */
export type RestParams = ReadonlyArray<HeaderField> | Record<string, string>;

export interface HttpRequestContent {
  body: string | Uint8Array | Buffer;
  contentType?: string;
}

/**
 * Callback set implemented by whoever submits a request.
 * All four run synchronously on the loop-driving call stack; none may block.
 */
export interface HttpClientCallbacks {
  onResponseStart(request: HttpRequest, httpVersion: string, statusCode: number): void;
  /** One raw header line, terminator included; the final blank line is delivered too. */
  onHeader(request: HttpRequest, rawLine: string): void;
  onData(request: HttpRequest, chunk: Buffer): void;
  /** Called exactly once per accepted request. */
  onDone(request: HttpRequest, errorKind: HttpClientErrorKind): void;
}

export interface HttpRequest {
  readonly id: number;
  readonly verb: HttpVerb;
  readonly url: string;
  readonly body: Buffer;
  readonly contentType: string;
  readonly headers: ReadonlyArray<HeaderField>;
  /** Seconds; -1 disables the per-request timeout. */
  readonly timeoutSeconds: number;
  readonly callbacks: HttpClientCallbacks;
}

export interface HttpResponse {
  version: string;
  status: number;
  headers: Record<string, string>;
  body: Uint8Array; // keep raw; helpers can parse JSON
}

export interface HttpRequestInit {
  method: HttpVerb;
  resource: string;
  query?: RestParams;
  headers?: RestParams;
  body?: HttpRequestContent;
  timeoutSeconds?: number;
}

export interface HttpClientOptions {
  baseUrl: string;             // e.g. "http://127.0.0.1:3001"
  maxParallel: number;         // e.g. 8, fixed pool capacity

  /**
   * Bounded queueing is not supported: any value > 0 fails construction.
   * Default: 0 (unbounded queue)
   */
  queueSize?: number;

  /** Default: a new UndiciTransport owned by the client. */
  transport?: TransportEngine;

  bufferSize?: number;         // default 65536
  debug?: boolean;             // emit "debug" events for loop activity
}
