// src/connection.ts
import { InvariantViolationError, ProtocolParseError, translateResult } from "./errors.js";
import type { PooledConnection } from "./pool.js";
import type { HandleOptions, TransportHandle } from "./transport/types.js";
import type { HeaderField, HttpClientErrorKind, HttpRequest } from "./types.js";
import { isInterimStatusLine, isStatusLine, parseStatusLine, type StatusLine } from "./utils/statusLine.js";

export type CallbackPhase = "onResponseStart" | "onHeader" | "onData" | "onDone";

export interface ConnectionHooks {
  onCallbackError(request: HttpRequest, phase: CallbackPhase, error: unknown): void;
}

// Applied on top of caller headers whenever a body is sent.
const BODY_OVERRIDES = ["content-length", "transfer-encoding", "content-type", "expect"];

function sendsBody(request: HttpRequest): boolean {
  switch (request.verb) {
    case "GET":
    case "HEAD":
      return false;
    case "PUT":
    case "POST":
      return true;
    default:
      return request.body.length > 0;
  }
}

function isBlankLine(line: string): boolean {
  return line === "\r\n" || line === "\n";
}

/**
 * One reusable slot of the pool: a transport handle plus the state of the
 * request currently bound to it.
 */
export class HttpConnection implements PooledConnection {
  private current: HttpRequest | undefined;
  private uploadOffset = 0;
  private afterContinue = false;
  private parseError: ProtocolParseError | undefined;
  private callbackFailed = false;
  private finished = false;

  constructor(
    readonly slot: number,
    readonly handle: TransportHandle,
    private readonly hooks: ConnectionHooks
  ) {}

  get request(): HttpRequest | undefined {
    return this.current;
  }

  get bytesUploaded(): number {
    return this.uploadOffset;
  }

  bind(request: HttpRequest): void {
    if (this.current) {
      throw new InvariantViolationError(
        `slot ${this.slot} is already bound to request ${this.current.id}`
      );
    }
    this.current = request;
  }

  /** Build the transport options for the bound request. */
  configure(bufferSize: number): HandleOptions {
    const request = this.current;
    if (!request) throw new InvariantViolationError(`slot ${this.slot} configured while free`);

    let headers: HeaderField[] = [...request.headers];
    const options: HandleOptions = {
      url: request.url,
      method: request.verb,
      headers,
      noBody: request.verb === "HEAD",
      timeoutMs: request.timeoutSeconds === -1 ? undefined : Math.round(request.timeoutSeconds * 1000),
      bufferSize,
      onHeader: (line) => this.onHeaderLine(line),
      onWrite: (chunk) => this.onBodyChunk(chunk),
    };

    if (sendsBody(request)) {
      headers = headers.filter(([name]) => !BODY_OVERRIDES.includes(name.toLowerCase()));
      headers.push(
        ["Content-Length", String(request.body.length)],
        ["Transfer-Encoding", ""],
        ["Content-Type", request.contentType],
        // Some engines add "Expect: 100-continue" to larger uploads on their own.
        ["Expect", ""]
      );
      options.headers = headers;
      options.upload = {
        length: request.body.length,
        read: (buffer) => this.readUpload(buffer),
      };
    }

    return options;
  }

  /**
   * Header consumer, one raw line at a time. A single "100 Continue" block is
   * swallowed; the status line of the real response starts the response.
   * Returns false to make the engine abort the transfer.
   */
  onHeaderLine(line: string): boolean {
    const request = this.current;
    if (!request || this.finished) return false;

    if (isInterimStatusLine(line)) {
      this.afterContinue = true;
      return true;
    }

    if (this.afterContinue) {
      if (isBlankLine(line)) this.afterContinue = false;
      return true;
    }

    if (isStatusLine(line)) {
      let status: StatusLine;
      try {
        status = parseStatusLine(line);
      } catch (err) {
        this.parseError = err instanceof ProtocolParseError ? err : new ProtocolParseError(line);
        return false;
      }
      return this.invoke(request, "onResponseStart", () =>
        request.callbacks.onResponseStart(request, status.version, status.code)
      );
    }

    return this.invoke(request, "onHeader", () => request.callbacks.onHeader(request, line));
  }

  onBodyChunk(chunk: Buffer): boolean {
    const request = this.current;
    if (!request || this.finished) return false;
    return this.invoke(request, "onData", () => request.callbacks.onData(request, chunk));
  }

  /**
   * Upload supplier: copies min(remaining, buffer.length) bytes and advances
   * the offset. Returns 0 once the whole body has been handed out.
   */
  readUpload(buffer: Buffer): number {
    const request = this.current;
    if (!request) return 0;

    const n = Math.min(request.body.length - this.uploadOffset, buffer.length);
    if (n <= 0) return 0;

    request.body.copy(buffer, 0, this.uploadOffset, this.uploadOffset + n);
    this.uploadOffset += n;
    return n;
  }

  /** The kind reported to onDone for a transfer that ended with `result`. */
  outcome(result: string): HttpClientErrorKind {
    if (this.parseError) return "ProtocolParseError";
    if (this.callbackFailed) return "Unknown";
    return translateResult(result);
  }

  get protocolError(): ProtocolParseError | undefined {
    return this.parseError;
  }

  /**
   * Fire onDone. Returns false if it already fired or nothing is bound.
   */
  finish(kind: HttpClientErrorKind): boolean {
    const request = this.current;
    if (!request || this.finished) return false;

    this.finished = true;
    this.invoke(request, "onDone", () => request.callbacks.onDone(request, kind));
    return true;
  }

  clear(): void {
    this.current = undefined;
    this.uploadOffset = 0;
    this.afterContinue = false;
    this.parseError = undefined;
    this.callbackFailed = false;
    this.finished = false;
  }

  private invoke(request: HttpRequest, phase: CallbackPhase, fn: () => void): boolean {
    try {
      fn();
      return true;
    } catch (err) {
      this.callbackFailed = true;
      this.hooks.onCallbackError(request, phase, err);
      return false;
    }
  }
}
