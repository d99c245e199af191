// src/callbacks.ts
import { HttpRequestError, RequestTimeoutError } from "./errors.js";
import type { HttpClientCallbacks, HttpClientErrorKind, HttpRequest, HttpResponse } from "./types.js";

/**
 * Fold raw header lines into a lower-cased map; repeated fields are joined
 * with ", ". The status line and the terminating blank line never reach here.
 */
export function normalizeHeaders(lines: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of lines) {
    const idx = line.indexOf(":");
    if (idx <= 0) continue;

    const k = line.slice(0, idx).trim().toLowerCase();
    const v = line.slice(idx + 1).trim();
    out[k] = k in out ? `${out[k]}, ${v}` : v;
  }
  return out;
}

function errorFor(kind: Exclude<HttpClientErrorKind, "None">, request: HttpRequest): HttpRequestError {
  if (kind === "Timeout") return new RequestTimeoutError(request.url, request.timeoutSeconds);
  return new HttpRequestError(kind, request.url);
}

/**
 * Callback set that buffers the whole exchange and settles `response`
 * when the request is done.
 */
export class BufferingCallbacks implements HttpClientCallbacks {
  readonly response: Promise<HttpResponse>;

  private version = "";
  private status = 0;
  private headerLines: string[] = [];
  private chunks: Buffer[] = [];

  private readonly resolve: (res: HttpResponse) => void;
  private readonly reject: (err: Error) => void;

  constructor() {
    let resolveFn: (res: HttpResponse) => void = () => undefined;
    let rejectFn: (err: Error) => void = () => undefined;
    // the executor runs synchronously, so both are set before the constructor returns
    this.response = new Promise<HttpResponse>((resolve, reject) => {
      resolveFn = resolve;
      rejectFn = reject;
    });
    this.resolve = resolveFn;
    this.reject = rejectFn;
  }

  onResponseStart(_request: HttpRequest, httpVersion: string, statusCode: number): void {
    this.version = httpVersion;
    this.status = statusCode;
    // a new response block replaces anything seen before it
    this.headerLines = [];
    this.chunks = [];
  }

  onHeader(_request: HttpRequest, rawLine: string): void {
    this.headerLines.push(rawLine);
  }

  onData(_request: HttpRequest, chunk: Buffer): void {
    this.chunks.push(Buffer.from(chunk));
  }

  onDone(request: HttpRequest, errorKind: HttpClientErrorKind): void {
    if (errorKind !== "None") {
      this.reject(errorFor(errorKind, request));
      return;
    }

    const body = Buffer.concat(this.chunks);
    this.resolve({
      version: this.version,
      status: this.status,
      headers: normalizeHeaders(this.headerLines),
      body: new Uint8Array(body.buffer, body.byteOffset, body.byteLength),
    });
  }
}
