// src/transport/undici.ts
import { Readable } from "node:stream";
import { Agent, type Dispatcher } from "undici";
import type { Descriptor, DescriptorTable, Readiness } from "../loop/multiplexer.js";
import type { HeaderField } from "../types.js";
import {
  ResultCode,
  type CompletedHandle,
  type HandleOptions,
  type SocketToken,
  type TransportEngine,
  type TransportHandle,
  type TransportHost,
  type UploadSource,
} from "./types.js";

export interface UndiciTransportOptions {
  connections?: number;        // per origin, default 8
  pipelining?: number;         // default 1
  keepAliveTimeout?: number;   // default 4000
  verifyTls?: boolean;         // default true
  uploadBufferSize?: number;   // default 65536

  /**
   * Use an existing dispatcher (e.g. a ProxyAgent) instead of a private Agent.
   * It is not closed by `close()`.
   */
  dispatcher?: Dispatcher;
}

type InboxEvent =
  | { type: "head"; lines: string[] }
  | { type: "data"; chunk: Buffer }
  | { type: "complete" }
  | { type: "error"; error: Error };

interface Transfer {
  handle: TransportHandle;
  options: HandleOptions;
  fd: Descriptor;
  token?: SocketToken;
  announced: boolean;
  deadline?: number;
  inbox: InboxEvent[];
  closed: boolean;
  abort?: () => void;
  body?: Readable;
  uploadWanted: boolean;
}

interface HandleState {
  handle: TransportHandle;
  options?: HandleOptions;
  transfer?: Transfer;
}

const DISPATCH_METHODS: readonly Dispatcher.HttpMethod[] = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
];

function isDispatchMethod(method: string): method is Dispatcher.HttpMethod {
  return DISPATCH_METHODS.some((m) => m === method);
}

const ERROR_RESULTS: Record<string, ResultCode> = {
  ENOTFOUND: ResultCode.COULDNT_RESOLVE_HOST,
  EAI_AGAIN: ResultCode.COULDNT_RESOLVE_HOST,
  EAI_NONAME: ResultCode.COULDNT_RESOLVE_HOST,
  EAI_NODATA: ResultCode.COULDNT_RESOLVE_HOST,
  ECONNREFUSED: ResultCode.COULDNT_CONNECT,
  EHOSTUNREACH: ResultCode.COULDNT_CONNECT,
  ENETUNREACH: ResultCode.COULDNT_CONNECT,
  EADDRNOTAVAIL: ResultCode.COULDNT_CONNECT,
  ETIMEDOUT: ResultCode.OPERATION_TIMEDOUT,
  UND_ERR_CONNECT_TIMEOUT: ResultCode.OPERATION_TIMEDOUT,
  UND_ERR_HEADERS_TIMEOUT: ResultCode.OPERATION_TIMEDOUT,
  UND_ERR_BODY_TIMEOUT: ResultCode.OPERATION_TIMEDOUT,
  EPIPE: ResultCode.SEND_ERROR,
  UND_ERR_REQ_CONTENT_LENGTH_MISMATCH: ResultCode.SEND_ERROR,
  ECONNRESET: ResultCode.RECV_ERROR,
  UND_ERR_SOCKET: ResultCode.RECV_ERROR,
  UND_ERR_RES_CONTENT_LENGTH_MISMATCH: ResultCode.RECV_ERROR,
  UND_ERR_ABORTED: ResultCode.ABORTED_BY_CALLBACK,
};

/**
 * Result code for an undici or system error. Codes without a mapping are
 * passed through so the client can report them.
 */
export function resultForError(err: unknown): string {
  const code =
    typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
      ? err.code
      : undefined;
  if (code === undefined) return "UNKNOWN";
  return Object.hasOwn(ERROR_RESULTS, code) ? ERROR_RESULTS[code] : code;
}

/** Header fields as undici's flat [name, value, ...] list; empty values are left out. */
export function flattenHeaders(fields: ReadonlyArray<HeaderField>): string[] {
  const out: string[] = [];
  for (const [name, value] of fields) {
    if (value === "") continue;
    out.push(name, value);
  }
  return out;
}

/**
 * Status line, header lines and the blank terminator, as they came off the wire.
 * undici does not report the response's HTTP version, so the status line
 * always says HTTP/1.1, whatever the server sent.
 */
export function renderHead(statusCode: number, statusText: string, rawHeaders: Buffer[]): string[] {
  const lines = [`HTTP/1.1 ${statusCode} ${statusText}\r\n`];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    lines.push(`${rawHeaders[i].toString("latin1")}: ${rawHeaders[i + 1].toString("latin1")}\r\n`);
  }
  lines.push("\r\n");
  return lines;
}

/**
 * Transport engine on top of undici's dispatcher API.
 *
 * undici does its own socket I/O on the Node event loop; this engine turns
 * each transfer into a descriptor. Dispatcher events are buffered on the
 * transfer and announced as input readiness, and upload demand as output
 * readiness, so the owner's callbacks only ever run from
 * `driveOnSocketReady`. Per-request deadlines are enforced by
 * `driveOnTimeout`.
 */
export class UndiciTransport implements TransportEngine {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly uploadBufferSize: number;

  private host: TransportHost | undefined;
  private descriptors: DescriptorTable | undefined;

  private nextHandleId = 1;
  private readonly handles = new Map<number, HandleState>();
  private startQueue: HandleState[] = [];
  private readonly byFd = new Map<Descriptor, Transfer>();
  private readonly running = new Set<Transfer>();
  private completed: CompletedHandle[] = [];
  private requestedTimeout = -1;

  constructor(opts: UndiciTransportOptions = {}) {
    const uploadBufferSize = opts.uploadBufferSize ?? 65536;
    if (!Number.isInteger(uploadBufferSize) || uploadBufferSize <= 0) {
      throw new Error(`uploadBufferSize must be an integer > 0 (got ${uploadBufferSize})`);
    }
    this.uploadBufferSize = uploadBufferSize;

    this.ownsDispatcher = opts.dispatcher === undefined;
    this.dispatcher =
      opts.dispatcher ??
      new Agent({
        connections: opts.connections ?? 8,
        pipelining: opts.pipelining ?? 1,
        keepAliveTimeout: opts.keepAliveTimeout ?? 4000,
        connect: { rejectUnauthorized: opts.verifyTls ?? true },
      });
  }

  attach(host: TransportHost, descriptors: DescriptorTable): void {
    if (this.host) throw new Error("transport is already attached");
    this.host = host;
    this.descriptors = descriptors;
  }

  createHandle(): TransportHandle {
    const handle = { id: this.nextHandleId++ };
    this.handles.set(handle.id, { handle });
    return handle;
  }

  configureHandle(handle: TransportHandle, options: HandleOptions): void {
    const state = this.stateOf(handle);
    if (state.transfer) throw new Error(`handle ${handle.id} is busy`);
    state.options = options;
  }

  registerHandleForExecution(handle: TransportHandle): void {
    const state = this.stateOf(handle);
    if (!state.options) throw new Error(`handle ${handle.id} is not configured`);
    if (state.transfer || this.startQueue.includes(state)) {
      throw new Error(`handle ${handle.id} is already registered`);
    }

    this.startQueue.push(state);
    this.hostOf().timeoutRequested(0);
  }

  removeHandle(handle: TransportHandle): void {
    const state = this.stateOf(handle);
    this.startQueue = this.startQueue.filter((s) => s !== state);

    const transfer = state.transfer;
    if (transfer && !transfer.closed) {
      this.closeTransfer(transfer);
      transfer.abort?.();
    }
    state.transfer = undefined;
    state.options = undefined;
  }

  assignSocket(fd: Descriptor, token: SocketToken): void {
    const transfer = this.byFd.get(fd);
    if (transfer) transfer.token = token;
  }

  driveOnTimeout(): number {
    const queued = this.startQueue;
    this.startQueue = [];
    for (const state of queued) this.start(state);

    const now = Date.now();
    for (const transfer of [...this.running]) {
      if (transfer.deadline !== undefined && transfer.deadline <= now) {
        this.fail(transfer, ResultCode.OPERATION_TIMEDOUT);
      }
    }

    this.rearm();
    return this.running.size;
  }

  driveOnSocketReady(fd: Descriptor, readiness: Readiness): number {
    const transfer = this.byFd.get(fd);
    if (transfer) {
      if (readiness.output) this.pumpUpload(transfer);
      if (readiness.input) this.drainInbox(transfer);
      this.rearm();
    }
    return this.running.size;
  }

  pollCompletedHandles(): CompletedHandle[] {
    const out = this.completed;
    this.completed = [];
    return out;
  }

  async close(): Promise<void> {
    for (const transfer of [...this.running]) {
      this.closeTransfer(transfer);
      transfer.abort?.();
    }
    this.startQueue = [];
    if (this.ownsDispatcher) await this.dispatcher.close();
  }

  /* ---------------- transfers ---------------- */

  private start(state: HandleState): void {
    const { handle, options } = state;
    if (!options) return;

    const descriptors = this.descriptorsOf();
    const transfer: Transfer = {
      handle,
      options,
      fd: descriptors.allocate(),
      announced: false,
      deadline: options.timeoutMs === undefined ? undefined : Date.now() + options.timeoutMs,
      inbox: [],
      closed: false,
      uploadWanted: false,
    };
    state.transfer = transfer;
    this.running.add(transfer);
    this.byFd.set(transfer.fd, transfer);

    let url: URL;
    try {
      url = new URL(options.url);
    } catch (err) {
      this.finish(transfer, ResultCode.URL_MALFORMAT, err instanceof Error ? err : undefined);
      return;
    }
    if ((url.protocol !== "http:" && url.protocol !== "https:") || !isDispatchMethod(options.method)) {
      this.finish(transfer, ResultCode.UNSUPPORTED_PROTOCOL);
      return;
    }

    const upload = options.upload && options.upload.length > 0 ? options.upload : undefined;
    transfer.announced = true;
    this.hostOf().socketStateChanged(transfer.fd, upload ? "inout" : "in", undefined);
    if (upload) transfer.body = this.uploadStream(transfer);

    try {
      this.dispatcher.dispatch(
        {
          origin: url.origin,
          path: `${url.pathname}${url.search}`,
          method: options.method,
          headers: flattenHeaders(options.headers),
          body: transfer.body ?? null,
        },
        this.handlerFor(transfer)
      );
    } catch (err) {
      this.finish(transfer, resultForError(err), err instanceof Error ? err : undefined);
    }
  }

  private handlerFor(transfer: Transfer): Dispatcher.DispatchHandlers {
    const push = (event: InboxEvent): void => {
      if (transfer.closed) return;
      transfer.inbox.push(event);
      this.descriptorsOf().notify(transfer.fd, { input: true, output: false });
    };

    return {
      onConnect: (abort) => {
        if (transfer.closed) abort();
        else transfer.abort = () => abort();
      },
      onHeaders: (statusCode, rawHeaders, _resume, statusText) => {
        push({ type: "head", lines: renderHead(statusCode, statusText, rawHeaders) });
        return true;
      },
      onData: (chunk) => {
        push({ type: "data", chunk });
        return true;
      },
      onComplete: () => push({ type: "complete" }),
      onError: (error) => push({ type: "error", error }),
    };
  }

  private uploadStream(transfer: Transfer): Readable {
    return new Readable({
      highWaterMark: this.uploadBufferSize,
      read: () => {
        if (transfer.closed) return;
        transfer.uploadWanted = true;
        this.descriptorsOf().notify(transfer.fd, { input: false, output: true });
      },
    });
  }

  /** One supplier call per output event; a zero-length read ends the body. */
  private pumpUpload(transfer: Transfer): void {
    const { body, options } = transfer;
    const upload: UploadSource | undefined = options.upload;
    if (!body || !upload || !transfer.uploadWanted || transfer.closed) return;
    transfer.uploadWanted = false;

    const buffer = Buffer.alloc(this.uploadBufferSize);
    let n: number;
    try {
      n = upload.read(buffer);
    } catch (err) {
      this.fail(transfer, ResultCode.READ_ERROR, err instanceof Error ? err : undefined);
      return;
    }

    if (n > 0) {
      body.push(buffer.subarray(0, n));
      return;
    }

    body.push(null);
    this.hostOf().socketStateChanged(transfer.fd, "in", transfer.token);
  }

  private drainInbox(transfer: Transfer): void {
    const { options } = transfer;

    while (!transfer.closed) {
      const event = transfer.inbox.shift();
      if (!event) return;

      switch (event.type) {
        case "head":
          for (const line of event.lines) {
            if (!options.onHeader(line)) {
              this.fail(transfer, ResultCode.WRITE_ERROR);
              return;
            }
          }
          break;
        case "data":
          if (options.noBody) break;
          for (let off = 0; off < event.chunk.length; off += options.bufferSize) {
            if (!options.onWrite(event.chunk.subarray(off, off + options.bufferSize))) {
              this.fail(transfer, ResultCode.WRITE_ERROR);
              return;
            }
          }
          break;
        case "complete":
          this.finish(transfer, ResultCode.OK);
          return;
        case "error":
          this.finish(transfer, resultForError(event.error), event.error);
          return;
      }
    }
  }

  private fail(transfer: Transfer, result: string, cause?: Error): void {
    if (transfer.closed) return;
    this.finish(transfer, result, cause);
    transfer.abort?.();
  }

  private finish(transfer: Transfer, result: string, cause?: Error): void {
    if (transfer.closed) return;
    this.closeTransfer(transfer);
    this.completed.push({ handle: transfer.handle, result, cause });
  }

  private closeTransfer(transfer: Transfer): void {
    transfer.closed = true;
    transfer.inbox = [];
    this.running.delete(transfer);
    this.byFd.delete(transfer.fd);
    if (transfer.body && !transfer.body.destroyed) transfer.body.destroy();
    if (transfer.announced) {
      transfer.announced = false;
      this.hostOf().socketStateChanged(transfer.fd, "remove", transfer.token);
    }
  }

  /** Ask the host for the next deadline check, or cancel it when nothing is timed. */
  private rearm(): void {
    let next: number | undefined;
    for (const t of this.running) {
      if (t.deadline !== undefined && (next === undefined || t.deadline < next)) next = t.deadline;
    }

    if (next === undefined) {
      if (this.requestedTimeout !== -1) {
        this.requestedTimeout = -1;
        this.hostOf().timeoutRequested(-1);
      }
      return;
    }

    // Never 0 here: that would re-enter driveOnTimeout from inside itself.
    const ms = Math.max(1, next - Date.now());
    this.requestedTimeout = ms;
    this.hostOf().timeoutRequested(ms);
  }

  private stateOf(handle: TransportHandle): HandleState {
    const state = this.handles.get(handle.id);
    if (!state) throw new Error(`unknown handle ${handle.id}`);
    return state;
  }

  private hostOf(): TransportHost {
    if (!this.host) throw new Error("transport is not attached");
    return this.host;
  }

  private descriptorsOf(): DescriptorTable {
    if (!this.descriptors) throw new Error("transport is not attached");
    return this.descriptors;
  }
}
