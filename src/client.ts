// src/client.ts
import { EventEmitter } from "node:events";
import { BufferingCallbacks } from "./callbacks.js";
import { HttpConnection, type CallbackPhase } from "./connection.js";
import { ConfigurationError, InvariantViolationError } from "./errors.js";
import type {
  CallbackErrorEvent,
  DebugEvent,
  DispatchedEvent,
  DoneEvent,
  InvariantViolationEvent,
  QueuedEvent,
  UnknownResultEvent,
} from "./events.js";
import { Multiplexer, type Descriptor, type Interest, type ReadyEvent } from "./loop/multiplexer.js";
import { TimerSignal } from "./loop/timer.js";
import { WakeupSignal } from "./loop/wakeup.js";
import { ConnectionPool } from "./pool.js";
import { RequestQueue } from "./queue.js";
import { buildUrl, createRequest, normalizeTimeout } from "./request.js";
import type { ClientSnapshot } from "./snapshot.js";
import { ResultCode, type SocketAction, type SocketToken, type TransportEngine, type TransportHandle } from "./transport/types.js";
import { UndiciTransport } from "./transport/undici.js";
import type {
  HttpClientCallbacks,
  HttpClientErrorKind,
  HttpClientOptions,
  HttpRequest,
  HttpRequestContent,
  HttpRequestInit,
  HttpResponse,
  HttpVerb,
  RestParams,
} from "./types.js";

const DEFAULT_BUFFER_SIZE = 65536;

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function interestFor(action: Exclude<SocketAction, "remove">): Interest {
  return { input: action !== "out", output: action !== "in" };
}

/**
 * Multiplexes any number of submitted requests over `maxParallel` pooled
 * connections. The client owns no thread or background loop: the embedder
 * waits on `fdToWaitOn()` (in Node: `whenReady()`) and calls
 * `processOneReadyEvent()`; see LoopDriver.
 */
export class HttpClient extends EventEmitter {
  readonly baseUrl: string;

  private readonly mux: Multiplexer;
  private readonly wakeup: WakeupSignal;
  private readonly timer: TimerSignal;
  private readonly queue = new RequestQueue();
  private readonly pool: ConnectionPool<HttpConnection>;
  private readonly transport: TransportEngine;
  private readonly ownsTransport: boolean;
  private readonly byHandle = new Map<number, HttpConnection>();
  private readonly startedAt = new Map<number, number>();
  private readonly bufferSize: number;
  private readonly debug: boolean;
  private closed = false;

  constructor(opts: HttpClientOptions) {
    super();

    // Fail before touching anything else.
    if (opts.queueSize !== undefined && opts.queueSize !== 0) {
      throw new ConfigurationError(`queueSize ${opts.queueSize}: bounded queueing is not supported`);
    }
    if (!Number.isInteger(opts.maxParallel) || opts.maxParallel <= 0) {
      throw new ConfigurationError(`maxParallel must be an integer > 0 (got ${opts.maxParallel})`);
    }
    const bufferSize = opts.bufferSize ?? DEFAULT_BUFFER_SIZE;
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
      throw new ConfigurationError(`bufferSize must be an integer > 0 (got ${bufferSize})`);
    }

    this.baseUrl = opts.baseUrl;
    this.bufferSize = bufferSize;
    this.debug = opts.debug ?? false;

    this.mux = new Multiplexer();
    this.wakeup = new WakeupSignal(this.mux);
    this.mux.register(this.wakeup.fd, { input: true, output: false }, () => this.onWakeup());
    this.timer = new TimerSignal(this.mux);
    this.mux.register(this.timer.fd, { input: true, output: false }, () => this.onTimerFired());

    this.ownsTransport = opts.transport === undefined;
    this.transport = opts.transport ?? new UndiciTransport({ connections: opts.maxParallel });
    this.transport.attach(
      {
        socketStateChanged: (fd, action, token) => this.onSocketStateChanged(fd, action, token),
        timeoutRequested: (ms) => this.onTimeoutRequested(ms),
      },
      this.mux
    );

    const hooks = {
      onCallbackError: (request: HttpRequest, phase: CallbackPhase, error: unknown) =>
        this.emit("callback:error", { request, requestId: request.id, phase, error } satisfies CallbackErrorEvent),
    };
    this.pool = new ConnectionPool(
      opts.maxParallel,
      (slot) => new HttpConnection(slot, this.transport.createHandle(), hooks)
    );

    // Kick-start the engine's housekeeping.
    this.transport.driveOnTimeout();
    this.checkCompleted();
  }

  /**
   * Queue a request. Returns false once the client is closed or when
   * `timeoutSeconds` is unusable (NaN, or negative other than -1); otherwise
   * `callbacks.onDone` fires exactly once for it. A timeout of 0 means no limit.
   */
  submit(
    verb: HttpVerb,
    resource: string,
    callbacks: HttpClientCallbacks,
    content?: HttpRequestContent,
    queryParams?: RestParams,
    headers?: RestParams,
    timeoutSeconds = -1
  ): boolean {
    if (this.closed) return false;
    if (normalizeTimeout(timeoutSeconds) === undefined) return false;

    const request = createRequest({
      verb,
      url: buildUrl(this.baseUrl, resource, queryParams),
      callbacks,
      content,
      headers,
      timeoutSeconds,
    });

    const queueDepth = this.queue.push(request);
    this.emit("request:queued", { request, requestId: request.id, queueDepth } satisfies QueuedEvent);

    // Let the loop see the new work.
    this.wakeup.signal();
    return true;
  }

  get(resource: string, callbacks: HttpClientCallbacks, queryParams?: RestParams, headers?: RestParams, timeoutSeconds = -1): boolean {
    return this.submit("GET", resource, callbacks, undefined, queryParams, headers, timeoutSeconds);
  }

  head(resource: string, callbacks: HttpClientCallbacks, queryParams?: RestParams, headers?: RestParams, timeoutSeconds = -1): boolean {
    return this.submit("HEAD", resource, callbacks, undefined, queryParams, headers, timeoutSeconds);
  }

  post(
    resource: string,
    callbacks: HttpClientCallbacks,
    content: HttpRequestContent,
    queryParams?: RestParams,
    headers?: RestParams,
    timeoutSeconds = -1
  ): boolean {
    return this.submit("POST", resource, callbacks, content, queryParams, headers, timeoutSeconds);
  }

  put(
    resource: string,
    callbacks: HttpClientCallbacks,
    content: HttpRequestContent,
    queryParams?: RestParams,
    headers?: RestParams,
    timeoutSeconds = -1
  ): boolean {
    return this.submit("PUT", resource, callbacks, content, queryParams, headers, timeoutSeconds);
  }

  del(resource: string, callbacks: HttpClientCallbacks, queryParams?: RestParams, headers?: RestParams, timeoutSeconds = -1): boolean {
    return this.submit("DELETE", resource, callbacks, undefined, queryParams, headers, timeoutSeconds);
  }

  /**
   * Promise form of `submit`. Something must keep stepping the loop
   * (e.g. a LoopDriver) for the promise to settle.
   */
  request(init: HttpRequestInit): Promise<HttpResponse> {
    const cbs = new BufferingCallbacks();
    const accepted = this.submit(
      init.method,
      init.resource,
      cbs,
      init.body,
      init.query,
      init.headers,
      init.timeoutSeconds ?? -1
    );
    if (!accepted) {
      return Promise.reject(
        this.closed
          ? new Error("client is closed")
          : new RangeError(`timeoutSeconds must be >= 0 or -1 (got ${init.timeoutSeconds})`)
      );
    }
    return cbs.response;
  }

  /** Requests submitted but not bound to a connection yet. */
  pendingCount(): number {
    return this.queue.size;
  }

  fdToWaitOn(): Descriptor {
    return this.mux.fdToWaitOn();
  }

  processOneReadyEvent(): boolean {
    return this.mux.processOneReadyEvent();
  }

  whenReady(signal?: AbortSignal): Promise<void> {
    return this.mux.whenReady(signal);
  }

  snapshot(): ClientSnapshot {
    const p = this.pool.snapshot();
    return {
      queued: this.queue.size,
      bound: p.bound,
      free: p.free,
      capacity: p.capacity,
      timerArmed: this.timer.armed,
      closed: this.closed,
    };
  }

  /**
   * Stop accepting work. Queued and in-flight requests complete with
   * "Unknown"; the transport is closed if the client created it.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const request of this.queue.drainAll()) {
      this.safeDone(request);
    }
    for (const conn of this.pool.boundConnections()) {
      const request = conn.request;
      conn.finish("Unknown");
      this.recycle(conn, "Unknown", ResultCode.ABORTED_BY_CALLBACK, request);
    }

    this.timer.cancel();
    this.mux.unregister(this.wakeup.fd);
    this.mux.unregister(this.timer.fd);

    if (this.ownsTransport) await this.transport.close();
  }

  /* ---------------- loop handlers ---------------- */

  private onWakeup(): void {
    const coalesced = this.wakeup.drain();
    this.trace(`wakeup (${coalesced} signal(s))`, this.wakeup.fd);

    const available = this.pool.freeCount;
    if (available === 0) return;

    for (const request of this.queue.popUpTo(available)) {
      this.dispatch(request);
    }
  }

  private onTimerFired(): void {
    this.timer.read();
    this.trace("timer fired", this.timer.fd);
    this.transport.driveOnTimeout();
    this.checkCompleted();
  }

  private onSocketReady(event: ReadyEvent): void {
    this.trace(`socket ready in=${event.input} out=${event.output}`, event.fd);
    this.transport.driveOnSocketReady(event.fd, { input: event.input, output: event.output });
    this.checkCompleted();
  }

  private onHandleCompleted(handle: TransportHandle, result: string, cause?: Error): void {
    const conn = this.byHandle.get(handle.id);
    if (!conn) {
      this.violation(new InvariantViolationError(`completion for unknown handle ${handle.id}`));
      return;
    }

    const request = conn.request;
    const kind = conn.outcome(result);
    if (kind === "Unknown" && !conn.protocolError) {
      this.emit("transport:unknown-result", { result, cause, requestId: request?.id } satisfies UnknownResultEvent);
    }

    conn.finish(kind);
    this.recycle(conn, kind, result, request);
  }

  /* ---------------- transport host ---------------- */

  private onSocketStateChanged(fd: Descriptor, action: SocketAction, token: SocketToken | undefined): void {
    if (action === "remove") {
      this.mux.unregister(fd);
      return;
    }

    const interest = interestFor(action);
    if (token && this.mux.isRegistered(fd)) {
      this.mux.modify(fd, interest);
      return;
    }

    this.mux.register(fd, interest, (event) => this.onSocketReady(event));
    this.transport.assignSocket(fd, { fd });
  }

  private onTimeoutRequested(ms: number): void {
    if (ms < 0) {
      this.timer.cancel();
      return;
    }
    if (ms === 0) {
      // Run now rather than on the next pass of the loop.
      this.timer.cancel();
      this.transport.driveOnTimeout();
      this.checkCompleted();
      return;
    }
    this.timer.arm(ms);
  }

  /* ---------------- connection lifecycle ---------------- */

  private dispatch(request: HttpRequest): void {
    let conn: HttpConnection | undefined;
    try {
      conn = this.pool.acquire();
    } catch (err) {
      this.violation(toError(err), request);
    }
    if (!conn) {
      // Capacity was checked before popping; reaching this is a bookkeeping bug.
      this.violation(new InvariantViolationError("no free connection for a dequeued request"), request);
      this.safeDone(request);
      return;
    }

    try {
      conn.bind(request);
      const options = conn.configure(this.bufferSize);
      this.transport.configureHandle(conn.handle, options);
      this.byHandle.set(conn.handle.id, conn);
      this.startedAt.set(conn.handle.id, Date.now());
      this.emit("request:dispatched", {
        request,
        requestId: request.id,
        slot: conn.slot,
        handleId: conn.handle.id,
      } satisfies DispatchedEvent);
      this.transport.registerHandleForExecution(conn.handle);
    } catch (err) {
      this.violation(toError(err), request, conn.slot);
      if (conn.request === request) {
        conn.finish("Unknown");
        this.recycle(conn, "Unknown", ResultCode.ABORTED_BY_CALLBACK, request);
      } else {
        // bind() refused: the slot belongs to another request, leave it alone
        this.safeDone(request);
      }
    }
  }

  private checkCompleted(): void {
    for (const { handle, result, cause } of this.transport.pollCompletedHandles()) {
      this.onHandleCompleted(handle, result, cause);
    }
  }

  /**
   * Deregister the handle, return the slot to the pool and wake the loop so
   * queued work can claim it. A failed step is reported and recovery goes on.
   */
  private recycle(
    conn: HttpConnection,
    kind: HttpClientErrorKind,
    result: string,
    request: HttpRequest | undefined
  ): void {
    const handleId = conn.handle.id;
    const started = this.startedAt.get(handleId);

    try {
      this.transport.removeHandle(conn.handle);
    } catch (err) {
      this.violation(toError(err), request, conn.slot);
    }

    this.byHandle.delete(handleId);
    this.startedAt.delete(handleId);
    this.releaseQuietly(conn);

    if (request) {
      this.emit("request:done", {
        request,
        requestId: request.id,
        slot: conn.slot,
        kind,
        result,
        durationMs: started === undefined ? 0 : Date.now() - started,
      } satisfies DoneEvent);
    }

    if (!this.closed) this.wakeup.signal();
  }

  private releaseQuietly(conn: HttpConnection): void {
    try {
      this.pool.release(conn);
    } catch (err) {
      this.violation(toError(err), conn.request, conn.slot);
      conn.clear();
    }
  }

  private safeDone(request: HttpRequest): void {
    try {
      request.callbacks.onDone(request, "Unknown");
    } catch (err) {
      this.emit("callback:error", { request, requestId: request.id, phase: "onDone", error: err } satisfies CallbackErrorEvent);
    }
  }

  private violation(error: Error, request?: HttpRequest, slot?: number): void {
    const delivered = this.emit("invariant:violation", {
      error,
      slot,
      requestId: request?.id,
    } satisfies InvariantViolationEvent);
    // nobody listening: still make it visible
    if (!delivered) process.emitWarning(error.message, { type: error.name });
  }

  private trace(message: string, fd?: number): void {
    if (this.debug) this.emit("debug", { message, fd } satisfies DebugEvent);
  }
}
