// test/client.test.ts
import { describe, expect, it, vi } from "vitest";
import { HttpClient } from "../src/client.js";
import { ConfigurationError, HttpRequestError, InvariantViolationError } from "../src/errors.js";
import type {
  CallbackErrorEvent,
  DebugEvent,
  DispatchedEvent,
  DoneEvent,
  InvariantViolationEvent,
  UnknownResultEvent,
} from "../src/events.js";
import { ResultCode } from "../src/transport/types.js";
import type { HttpClientCallbacks } from "../src/types.js";
import { RecordingCallbacks } from "./helpers/recorder.js";
import { ScriptedTransport, runUntilIdle } from "./helpers/scriptedTransport.js";

const BASE = "http://upstream.test";

function makeClient(maxParallel = 2, extra: { debug?: boolean } = {}) {
  const transport = new ScriptedTransport();
  const client = new HttpClient({ baseUrl: BASE, maxParallel, transport, ...extra });
  const dispatched: DispatchedEvent[] = [];
  const finished: DoneEvent[] = [];
  client.on("request:dispatched", (e: DispatchedEvent) => dispatched.push(e));
  client.on("request:done", (e: DoneEvent) => finished.push(e));
  return { client, transport, dispatched, finished, cbs: new RecordingCallbacks() };
}

describe("HttpClient construction", () => {
  it("rejects bounded queues before touching the transport", () => {
    const transport = new ScriptedTransport();

    expect(() => new HttpClient({ baseUrl: BASE, maxParallel: 2, queueSize: 5, transport })).toThrow(
      ConfigurationError
    );
    expect(transport.attached).toBe(false);
    expect(transport.createdHandles).toBe(0);
  });

  it("rejects a non-positive maxParallel", () => {
    expect(() => new HttpClient({ baseUrl: BASE, maxParallel: 0, transport: new ScriptedTransport() })).toThrow(
      /maxParallel/
    );
  });

  it("creates one handle per connection up front", () => {
    const { client, transport } = makeClient(3);

    expect(transport.attached).toBe(true);
    expect(transport.createdHandles).toBe(3);
    expect(client.snapshot()).toEqual({
      queued: 0,
      bound: 0,
      free: 3,
      capacity: 3,
      timerArmed: false,
      closed: false,
    });
  });

  it("exposes the multiplexer descriptor to wait on", () => {
    expect(makeClient().client.fdToWaitOn()).toBe(0);
  });
});

describe("HttpClient dispatch", () => {
  it("queues submissions until the loop runs, then completes them", () => {
    const { client, cbs, transport } = makeClient();

    expect(client.get("/a", cbs)).toBe(true);
    expect(client.pendingCount()).toBe(1);
    expect(transport.started).toEqual([]);

    // wakeup, socket ready, wakeup after the slot was recycled
    expect(runUntilIdle(client)).toBe(3);

    expect(client.pendingCount()).toBe(0);
    expect(cbs.starts).toEqual([{ url: `${BASE}/a`, version: "HTTP/1.1", code: 200 }]);
    expect(cbs.headersFor(`${BASE}/a`)).toEqual(["Content-Length: 0\r\n", "\r\n"]);
    expect(cbs.doneFor(`${BASE}/a`)).toEqual(["None"]);
    expect(client.snapshot().bound).toBe(0);
  });

  it("never binds more than maxParallel requests at once", () => {
    const { client, cbs, transport } = makeClient(2);
    for (const p of ["/1", "/2", "/3", "/4", "/5"]) {
      transport.route(`${BASE}${p}`, { head: ["HTTP/1.1 200 OK\r\n", "\r\n"], hold: true });
      client.get(p, cbs);
    }

    runUntilIdle(client);

    expect(transport.inFlight()).toEqual([`${BASE}/1`, `${BASE}/2`]);
    expect(client.pendingCount()).toBe(3);
    expect(client.snapshot()).toMatchObject({ queued: 3, bound: 2, free: 0 });

    transport.complete(`${BASE}/1`);
    runUntilIdle(client);

    expect(transport.inFlight()).toEqual([`${BASE}/2`, `${BASE}/3`]);
    expect(client.pendingCount()).toBe(2);
  });

  it("dispatches in submission order and hands a freed slot to the next queued request", () => {
    const { client, cbs, transport, dispatched } = makeClient(2);
    transport.route(`${BASE}/b`, { head: ["HTTP/1.1 200 OK\r\n", "\r\n"], hold: true });

    client.get("/a", cbs);
    client.get("/b", cbs);
    client.get("/c", cbs);
    runUntilIdle(client);

    expect(dispatched.map((e) => [e.request.url, e.slot])).toEqual([
      [`${BASE}/a`, 0],
      [`${BASE}/b`, 1],
      [`${BASE}/c`, 0],
    ]);
    expect(cbs.done.map((d) => d.url)).toEqual([`${BASE}/a`, `${BASE}/c`]);

    transport.complete(`${BASE}/b`);
    runUntilIdle(client);
    expect(cbs.done.map((d) => d.url)).toEqual([`${BASE}/a`, `${BASE}/c`, `${BASE}/b`]);
  });

  it("reuses the same connection and handle for every request at capacity 1", () => {
    const { client, cbs, transport, dispatched } = makeClient(1);
    for (let i = 0; i < 20; i++) client.get(`/r${i}`, cbs);

    runUntilIdle(client);

    expect(cbs.done).toHaveLength(20);
    expect(cbs.done.every((d) => d.kind === "None")).toBe(true);
    expect(new Set(dispatched.map((e) => e.slot))).toEqual(new Set([0]));
    expect(new Set(dispatched.map((e) => e.handleId))).toEqual(new Set([1]));
    expect(transport.createdHandles).toBe(1);
    expect(transport.removed).toHaveLength(20);
  });

  it("builds the URL from base, resource and escaped query parameters", () => {
    const { client, cbs, transport } = makeClient();

    client.get("/search", cbs, { q: "a b", page: "2" });
    runUntilIdle(client);

    expect(transport.started.map((o) => o.url)).toEqual([`${BASE}/search?q=a+b&page=2`]);
  });

  it("passes the per-request timeout to the transport in milliseconds", () => {
    const { client, cbs, transport } = makeClient();

    client.get("/slow", cbs, undefined, undefined, 2);
    runUntilIdle(client);

    expect(transport.started[0]?.timeoutMs).toBe(2000);
  });

  it("reports only the final response of a 100 Continue exchange", () => {
    const { client, cbs, transport } = makeClient();
    transport.route(`${BASE}/upload`, {
      head: ["HTTP/1.1 100 Continue\r\n", "\r\n", "HTTP/1.1 200 OK\r\n", "Content-Length: 0\r\n", "\r\n"],
    });

    client.post("/upload", cbs, { body: "payload", contentType: "text/plain" });
    runUntilIdle(client);

    expect(cbs.starts).toEqual([{ url: `${BASE}/upload`, version: "HTTP/1.1", code: 200 }]);
    expect(cbs.headersFor(`${BASE}/upload`)).toEqual(["Content-Length: 0\r\n", "\r\n"]);
    expect(cbs.doneFor(`${BASE}/upload`)).toEqual(["None"]);
  });

  it("streams a PUT body through the upload supplier with an explicit length", () => {
    const { client, cbs, transport } = makeClient();

    client.put("/blob", cbs, { body: Buffer.alloc(10000, 1), contentType: "application/octet-stream" });
    runUntilIdle(client);

    expect(transport.uploadReads.get(`${BASE}/blob`)).toEqual([4096, 4096, 1808, 0]);
    expect(transport.started[0]?.headers).toContainEqual(["Content-Length", "10000"]);
    expect(cbs.doneFor(`${BASE}/blob`)).toEqual(["None"]);
  });

  it("does not deliver a body for HEAD", () => {
    const { client, cbs, transport } = makeClient();
    transport.route(`${BASE}/h`, { head: ["HTTP/1.1 200 OK\r\n", "Content-Length: 4\r\n", "\r\n"], chunks: ["body"] });

    client.head("/h", cbs);
    runUntilIdle(client);

    expect(transport.started[0]?.noBody).toBe(true);
    expect(cbs.data).toEqual([]);
    expect(cbs.doneFor(`${BASE}/h`)).toEqual(["None"]);
  });

  it("delivers body chunks in order", () => {
    const { client, cbs, transport } = makeClient();
    transport.route(`${BASE}/d`, { head: ["HTTP/1.1 200 OK\r\n", "\r\n"], chunks: ["hel", "lo"] });

    client.get("/d", cbs);
    runUntilIdle(client);

    expect(cbs.data.map((d) => d.chunk)).toEqual(["hel", "lo"]);
  });
});

describe("HttpClient timeouts", () => {
  it("treats a zero timeout as no limit", () => {
    const { client, cbs, transport } = makeClient();

    expect(client.get("/a", cbs, undefined, undefined, 0)).toBe(true);
    runUntilIdle(client);

    expect(transport.started[0]?.timeoutMs).toBeUndefined();
    expect(cbs.doneFor(`${BASE}/a`)).toEqual(["None"]);
  });

  it("refuses unusable timeouts by returning false", () => {
    const { client, cbs } = makeClient();

    expect(client.get("/a", cbs, undefined, undefined, -5)).toBe(false);
    expect(client.get("/a", cbs, undefined, undefined, Number.NaN)).toBe(false);

    expect(client.pendingCount()).toBe(0);
    expect(runUntilIdle(client)).toBe(0);
    expect(cbs.done).toEqual([]);
  });

  it("rejects the promise form instead of throwing", async () => {
    const { client } = makeClient();

    const pending = client.request({ method: "GET", resource: "/a", timeoutSeconds: -5 });

    await expect(pending).rejects.toBeInstanceOf(RangeError);
  });
});

describe("HttpClient invariant recovery", () => {
  function watch(client: HttpClient): InvariantViolationEvent[] {
    const violations: InvariantViolationEvent[] = [];
    client.on("invariant:violation", (e: InvariantViolationEvent) => violations.push(e));
    return violations;
  }

  it("recycles the slot when deregistering a finished handle fails", () => {
    const { client, cbs, transport, dispatched } = makeClient(1);
    const violations = watch(client);
    transport.failRemovals = 1;

    client.get("/a", cbs);
    client.get("/b", cbs);
    runUntilIdle(client);

    expect(violations.map((v) => [v.error.message, v.slot])).toEqual([["cannot deregister handle 1", 0]]);
    expect(violations[0]?.requestId).toBe(dispatched[0]?.requestId);
    expect(cbs.done).toEqual([
      { url: `${BASE}/a`, kind: "None" },
      { url: `${BASE}/b`, kind: "None" },
    ]);
    expect(dispatched.map((e) => e.slot)).toEqual([0, 0]);
    expect(transport.removed).toEqual([1]);
    expect(client.snapshot()).toMatchObject({ bound: 0, free: 1 });
  });

  it("reports a completion for a handle it never registered and keeps going", () => {
    const { client, cbs, transport } = makeClient(1);
    const violations = watch(client);

    transport.injectCompletion({ id: 99 }, ResultCode.OK);
    client.get("/a", cbs);
    runUntilIdle(client);

    expect(violations.map((v) => v.error.message)).toEqual(["completion for unknown handle 99"]);
    expect(violations[0]?.error).toBeInstanceOf(InvariantViolationError);
    expect(cbs.doneFor(`${BASE}/a`)).toEqual(["None"]);
    expect(client.snapshot().free).toBe(1);
  });

  it("falls back to a process warning when nobody listens", () => {
    const { client, cbs, transport } = makeClient(1);
    const warn = vi.spyOn(process, "emitWarning").mockImplementation(() => undefined);

    try {
      transport.injectCompletion({ id: 99 }, ResultCode.OK);
      client.get("/a", cbs);
      runUntilIdle(client);

      expect(warn).toHaveBeenCalledWith("completion for unknown handle 99", { type: "InvariantViolationError" });
      expect(cbs.doneFor(`${BASE}/a`)).toEqual(["None"]);
    } finally {
      warn.mockRestore();
    }
  });
});

describe("HttpClient error translation", () => {
  it("maps transport results onto error kinds, one onDone per request", () => {
    const { client, cbs, transport } = makeClient(4);
    const unknown: UnknownResultEvent[] = [];
    client.on("transport:unknown-result", (e: UnknownResultEvent) => unknown.push(e));
    const cases: Array<[string, string]> = [
      ["/timeout", ResultCode.OPERATION_TIMEDOUT],
      ["/nohost", ResultCode.COULDNT_RESOLVE_HOST],
      ["/refused", ResultCode.COULDNT_CONNECT],
      ["/weird", "ERR_SOMETHING_ELSE"],
    ];
    for (const [path, result] of cases) {
      transport.route(`${BASE}${path}`, { head: [], result });
      client.get(path, cbs);
    }

    runUntilIdle(client);

    expect(cbs.doneFor(`${BASE}/timeout`)).toEqual(["Timeout"]);
    expect(cbs.doneFor(`${BASE}/nohost`)).toEqual(["HostNotFound"]);
    expect(cbs.doneFor(`${BASE}/refused`)).toEqual(["CouldNotConnect"]);
    expect(cbs.doneFor(`${BASE}/weird`)).toEqual(["Unknown"]);
    expect(unknown.map((e) => e.result)).toEqual(["ERR_SOMETHING_ELSE"]);
  });

  it("finishes a malformed response with ProtocolParseError and keeps serving others", () => {
    const { client, cbs, transport, finished } = makeClient(2);
    const unknown: UnknownResultEvent[] = [];
    client.on("transport:unknown-result", (e: UnknownResultEvent) => unknown.push(e));
    transport.route(`${BASE}/bad`, { head: ["HTTP/1.1\r\n", "\r\n"] });

    client.get("/bad", cbs);
    client.get("/good", cbs);
    runUntilIdle(client);

    expect(cbs.doneFor(`${BASE}/bad`)).toEqual(["ProtocolParseError"]);
    expect(cbs.doneFor(`${BASE}/good`)).toEqual(["None"]);
    expect(unknown).toEqual([]);
    expect(finished.find((e) => e.request.url === `${BASE}/bad`)?.result).toBe(ResultCode.WRITE_ERROR);
    expect(client.snapshot().free).toBe(2);
  });

  it("reports a throwing callback and keeps the connection usable", () => {
    const { client, cbs } = makeClient(1);
    const errors: CallbackErrorEvent[] = [];
    client.on("callback:error", (e: CallbackErrorEvent) => errors.push(e));
    const boom = new Error("boom");
    const throwing: HttpClientCallbacks = {
      onResponseStart: () => undefined,
      onHeader: () => undefined,
      onData: () => undefined,
      onDone: () => {
        throw boom;
      },
    };

    client.get("/first", throwing);
    client.get("/second", cbs);
    runUntilIdle(client);

    expect(errors.map((e) => [e.phase, e.error])).toEqual([["onDone", boom]]);
    expect(cbs.doneFor(`${BASE}/second`)).toEqual(["None"]);
  });

  it("finishes with Unknown when a header callback throws", () => {
    const { client } = makeClient(1);
    const kinds: string[] = [];
    client.on("callback:error", () => kinds.push("callback:error"));
    const callbacks: HttpClientCallbacks = {
      onResponseStart: () => {
        throw new Error("nope");
      },
      onHeader: () => undefined,
      onData: () => undefined,
      onDone: (_request, kind) => kinds.push(kind),
    };

    client.get("/x", callbacks);
    runUntilIdle(client);

    expect(kinds).toEqual(["callback:error", "Unknown"]);
  });
});

describe("HttpClient promise form", () => {
  it("resolves with the buffered response", async () => {
    const { client, transport } = makeClient();
    transport.route(`${BASE}/json`, {
      head: ["HTTP/1.1 200 OK\r\n", "Content-Type: application/json\r\n", "X-Tag: a\r\n", "X-Tag: b\r\n", "\r\n"],
      chunks: ['{"ok":', "true}"],
    });

    const pending = client.request({ method: "GET", resource: "/json" });
    runUntilIdle(client);
    const res = await pending;

    expect(res.status).toBe(200);
    expect(res.version).toBe("HTTP/1.1");
    expect(res.headers).toEqual({ "content-type": "application/json", "x-tag": "a, b" });
    expect(Buffer.from(res.body).toString()).toBe('{"ok":true}');
  });

  it("rejects with HttpRequestError carrying the kind", async () => {
    const { client, transport } = makeClient();
    transport.route(`${BASE}/down`, { head: [], result: ResultCode.COULDNT_CONNECT });

    const pending = client.request({ method: "GET", resource: "/down" });
    runUntilIdle(client);

    await expect(pending).rejects.toBeInstanceOf(HttpRequestError);
    await expect(pending).rejects.toMatchObject({ kind: "CouldNotConnect", url: `${BASE}/down` });
  });

  it("rejects straight away once the client is closed", async () => {
    const { client } = makeClient();
    await client.close();

    await expect(client.request({ method: "GET", resource: "/late" })).rejects.toThrow(/closed/);
  });
});

describe("HttpClient close", () => {
  it("finishes queued and in-flight requests with Unknown and refuses new work", async () => {
    const { client, cbs, transport, finished } = makeClient(1);
    transport.route(`${BASE}/held`, { head: ["HTTP/1.1 200 OK\r\n", "\r\n"], hold: true });

    client.get("/held", cbs);
    client.get("/queued", cbs);
    runUntilIdle(client);
    await client.close();

    expect(cbs.done).toEqual([
      { url: `${BASE}/queued`, kind: "Unknown" },
      { url: `${BASE}/held`, kind: "Unknown" },
    ]);
    expect(finished.map((e) => e.result)).toEqual([ResultCode.ABORTED_BY_CALLBACK]);
    expect(client.get("/after", cbs)).toBe(false);
    expect(client.snapshot()).toMatchObject({ queued: 0, bound: 0, free: 1, closed: true });
    expect(transport.inFlight()).toEqual([]);
    // the transport was supplied by the caller, who closes it
    expect(transport.closed).toBe(false);
    expect(runUntilIdle(client)).toBe(0);
  });
});

describe("HttpClient debug tracing", () => {
  it("emits debug events only when enabled", () => {
    const quiet = makeClient(1);
    const silent: DebugEvent[] = [];
    quiet.client.on("debug", (e: DebugEvent) => silent.push(e));
    quiet.client.get("/a", quiet.cbs);
    runUntilIdle(quiet.client);
    expect(silent).toEqual([]);

    const loud = makeClient(1, { debug: true });
    const traced: DebugEvent[] = [];
    loud.client.on("debug", (e: DebugEvent) => traced.push(e));
    loud.client.get("/a", loud.cbs);
    runUntilIdle(loud.client);

    expect(traced[0]).toEqual({ message: "wakeup (1 signal(s))", fd: 1 });
    expect(traced[1]).toEqual({ message: "socket ready in=true out=false", fd: 3 });
  });
});
