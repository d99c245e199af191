// demo/loadgen.ts
import { HttpClient } from "../src/client.js";
import { HttpRequestError } from "../src/errors.js";
import type { DebugEvent, DoneEvent, InvariantViolationEvent, UnknownResultEvent } from "../src/events.js";
import { LoopDriver } from "../src/loop/driver.js";
import type { HttpClientErrorKind } from "../src/types.js";

const UPSTREAM = process.env.UPSTREAM ?? "http://127.0.0.1:3001";
const TOTAL = Number(process.env.TOTAL ?? 500);
const MAX_PARALLEL = Number(process.env.MAX_PARALLEL ?? 10);
const TIMEOUT_S = Number(process.env.REQUEST_TIMEOUT_S ?? 0.12);
const UPLOAD_BYTES = Number(process.env.UPLOAD_BYTES ?? 100_000);
const VERBOSE = process.env.VERBOSE === "1";

const client = new HttpClient({
  baseUrl: UPSTREAM,
  maxParallel: MAX_PARALLEL,
  debug: process.env.DEBUG_LOOP === "1",
});
const driver = new LoopDriver(client);

const c: Record<"ok" | "http5xx", number> & Partial<Record<HttpClientErrorKind, number>> = { ok: 0, http5xx: 0 };

client.on("transport:unknown-result", (e: UnknownResultEvent) => {
  // eslint-disable-next-line no-console
  console.warn(`[transport] unmapped result ${e.result}`, e.cause?.message ?? "");
});

client.on("invariant:violation", (e: InvariantViolationEvent) => {
  // eslint-disable-next-line no-console
  console.error(`[invariant] slot=${e.slot ?? "-"} ${e.error.message}`);
});

client.on("request:done", (e: DoneEvent) => {
  if (!VERBOSE) return;
  // eslint-disable-next-line no-console
  console.log(`[done] #${e.requestId} slot=${e.slot} ${e.kind} (${e.result}) ${e.durationMs}ms`);
});

client.on("debug", (e: DebugEvent) => {
  // eslint-disable-next-line no-console
  console.log(`[loop] fd=${e.fd ?? "-"} ${e.message}`);
});

async function one(i: number) {
  try {
    // every tenth request uploads a body
    const resp =
      i % 10 === 0
        ? await client.request({
            method: "PUT",
            resource: "/echo",
            body: { body: Buffer.alloc(UPLOAD_BYTES, 0x61), contentType: "application/octet-stream" },
            timeoutSeconds: TIMEOUT_S,
          })
        : await client.request({
            method: "GET",
            resource: "/flaky",
            query: { i: String(i) },
            timeoutSeconds: TIMEOUT_S,
          });
    if (resp.status >= 500) c.http5xx++;
    else c.ok++;
  } catch (err) {
    const kind: HttpClientErrorKind = err instanceof HttpRequestError ? err.kind : "Unknown";
    c[kind] = (c[kind] ?? 0) + 1;
  }

  const settled = Object.values(c).reduce((a, b) => a + (b ?? 0), 0);
  if (settled % 50 === 0) {
    const snap = client.snapshot();
    // eslint-disable-next-line no-console
    console.log(`[snap] bound=${snap.bound}/${snap.capacity} queued=${snap.queued} settled=${settled}`);
  }
}

async function main() {
  // eslint-disable-next-line no-console
  console.log(`[loadgen] upstream=${UPSTREAM} total=${TOTAL} maxParallel=${MAX_PARALLEL}`);

  driver.start();
  try {
    // everything is submitted up front; the pool bounds what is in flight
    await Promise.all(Array.from({ length: TOTAL }, (_, i) => one(i)));
  } finally {
    await driver.stop();
    await client.close();
  }

  // eslint-disable-next-line no-console
  console.log(`[done]`, c);
  // eslint-disable-next-line no-console
  console.log(`[final snapshot]`, client.snapshot());
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
