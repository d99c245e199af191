// demo/upstream.ts
import http from "node:http";

const PORT = Number(process.env.UPSTREAM_PORT ?? 3001);

// Behavior knobs
const FAIL_RATE = Number(process.env.FAIL_RATE ?? 0.35); // 35% 500s
const SLOW_RATE = Number(process.env.SLOW_RATE ?? 0.25); // 25% slow responses
const SLOW_MS = Number(process.env.SLOW_MS ?? 300);      // slow delay

function json(res: http.ServerResponse, status: number, payload: unknown) {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

const server = http.createServer((req, res) => {
  if (!req.url) return json(res, 400, { ok: false, kind: "bad-request" });

  if (req.url.startsWith("/health")) {
    res.statusCode = 200;
    return res.end("ok");
  }

  // Counts the uploaded bytes.
  if (req.url.startsWith("/echo")) {
    let received = 0;
    req.on("data", (chunk: Buffer) => {
      received += chunk.length;
    });
    req.on("end", () =>
      json(res, 200, {
        ok: true,
        kind: "echo",
        method: req.method,
        received,
        declared: req.headers["content-length"] ?? null,
      })
    );
    return;
  }

  const r = Math.random();

  // Fail
  if (r < FAIL_RATE) return json(res, 500, { ok: false, kind: "fail", ts: Date.now() });

  // Slow
  if (r < FAIL_RATE + SLOW_RATE) {
    setTimeout(() => json(res, 200, { ok: true, kind: "slow", ts: Date.now() }), SLOW_MS);
    return;
  }

  // Normal
  json(res, 200, { ok: true, kind: "fast", ts: Date.now() });
});

server.listen(PORT, "127.0.0.1", () => {
  // eslint-disable-next-line no-console
  console.log(
    `[upstream] listening on http://127.0.0.1:${PORT} (FAIL_RATE=${FAIL_RATE}, SLOW_RATE=${SLOW_RATE}, SLOW_MS=${SLOW_MS})`
  );
});
