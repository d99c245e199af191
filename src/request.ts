// src/request.ts
import type {
  HeaderField,
  HttpClientCallbacks,
  HttpRequest,
  HttpRequestContent,
  HttpVerb,
  RestParams,
} from "./types.js";

let nextRequestId = 1;

function isFieldList(params: RestParams): params is ReadonlyArray<HeaderField> {
  return Array.isArray(params);
}

export function toFields(params: RestParams | undefined): HeaderField[] {
  if (!params) return [];
  if (isFieldList(params)) return params.map(([k, v]) => [k, v] as const);
  return Object.entries(params);
}

/**
 * baseUrl + resource + "?" + escaped query string (omitted when empty).
 */
export function buildUrl(baseUrl: string, resource: string, query?: RestParams): string {
  const search = new URLSearchParams();
  for (const [k, v] of toFields(query)) search.append(k, v);
  const qs = search.toString();
  return qs ? `${baseUrl}${resource}?${qs}` : `${baseUrl}${resource}`;
}

function toBuffer(body: HttpRequestContent["body"]): Buffer {
  if (typeof body === "string") return Buffer.from(body, "utf8");
  if (Buffer.isBuffer(body)) return body;
  return Buffer.from(body.buffer, body.byteOffset, body.byteLength);
}

/**
 * Per-request timeout in seconds, with -1 meaning "no limit". 0 and Infinity
 * also mean no limit. Undefined for NaN and negative values other than -1.
 */
export function normalizeTimeout(seconds: number): number | undefined {
  if (seconds === -1 || seconds === 0 || seconds === Number.POSITIVE_INFINITY) return -1;
  if (Number.isNaN(seconds) || seconds < 0) return undefined;
  return seconds;
}

export function createRequest(init: {
  verb: HttpVerb;
  url: string;
  callbacks: HttpClientCallbacks;
  content?: HttpRequestContent;
  headers?: RestParams;
  timeoutSeconds?: number;
}): HttpRequest {
  const timeoutSeconds = normalizeTimeout(init.timeoutSeconds ?? -1);
  if (timeoutSeconds === undefined) {
    throw new RangeError(`timeoutSeconds must be >= 0 or -1 (got ${init.timeoutSeconds})`);
  }

  return Object.freeze({
    id: nextRequestId++,
    verb: init.verb,
    url: init.url,
    body: init.content ? toBuffer(init.content.body) : Buffer.alloc(0),
    contentType: init.content?.contentType ?? "",
    headers: Object.freeze(toFields(init.headers)),
    timeoutSeconds,
    callbacks: init.callbacks,
  });
}
