import type { CallbackPhase } from "./connection.js";
import type { HttpClientErrorKind, HttpRequest } from "./types.js";

export type HttpClientEventName =
  | "request:queued"
  | "request:dispatched"
  | "request:done"
  | "transport:unknown-result"
  | "invariant:violation"
  | "callback:error"
  | "debug";

export interface RequestEventBase {
  request: HttpRequest;
  requestId: number;
}

export interface QueuedEvent extends RequestEventBase {
  queueDepth: number;
}

export interface DispatchedEvent extends RequestEventBase {
  slot: number;
  handleId: number;
}

export interface DoneEvent extends RequestEventBase {
  slot: number;
  kind: HttpClientErrorKind;
  result: string;      // raw transport result code
  durationMs: number;
}

export interface UnknownResultEvent {
  result: string;
  cause?: Error;
  requestId?: number;
}

export interface InvariantViolationEvent {
  error: Error;
  slot?: number;
  requestId?: number;
}

export interface CallbackErrorEvent extends RequestEventBase {
  phase: CallbackPhase;
  error: unknown;
}

export interface DebugEvent {
  message: string;
  fd?: number;
}
