// src/transport/types.ts
import type { HeaderField } from "../types.js";
import type { Descriptor, DescriptorTable, Readiness } from "../loop/multiplexer.js";

export const ResultCode = {
  OK: "OK",
  OPERATION_TIMEDOUT: "OPERATION_TIMEDOUT",
  COULDNT_RESOLVE_HOST: "COULDNT_RESOLVE_HOST",
  COULDNT_CONNECT: "COULDNT_CONNECT",
  SEND_ERROR: "SEND_ERROR",
  RECV_ERROR: "RECV_ERROR",
  WRITE_ERROR: "WRITE_ERROR", // a header/write callback refused data
  READ_ERROR: "READ_ERROR", // the upload supplier failed
  ABORTED_BY_CALLBACK: "ABORTED_BY_CALLBACK",
  URL_MALFORMAT: "URL_MALFORMAT",
  UNSUPPORTED_PROTOCOL: "UNSUPPORTED_PROTOCOL",
} as const;

export type ResultCode = (typeof ResultCode)[keyof typeof ResultCode];

/** Opaque unit of work owned by the engine; one per pooled connection. */
export interface TransportHandle {
  readonly id: number;
}

export interface UploadSource {
  length: number;
  /** Fill `buffer` from the current offset; 0 means end of body. */
  read(buffer: Buffer): number;
}

export interface HandleOptions {
  url: string;
  method: string;
  /** An empty value clears a header the engine would otherwise send. */
  headers: ReadonlyArray<HeaderField>;
  upload?: UploadSource;
  noBody: boolean;
  timeoutMs?: number;
  bufferSize: number;
  /** Returning false aborts the transfer with WRITE_ERROR. */
  onHeader(line: string): boolean;
  onWrite(chunk: Buffer): boolean;
}

export type SocketAction = "in" | "out" | "inout" | "remove";

/** Assigned by the host the first time it registers a socket descriptor. */
export interface SocketToken {
  readonly fd: Descriptor;
}

export interface TransportHost {
  socketStateChanged(fd: Descriptor, action: SocketAction, token: SocketToken | undefined): void;
  /** -1 cancels the housekeeping timer; 0 asks for `driveOnTimeout` right away. */
  timeoutRequested(ms: number): void;
}

export interface CompletedHandle {
  handle: TransportHandle;
  result: string;
  cause?: Error;
}

/**
 * Readiness-driven HTTP engine. Everything except `close` is synchronous and
 * is called from the loop-driving call stack only.
 */
export interface TransportEngine {
  attach(host: TransportHost, descriptors: DescriptorTable): void;
  createHandle(): TransportHandle;
  configureHandle(handle: TransportHandle, options: HandleOptions): void;
  registerHandleForExecution(handle: TransportHandle): void;
  removeHandle(handle: TransportHandle): void;
  assignSocket(fd: Descriptor, token: SocketToken): void;
  driveOnSocketReady(fd: Descriptor, readiness: Readiness): number;
  driveOnTimeout(): number;
  pollCompletedHandles(): CompletedHandle[];
  close(): Promise<void>;
}
