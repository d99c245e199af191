export { HttpClient } from "./client.js";
export { BufferingCallbacks, normalizeHeaders } from "./callbacks.js";
export { HttpConnection } from "./connection.js";
export type { CallbackPhase, ConnectionHooks } from "./connection.js";
export { ConnectionPool } from "./pool.js";
export type { PooledConnection } from "./pool.js";
export { RequestQueue } from "./queue.js";
export { buildUrl, createRequest, normalizeTimeout } from "./request.js";
export {
  ConfigurationError,
  HttpRequestError,
  InvariantViolationError,
  ProtocolParseError,
  RequestTimeoutError,
  translateResult,
} from "./errors.js";
export { LoopDriver } from "./loop/driver.js";
export type { LoopDriverOptions, Steppable } from "./loop/driver.js";
export { Multiplexer } from "./loop/multiplexer.js";
export type { Descriptor, DescriptorTable, Interest, Readiness, ReadyEvent, ReadyHandler } from "./loop/multiplexer.js";
export { MAX_TIMER_DELAY, TimerSignal } from "./loop/timer.js";
export { WakeupSignal } from "./loop/wakeup.js";
export { ResultCode } from "./transport/types.js";
export type {
  CompletedHandle,
  HandleOptions,
  SocketAction,
  SocketToken,
  TransportEngine,
  TransportHandle,
  TransportHost,
  UploadSource,
} from "./transport/types.js";
export { UndiciTransport } from "./transport/undici.js";
export type { UndiciTransportOptions } from "./transport/undici.js";
export type * from "./events.js";
export type { ClientSnapshot } from "./snapshot.js";
export type * from "./types.js";
