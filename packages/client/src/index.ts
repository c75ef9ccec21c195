export { EventClient, type GetTtpEventsOptions } from "./event-client";
export { TokenTransferEventStream } from "./event-stream";
export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_MAX_FRAME_BYTES,
  EventClientSettingsSchema,
  resolveEventClientSettings,
  resolveServerAddress,
  type EventClientOptions,
  type EventClientSettings,
  type EventClientSettingsInit,
} from "./config";
export {
  ConnectionError,
  DecodeError,
  EncodingError,
  EventClientError,
  InvalidAddressError,
  InvalidConfigError,
  InvalidRangeError,
  ServerError,
  grpcStatusName,
  isEventClientError,
  type ConnectionFailureReason,
  type EventClientErrorCode,
} from "./errors";
export {
  TokenTransferEvent,
  type AssetDescriptor,
  type TokenTransferEventParams,
  type TokenTransferKind,
} from "./domain/TokenTransferEvent";
export { buildEventRequest, encodeEventRequest, MAX_LEDGER_SEQUENCE, type EventRequest } from "./request/event-request";
export { FrameDecoder, type FrameDecoderState } from "./decoder/frame-decoder";
export { EventStreamDecoder } from "./decoder/event-stream-decoder";
export { encodeFrame, encodeTrailerFrame, FRAME_HEADER_SIZE, type Frame, type FrameKind } from "./decoder/frame";
export { parseTrailers, type GrpcStatus } from "./decoder/trailers";
export { AccountFilter } from "./filter/account-filter";
export { ConnectionManager, grpcStatusFromHttp, type ConnectionHandle } from "./connection/connection-manager";
export { FetchTransport, type FetchLike, type FetchTransportOptions } from "./transport/fetch-transport";
export type { Transport, TransportRequest, TransportResponse } from "./transport/types";
export { formatAsset, formatTokenTransferEvent } from "./format";
export { ConsoleSink } from "./sinks/console";
export { pipeToSink } from "./sinks/pipe";
export type { EventSink, EventSinkContext, EventSinkMeta } from "./sinks/event-sink";
export {
  createConsoleLogger,
  createLineLogger,
  formatLogLine,
  LOG_LEVELS,
  NOOP_LOGGER,
  type LoggerOptions,
} from "./logger";
export type { EventClientLogger, EventStreamMetrics, LedgerSequence, LogLevel, LogMeta } from "./types";
