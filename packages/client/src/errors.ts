export type EventClientErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_RANGE"
  | "INVALID_CONFIG"
  | "CONNECTION_ERROR"
  | "DECODE_ERROR"
  | "SERVER_ERROR"
  | "ENCODING_ERROR";

export type ConnectionFailureReason = "refused" | "timeout" | "dropped" | "closed" | "cancelled";

export interface EventClientErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class EventClientError extends Error {
  readonly code: EventClientErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: EventClientErrorCode, message: string, options: EventClientErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.code = code;
    this.details = options.details;
    this.name = this.constructor.name;
  }
}

export class InvalidAddressError extends EventClientError {
  constructor(message: string, options?: EventClientErrorOptions) {
    super("INVALID_ADDRESS", message, options);
  }
}

export class InvalidRangeError extends EventClientError {
  constructor(message: string, options?: EventClientErrorOptions) {
    super("INVALID_RANGE", message, options);
  }
}

export class InvalidConfigError extends EventClientError {
  constructor(message: string, options?: EventClientErrorOptions) {
    super("INVALID_CONFIG", message, options);
  }
}

export class ConnectionError extends EventClientError {
  readonly reason: ConnectionFailureReason;

  constructor(reason: ConnectionFailureReason, message: string, options?: EventClientErrorOptions) {
    super("CONNECTION_ERROR", message, options);
    this.reason = reason;
  }
}

export class DecodeError extends EventClientError {
  constructor(message: string, options?: EventClientErrorOptions) {
    super("DECODE_ERROR", message, options);
  }
}

/** gRPC status names indexed by code. */
export const GRPC_STATUS_NAMES = [
  "OK",
  "CANCELLED",
  "UNKNOWN",
  "INVALID_ARGUMENT",
  "DEADLINE_EXCEEDED",
  "NOT_FOUND",
  "ALREADY_EXISTS",
  "PERMISSION_DENIED",
  "RESOURCE_EXHAUSTED",
  "FAILED_PRECONDITION",
  "ABORTED",
  "OUT_OF_RANGE",
  "UNIMPLEMENTED",
  "INTERNAL",
  "UNAVAILABLE",
  "DATA_LOSS",
  "UNAUTHENTICATED",
] as const;

export function grpcStatusName(code: number): string {
  return GRPC_STATUS_NAMES[code] ?? `STATUS_${code}`;
}

export class ServerError extends EventClientError {
  /** Numeric gRPC status code. */
  readonly status: number;
  readonly statusName: string;
  readonly serverMessage: string;

  constructor(status: number, serverMessage: string, options?: EventClientErrorOptions) {
    const statusName = grpcStatusName(status);
    super("SERVER_ERROR", serverMessage ? `${statusName}: ${serverMessage}` : statusName, options);
    this.status = status;
    this.statusName = statusName;
    this.serverMessage = serverMessage;
  }
}

export class EncodingError extends EventClientError {
  constructor(message: string, options?: EventClientErrorOptions) {
    super("ENCODING_ERROR", message, options);
  }
}

export function isEventClientError(err: unknown): err is EventClientError {
  return err instanceof EventClientError;
}
