export type LogMeta = Record<string, unknown>;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EventClientLogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** Ledger sequence number; unsigned 32-bit on the wire. */
export type LedgerSequence = number;

export interface EventStreamMetrics {
  bytesReceived: number;
  framesDecoded: number;
  eventsDecoded: number;
  /** Decoded events dropped by the client-side account filter. */
  eventsFiltered: number;
  eventsYielded: number;
}
