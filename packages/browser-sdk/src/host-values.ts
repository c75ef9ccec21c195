import {
  EventClientError,
  ConnectionError,
  ServerError,
  type AssetDescriptor,
  type ConnectionFailureReason,
  type EventClientErrorCode,
  type TokenTransferEvent,
  type TokenTransferKind,
} from '@ttp-events/client';
import { reportFault } from './fault-reporter';

/** JSON-safe event: no bigint, `null` for absent values. */
export interface HostTokenTransferEvent {
  kind: TokenTransferKind;
  ledgerSequence: number;
  txHash: string;
  transactionIndex: number;
  operationIndex: number | null;
  contractAddress: string;
  /** ISO-8601 ledger close time. */
  closedAt: string | null;
  from: string | null;
  to: string | null;
  asset: AssetDescriptor | null;
  amount: string;
}

export type HostErrorKind =
  | 'InvalidAddress'
  | 'InvalidRange'
  | 'InvalidConfig'
  | 'ConnectionError'
  | 'DecodeError'
  | 'ServerError'
  | 'EncodingError'
  | 'Internal';

export interface HostError {
  kind: HostErrorKind;
  message: string;
  /** Set for ConnectionError. */
  reason?: ConnectionFailureReason;
  /** gRPC status code, set for ServerError. */
  status?: number;
  statusName?: string;
}

export type HostResult<T> = { ok: true; value: T } | { ok: false; error: HostError };

const KIND_BY_CODE: Record<EventClientErrorCode, HostErrorKind> = {
  INVALID_ADDRESS: 'InvalidAddress',
  INVALID_RANGE: 'InvalidRange',
  INVALID_CONFIG: 'InvalidConfig',
  CONNECTION_ERROR: 'ConnectionError',
  DECODE_ERROR: 'DecodeError',
  SERVER_ERROR: 'ServerError',
  ENCODING_ERROR: 'EncodingError',
};

export function toHostEvent(event: TokenTransferEvent): HostTokenTransferEvent {
  const closedAt = event.closedAt;
  return {
    kind: event.kind,
    ledgerSequence: event.ledgerSequence,
    txHash: event.txHash,
    transactionIndex: event.transactionIndex,
    operationIndex: event.operationIndex ?? null,
    contractAddress: event.contractAddress,
    closedAt: closedAt ? closedAt.toISOString() : null,
    from: event.from ?? null,
    to: event.to ?? null,
    asset: event.asset ? { ...event.asset } : null,
    amount: event.amount,
  };
}

/**
 * Flatten a failure into a plain object. Anything that is not a client error
 * is reported as a fault and surfaces as `Internal`.
 */
export function toHostError(error: unknown): HostError {
  if (error instanceof ConnectionError) {
    return { kind: 'ConnectionError', message: error.message, reason: error.reason };
  }
  if (error instanceof ServerError) {
    return { kind: 'ServerError', message: error.message, status: error.status, statusName: error.statusName };
  }
  if (error instanceof EventClientError) {
    return { kind: KIND_BY_CODE[error.code], message: error.message };
  }
  reportFault(error, 'unexpected failure in event client');
  return { kind: 'Internal', message: error instanceof Error ? error.message : String(error) };
}

export function capture<T>(fn: () => T): HostResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    return { ok: false, error: toHostError(error) };
  }
}
