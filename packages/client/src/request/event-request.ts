import { ProtoCodecError, type EventServiceSchema } from "@ttp-events/proto";
import { encodeFrame } from "../decoder/frame";
import { EncodingError, InvalidRangeError } from "../errors";
import type { LedgerSequence } from "../types";

export const MAX_LEDGER_SEQUENCE = 0xffff_ffff;

export interface EventRequest {
  readonly startLedger: LedgerSequence;
  readonly endLedger: LedgerSequence;
  /** Deduplicated, in first-seen order. Empty selects every account. */
  readonly accountIds: readonly string[];
}

function assertLedger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_LEDGER_SEQUENCE) {
    throw new InvalidRangeError(`${name} must be an unsigned 32-bit integer, got ${value}`, {
      details: { [name]: value },
    });
  }
}

// Untyped hosts can hand over a bare string, which would spread into characters.
function assertAccountIds(accountIds: readonly string[]): void {
  if (!Array.isArray(accountIds)) {
    throw new EncodingError(`accountIds must be an array of strings, got ${typeof accountIds}`);
  }
  const index = accountIds.findIndex((id) => typeof id !== "string");
  if (index !== -1) {
    throw new EncodingError(`accountIds[${index}] must be a string, got ${typeof accountIds[index]}`, {
      details: { index },
    });
  }
}

/** Validate a ledger range and account list into an immutable request. */
export function buildEventRequest(
  startLedger: LedgerSequence,
  endLedger: LedgerSequence,
  accountIds: readonly string[] = [],
): EventRequest {
  assertLedger("startLedger", startLedger);
  assertLedger("endLedger", endLedger);
  if (startLedger > endLedger) {
    throw new InvalidRangeError(`startLedger ${startLedger} is after endLedger ${endLedger}`, {
      details: { startLedger, endLedger },
    });
  }
  assertAccountIds(accountIds);

  return Object.freeze({
    startLedger,
    endLedger,
    accountIds: Object.freeze([...new Set(accountIds)]),
  });
}

/** Serialize the request into a single gRPC-web data frame. */
export function encodeEventRequest(schema: EventServiceSchema, request: EventRequest): Uint8Array {
  let message: Uint8Array;
  try {
    message = schema.encodeGetEventsRequest({
      startLedger: request.startLedger,
      endLedger: request.endLedger,
      accountIds: [...request.accountIds],
    });
  } catch (err) {
    if (err instanceof ProtoCodecError) {
      throw new EncodingError(err.message, { details: err.details, cause: err });
    }
    throw err;
  }
  return encodeFrame("data", message);
}

export function describeAccounts(request: EventRequest): string {
  return request.accountIds.length ? `accounts: ${request.accountIds.join(", ")}` : "all accounts";
}
