/**
 * Shapes of the decoded wire messages.
 *
 * protobufjs hands back loosely typed objects from `toObject`; these schemas
 * turn them into typed values and fill in proto3 defaults for fields that were
 * not present on the wire.
 */

import { z } from "zod";

// ============================================================
// token_transfer / asset
// ============================================================

export const IssuedAssetSchema = z.object({
  assetCode: z.string().default(""),
  issuer: z.string().default(""),
});

export const AssetSchema = z.object({
  native: z.boolean().optional(),
  issuedAsset: IssuedAssetSchema.optional(),
});

export const TimestampSchema = z.object({
  seconds: z.string().regex(/^-?\d+$/).default("0"),
  nanos: z.number().int().default(0),
});

export const EventMetaSchema = z.object({
  ledgerSequence: z.number().int().nonnegative().default(0),
  closedAt: TimestampSchema.optional(),
  txHash: z.string().default(""),
  transactionIndex: z.number().int().nonnegative().default(0),
  operationIndex: z.number().int().nonnegative().optional(),
  contractAddress: z.string().default(""),
});

const partySchema = z.string().default("");

export const TransferSchema = z.object({
  from: partySchema,
  to: partySchema,
  asset: AssetSchema.optional(),
  amount: z.string().default(""),
});

export const MintSchema = z.object({
  to: partySchema,
  asset: AssetSchema.optional(),
  amount: z.string().default(""),
});

/** Burn, clawback and fee share one shape: a source account and an amount. */
export const DebitSchema = z.object({
  from: partySchema,
  asset: AssetSchema.optional(),
  amount: z.string().default(""),
});

export const TokenTransferEventSchema = z.object({
  meta: EventMetaSchema.optional(),
  transfer: TransferSchema.optional(),
  mint: MintSchema.optional(),
  burn: DebitSchema.optional(),
  clawback: DebitSchema.optional(),
  fee: DebitSchema.optional(),
});

// ============================================================
// event_service
// ============================================================

export const GetEventsRequestSchema = z.object({
  startLedger: z.number().int().nonnegative().default(0),
  endLedger: z.number().int().nonnegative().default(0),
  accountIds: z.array(z.string()).default([]),
});

export type WireAsset = z.output<typeof AssetSchema>;
export type WireEventMeta = z.output<typeof EventMetaSchema>;
export type WireTransfer = z.output<typeof TransferSchema>;
export type WireMint = z.output<typeof MintSchema>;
export type WireDebit = z.output<typeof DebitSchema>;
export type WireTokenTransferEvent = z.output<typeof TokenTransferEventSchema>;
export type TokenTransferEventInit = z.input<typeof TokenTransferEventSchema>;
export type GetEventsRequestFields = z.output<typeof GetEventsRequestSchema>;
export type GetEventsRequestInit = z.input<typeof GetEventsRequestSchema>;
