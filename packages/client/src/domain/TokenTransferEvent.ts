import type { WireAsset, WireEventMeta, WireTokenTransferEvent } from "@ttp-events/proto";
import { DecodeError } from "../errors";

export type TokenTransferKind = "transfer" | "mint" | "burn" | "clawback" | "fee";

export type AssetDescriptor =
    | { type: "native" }
    | { type: "issued"; code: string; issuer: string };

export interface TokenTransferEventParams {
    kind: TokenTransferKind;
    ledgerSequence: number;
    txHash: string;
    transactionIndex: number;
    operationIndex?: number;
    contractAddress: string;
    closedAtNs?: bigint;
    from?: string;
    to?: string;
    /** Absent for custom contract tokens. */
    asset?: AssetDescriptor;
    amount: string;
}

export class TokenTransferEvent {
    readonly kind: TokenTransferKind;
    readonly ledgerSequence: number;
    readonly txHash: string;
    readonly transactionIndex: number;
    readonly operationIndex?: number;
    readonly contractAddress: string;
    readonly closedAtNs?: bigint;
    /** Source account. Set for transfer, burn, clawback and fee. */
    readonly from?: string;
    /** Destination account. Set for transfer and mint. */
    readonly to?: string;
    readonly asset?: AssetDescriptor;
    readonly amount: string;

    constructor(params: TokenTransferEventParams) {
        this.kind = params.kind;
        this.ledgerSequence = params.ledgerSequence;
        this.txHash = params.txHash;
        this.transactionIndex = params.transactionIndex;
        this.operationIndex = params.operationIndex;
        this.contractAddress = params.contractAddress;
        this.closedAtNs = params.closedAtNs;
        this.from = params.from || undefined;
        this.to = params.to || undefined;
        this.asset = params.asset ? Object.freeze({ ...params.asset }) : undefined;
        this.amount = params.amount;
        Object.freeze(this);
    }

    /** Accounts this event moves value from or to. */
    get participants(): string[] {
        const accounts: string[] = [];
        if (this.from) accounts.push(this.from);
        if (this.to) accounts.push(this.to);
        return accounts;
    }

    get closedAt(): Date | undefined {
        if (this.closedAtNs === undefined) return undefined;
        return new Date(Number(this.closedAtNs / 1_000_000n));
    }

    static fromWire(wire: WireTokenTransferEvent): TokenTransferEvent {
        const meta = metaFields(wire.meta);
        if (wire.transfer) {
            const { from, to, asset, amount } = wire.transfer;
            return new TokenTransferEvent({ ...meta, kind: "transfer", from, to, asset: toAsset(asset), amount });
        }
        if (wire.mint) {
            const { to, asset, amount } = wire.mint;
            return new TokenTransferEvent({ ...meta, kind: "mint", to, asset: toAsset(asset), amount });
        }
        const debits = [
            ["burn", wire.burn],
            ["clawback", wire.clawback],
            ["fee", wire.fee],
        ] as const;
        for (const [kind, debit] of debits) {
            if (!debit) continue;
            return new TokenTransferEvent({ ...meta, kind, from: debit.from, asset: toAsset(debit.asset), amount: debit.amount });
        }
        throw new DecodeError("token transfer event carries no event body", {
            details: { ledgerSequence: meta.ledgerSequence, txHash: meta.txHash },
        });
    }
}

type MetaFields = Pick<
    TokenTransferEventParams,
    "ledgerSequence" | "txHash" | "transactionIndex" | "operationIndex" | "contractAddress" | "closedAtNs"
>;

function metaFields(meta: WireEventMeta | undefined): MetaFields {
    if (!meta) {
        return { ledgerSequence: 0, txHash: "", transactionIndex: 0, contractAddress: "" };
    }
    return {
        ledgerSequence: meta.ledgerSequence,
        txHash: meta.txHash,
        transactionIndex: meta.transactionIndex,
        operationIndex: meta.operationIndex,
        contractAddress: meta.contractAddress,
        closedAtNs: meta.closedAt ? BigInt(meta.closedAt.seconds) * 1_000_000_000n + BigInt(meta.closedAt.nanos) : undefined,
    };
}

function toAsset(asset: WireAsset | undefined): AssetDescriptor | undefined {
    if (!asset) return undefined;
    if (asset.native) return { type: "native" };
    if (asset.issuedAsset) {
        return { type: "issued", code: asset.issuedAsset.assetCode, issuer: asset.issuedAsset.issuer };
    }
    return undefined;
}
