import type { AssetDescriptor, TokenTransferEvent, TokenTransferKind } from "./domain/TokenTransferEvent";

const KIND_LABELS: Record<TokenTransferKind, string> = {
  transfer: "Transfer",
  mint: "Mint",
  burn: "Burn",
  clawback: "Clawback",
  fee: "Fee",
};

export function formatAsset(asset: AssetDescriptor | undefined): string {
  if (!asset) return "Custom token";
  if (asset.type === "native") return "Native (XLM)";
  return `${asset.code} (Issuer: ${asset.issuer})`;
}

/** Multi-line, human-readable description of an event. */
export function formatTokenTransferEvent(event: TokenTransferEvent): string {
  const lines = [
    "Token transfer event:",
    `  Ledger: ${event.ledgerSequence}`,
    `  Transaction Hash: ${event.txHash}`,
  ];
  if (event.contractAddress) lines.push(`  Contract Address: ${event.contractAddress}`);
  const closedAt = event.closedAt;
  if (closedAt) lines.push(`  Closed At: ${closedAt.toISOString()}`);
  lines.push(`  Event Type: ${KIND_LABELS[event.kind]}`);
  if (event.from) lines.push(`  From: ${event.from}`);
  if (event.to) lines.push(`  To: ${event.to}`);
  lines.push(`  Amount: ${event.amount}`, `  Asset: ${formatAsset(event.asset)}`);
  return lines.join("\n");
}
