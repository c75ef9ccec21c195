import { afterEach, describe, expect, it, vi } from "vitest";
import { TokenTransferEvent } from "../domain/TokenTransferEvent";
import { EventClient } from "../event-client";
import { formatTokenTransferEvent } from "../format";
import { sampleEvents } from "../testing/sample-events";
import { SimulatedEventServer } from "../testing/simulated-event-server";
import { ConsoleSink } from "./console";
import type { EventSink } from "./event-sink";
import { pipeToSink } from "./pipe";

describe("formatTokenTransferEvent", () => {
  it("describes a transfer", () => {
    const event = new TokenTransferEvent({
      kind: "transfer",
      ledgerSequence: 100,
      txHash: "tx-100",
      transactionIndex: 1,
      contractAddress: "CNATIVE",
      closedAtNs: 1_700_000_000_000_000_000n,
      from: "GALICE",
      to: "GBOB",
      asset: { type: "native" },
      amount: "10.0000000",
    });

    expect(formatTokenTransferEvent(event)).toBe(
      [
        "Token transfer event:",
        "  Ledger: 100",
        "  Transaction Hash: tx-100",
        "  Contract Address: CNATIVE",
        "  Closed At: 2023-11-14T22:13:20.000Z",
        "  Event Type: Transfer",
        "  From: GALICE",
        "  To: GBOB",
        "  Amount: 10.0000000",
        "  Asset: Native (XLM)",
      ].join("\n"),
    );
  });

  it("describes issued and custom assets", () => {
    const base = { ledgerSequence: 1, txHash: "t", transactionIndex: 1, contractAddress: "", amount: "5" };
    const mint = new TokenTransferEvent({ ...base, kind: "mint", to: "GCAROL", asset: { type: "issued", code: "USDC", issuer: "GISSUER" } });
    const burn = new TokenTransferEvent({ ...base, kind: "burn", from: "GCAROL" });

    expect(formatTokenTransferEvent(mint).split("\n").slice(-4)).toEqual([
      "  Event Type: Mint",
      "  To: GCAROL",
      "  Amount: 5",
      "  Asset: USDC (Issuer: GISSUER)",
    ]);
    expect(formatTokenTransferEvent(burn).split("\n").slice(-1)).toEqual(["  Asset: Custom token"]);
  });
});

describe("pipeToSink", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes every event with its index and closes the sink", async () => {
    const client = new EventClient("localhost:50052", { transport: new SimulatedEventServer({ events: sampleEvents() }) });
    const written: Array<[string, number]> = [];
    const sink: EventSink<TokenTransferEvent> = {
      open: vi.fn(),
      write: (event, ctx) => {
        written.push([event.txHash, ctx.index]);
      },
      close: vi.fn(),
    };

    const count = await pipeToSink(client.getTtpEvents(100, 102), sink, { label: "sample" });

    expect(count).toBe(3);
    expect(written).toEqual([
      ["tx-100", 0],
      ["tx-101", 1],
      ["tx-102", 2],
    ]);
    expect(sink.open).toHaveBeenCalledWith({ request: { startLedger: 100, endLedger: 102, accountIds: [] }, label: "sample" });
    expect(sink.close).toHaveBeenCalledWith();
  });

  it("closes the sink with the stream failure and rethrows it", async () => {
    const client = new EventClient("localhost:50052", {
      transport: new SimulatedEventServer({ events: sampleEvents(), dropAfter: 2 }),
    });
    const close = vi.fn();

    const result = pipeToSink(client.getTtpEvents(100, 102), { write: () => undefined, close });

    await expect(result).rejects.toMatchObject({ reason: "dropped" });
    expect(close).toHaveBeenCalledWith(expect.objectContaining({ code: "CONNECTION_ERROR" }));
  });

  it("prints through the console sink", async () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const client = new EventClient("localhost:50052", { transport: new SimulatedEventServer({ events: sampleEvents() }) });

    await pipeToSink(client.getTtpEvents(100, 102, ["GALICE"]), new ConsoleSink("ttp"));

    expect(info.mock.calls.map((call) => String(call[0]).split("\n")[0])).toEqual([
      "ttp opened ledgers 100-102 for accounts: GALICE",
      "ttp #0",
      "ttp closed",
    ]);
  });
});
