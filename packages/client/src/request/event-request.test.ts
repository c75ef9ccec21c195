import { getDefaultEventServiceSchema } from "@ttp-events/proto/node";
import { describe, expect, it } from "vitest";
import { EncodingError, InvalidRangeError } from "../errors";
import { buildEventRequest, describeAccounts, encodeEventRequest, MAX_LEDGER_SEQUENCE } from "./event-request";

describe("buildEventRequest", () => {
  it("accepts a single-ledger range", () => {
    expect(buildEventRequest(5, 5)).toEqual({ startLedger: 5, endLedger: 5, accountIds: [] });
  });

  it("rejects a start after the end", () => {
    expect(() => buildEventRequest(200, 100)).toThrow(InvalidRangeError);
    expect(() => buildEventRequest(200, 100)).toThrow("startLedger 200 is after endLedger 100");
  });

  it.each([-1, 1.5, Number.NaN, MAX_LEDGER_SEQUENCE + 1])("rejects %s as a ledger", (ledger) => {
    expect(() => buildEventRequest(ledger, MAX_LEDGER_SEQUENCE)).toThrow(InvalidRangeError);
  });

  it("accepts the full u32 range", () => {
    expect(buildEventRequest(0, MAX_LEDGER_SEQUENCE).endLedger).toBe(4294967295);
  });

  it("deduplicates account ids keeping first-seen order", () => {
    const request = buildEventRequest(1, 2, ["GB", "GA", "GB", "Ga", "GA"]);
    expect(request.accountIds).toEqual(["GB", "GA", "Ga"]);
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.accountIds)).toBe(true);
  });

  it("rejects a bare string in place of the account list", () => {
    const fromHost: string[] = JSON.parse('"GALICE"');
    expect(() => buildEventRequest(100, 102, fromHost)).toThrow(EncodingError);
    expect(() => buildEventRequest(100, 102, fromHost)).toThrow("accountIds must be an array of strings, got string");
  });

  it("rejects account ids that are not strings", () => {
    const fromHost: string[] = JSON.parse('["GALICE", 7]');
    expect(() => buildEventRequest(100, 102, fromHost)).toThrow("accountIds[1] must be a string, got number");
  });

  it("describes the account selection", () => {
    expect(describeAccounts(buildEventRequest(1, 2))).toBe("all accounts");
    expect(describeAccounts(buildEventRequest(1, 2, ["GA", "GB"]))).toBe("accounts: GA, GB");
  });
});

describe("encodeEventRequest", () => {
  it("wraps the request message in one data frame", () => {
    const frame = encodeEventRequest(getDefaultEventServiceSchema(), buildEventRequest(1, 2, ["A"]));
    expect(Array.from(frame)).toEqual([0x00, 0x00, 0x00, 0x00, 0x07, 0x08, 0x01, 0x10, 0x02, 0x1a, 0x01, 0x41]);
  });
});
