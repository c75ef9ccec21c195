import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, createLineLogger, formatLogLine } from "./logger";
import type { LogLevel } from "./types";

describe("formatLogLine", () => {
  it("appends meta as key=value pairs", () => {
    expect(
      formatLogLine("EventClient", "info", "Requesting events from ledger 100 to 102 for all accounts", {
        startLedger: 100,
        accountIds: [],
        skipped: undefined,
      }),
    ).toBe("[EventClient] INFO Requesting events from ledger 100 to 102 for all accounts startLedger=100 accountIds=[]");
  });

  it("quotes strings with whitespace and renders bigints as digits", () => {
    expect(formatLogLine("ttp", "warn", "slow", { message: "no data", closedAtNs: 12n, nested: { ns: 3n } })).toBe(
      '[ttp] WARN slow message="no data" closedAtNs=12 nested={"ns":"3"}',
    );
  });
});

describe("createLineLogger", () => {
  it("drops records below the level", () => {
    const written: Array<[LogLevel, string]> = [];
    const logger = createLineLogger((level, line) => written.push([level, line]), { level: "warn" });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d", { code: "DECODE_ERROR" });

    expect(written).toEqual([
      ["warn", "[EventClient] WARN c"],
      ["error", "[EventClient] ERROR d code=DECODE_ERROR"],
    ]);
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes through the console method for the level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const logger = createConsoleLogger({ prefix: "stream" });

    logger.info("event stream completed", { eventsYielded: 3 });
    logger.debug("hidden");

    expect(info).toHaveBeenCalledWith("[stream] INFO event stream completed eventsYielded=3");
    expect(debug).not.toHaveBeenCalled();
  });
});
