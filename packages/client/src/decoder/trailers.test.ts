import { describe, expect, it } from "vitest";
import { DecodeError } from "../errors";
import { FRAME_HEADER_SIZE, encodeTrailerFrame } from "./frame";
import { parseTrailers, readGrpcStatus } from "./trailers";

const block = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("parseTrailers", () => {
  it("reads the status a trailer frame carries", () => {
    const body = encodeTrailerFrame(5, "ledger 9 not found").subarray(FRAME_HEADER_SIZE);
    expect(parseTrailers(body)).toEqual({ code: 5, message: "ledger 9 not found" });
  });

  it("matches header names case-insensitively", () => {
    expect(parseTrailers(block("Grpc-Status: 0\r\nGrpc-Message: done\r\n"))).toEqual({ code: 0, message: "done" });
  });

  it("keeps a message that is not valid percent-encoding", () => {
    expect(parseTrailers(block("grpc-status: 2\r\ngrpc-message: 100%\r\n"))).toEqual({ code: 2, message: "100%" });
  });

  it("requires grpc-status", () => {
    expect(() => parseTrailers(block("grpc-message: hi\r\n"))).toThrow("trailer frame is missing grpc-status");
  });

  it("rejects a non-numeric status", () => {
    expect(() => parseTrailers(block("grpc-status: abc\r\n"))).toThrow(DecodeError);
  });

  it("rejects lines without a separator", () => {
    expect(() => parseTrailers(block("grpc-status 0\r\n"))).toThrow(DecodeError);
  });
});

describe("readGrpcStatus", () => {
  it("returns null when no status is present", () => {
    expect(readGrpcStatus(() => null)).toBeNull();
  });
});
