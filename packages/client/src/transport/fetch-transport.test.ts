import { getDefaultEventServiceSchema } from "@ttp-events/proto/node";
import { describe, expect, it, vi } from "vitest";
import { encodeFrame, encodeTrailerFrame } from "../decoder/frame";
import { ConnectionError, DecodeError, ServerError } from "../errors";
import { EventClient } from "../event-client";
import { sampleEvents } from "../testing/sample-events";
import { FetchTransport, type FetchLike } from "./fetch-transport";

const schema = getDefaultEventServiceSchema();
const GRPC_HEADERS = { "content-type": "application/grpc-web+proto" };

function eventChunks(): Uint8Array[] {
  return [
    ...sampleEvents().map((event) => encodeFrame("data", schema.encodeTokenTransferEvent(event))),
    encodeTrailerFrame(0),
  ];
}

function bodyOf(chunks: Uint8Array[], options: { failWith?: Error; onCancel?: () => void } = {}): ReadableStream<Uint8Array> {
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (index < chunks.length) {
        controller.enqueue(chunks[index]);
        index += 1;
      } else if (options.failWith) {
        controller.error(options.failWith);
      } else {
        controller.close();
      }
    },
    cancel() {
      options.onCancel?.();
    },
  });
}

function fetchReturning(response: () => Response): { fetch: FetchLike; calls: Array<[string, RequestInit]> } {
  const calls: Array<[string, RequestInit]> = [];
  const fetch: FetchLike = async (input, init) => {
    calls.push([input, init]);
    return response();
  };
  return { fetch, calls };
}

describe("FetchTransport", () => {
  it("posts the framed request and streams the response body", async () => {
    const { fetch, calls } = fetchReturning(() => new Response(bodyOf(eventChunks()), { headers: GRPC_HEADERS }));
    const client = new EventClient("localhost:8080", {
      transport: new FetchTransport({ fetch }),
      apiKey: "test-key",
      headers: { "x-request-source": "tests" },
    });

    const events = await client.collectTtpEvents(100, 102, ["GBOB", "GCAROL"]);

    expect(events.map((event) => event.txHash)).toEqual(["tx-100", "tx-101", "tx-102"]);
    expect(calls).toHaveLength(1);
    const [url, init] = calls[0];
    expect(url).toBe("http://localhost:8080/event_service.EventService/GetTTPEvents");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "x-request-source": "tests",
      "content-type": "application/grpc-web+proto",
      "x-grpc-web": "1",
      "x-user-agent": "ttp-events-client/0.1.0",
      authorization: "Bearer test-key",
    });
    const expectedMessage = schema.encodeGetEventsRequest({
      startLedger: 100,
      endLedger: 102,
      accountIds: ["GBOB", "GCAROL"],
    });
    expect(init.body).toEqual(encodeFrame("data", expectedMessage));
  });

  it("cancels the response body when the consumer stops early", async () => {
    const onCancel = vi.fn();
    const { fetch } = fetchReturning(() => new Response(bodyOf(eventChunks(), { onCancel }), { headers: GRPC_HEADERS }));
    const client = new EventClient("localhost:8080", { transport: new FetchTransport({ fetch }) });

    for await (const event of client.getTtpEvents(100, 102)) {
      expect(event.kind).toBe("transfer");
      break;
    }

    expect(onCancel).toHaveBeenCalledTimes(1);
  });

  it("reports a body that errors mid-stream as dropped", async () => {
    const [first] = eventChunks();
    const { fetch } = fetchReturning(
      () => new Response(bodyOf([first], { failWith: new TypeError("terminated") }), { headers: GRPC_HEADERS }),
    );
    const client = new EventClient("localhost:8080", { transport: new FetchTransport({ fetch }) });

    const received: string[] = [];
    const failure = await (async () => {
      try {
        for await (const event of client.getTtpEvents(100, 102)) received.push(event.txHash);
      } catch (err) {
        return err;
      }
      return undefined;
    })();

    expect(received).toEqual(["tx-100"]);
    expect(failure).toBeInstanceOf(ConnectionError);
    expect(failure).toMatchObject({ reason: "dropped" });
  });

  it("reports a rejected fetch as a refused connection", async () => {
    const fetch: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    const client = new EventClient("localhost:1", { transport: new FetchTransport({ fetch }) });

    await expect(client.collectTtpEvents(1, 2)).rejects.toMatchObject({
      code: "CONNECTION_ERROR",
      reason: "refused",
      message: "failed to connect to http://localhost:1",
    });
  });

  it("maps HTTP failures to server errors", async () => {
    const { fetch } = fetchReturning(() => new Response("upstream down", { status: 503 }));
    const client = new EventClient("localhost:8080", { transport: new FetchTransport({ fetch }) });

    const failure = client.collectTtpEvents(1, 2);

    await expect(failure).rejects.toBeInstanceOf(ServerError);
    await expect(failure).rejects.toMatchObject({ status: 14, message: "UNAVAILABLE: HTTP 503" });
  });

  it("rejects responses that are not gRPC-web", async () => {
    const { fetch } = fetchReturning(
      () => new Response("<html></html>", { status: 200, headers: { "content-type": "text/html" } }),
    );
    const client = new EventClient("localhost:8080", { transport: new FetchTransport({ fetch }) });

    await expect(client.collectTtpEvents(1, 2)).rejects.toBeInstanceOf(DecodeError);
  });
});
