import type { EventServiceSchema } from "@ttp-events/proto";
import type { ConnectionManager } from "./connection/connection-manager";
import { EventStreamDecoder } from "./decoder/event-stream-decoder";
import type { TokenTransferEvent } from "./domain/TokenTransferEvent";
import { ConnectionError, EventClientError } from "./errors";
import type { AccountFilter } from "./filter/account-filter";
import { describeAccounts, type EventRequest } from "./request/event-request";
import type { EventClientLogger, EventStreamMetrics } from "./types";

export interface TokenTransferEventStreamConfig {
  request: EventRequest;
  /** The encoded request frame. */
  frame: Uint8Array;
  connection: ConnectionManager;
  schema: EventServiceSchema;
  filter: AccountFilter;
  maxFrameBytes: number;
  logger: EventClientLogger;
  signal?: AbortSignal;
}

const DEFAULT_METRICS: EventStreamMetrics = {
  bytesReceived: 0,
  framesDecoded: 0,
  eventsDecoded: 0,
  eventsFiltered: 0,
  eventsYielded: 0,
};

/**
 * Lazy sequence of events for one GetTTPEvents request. Nothing is sent until
 * iteration starts; breaking out of the loop cancels the request.
 */
export class TokenTransferEventStream implements AsyncIterable<TokenTransferEvent> {
  private readonly config: TokenTransferEventStreamConfig;
  private readonly metrics: EventStreamMetrics = { ...DEFAULT_METRICS };
  private started = false;

  constructor(config: TokenTransferEventStreamConfig) {
    this.config = config;
  }

  get request(): EventRequest {
    return this.config.request;
  }

  getMetrics(): EventStreamMetrics {
    return { ...this.metrics };
  }

  [Symbol.asyncIterator](): AsyncIterator<TokenTransferEvent> {
    if (this.started) {
      throw new Error("TokenTransferEventStream can only be iterated once");
    }
    this.started = true;
    return this.run();
  }

  private async *run(): AsyncGenerator<TokenTransferEvent, void, undefined> {
    const { request, frame, connection, schema, filter, maxFrameBytes, logger, signal } = this.config;
    const controller = new AbortController();
    const onAbort = (): void => {
      controller.abort(new ConnectionError("cancelled", "event request was cancelled", { cause: signal?.reason }));
    };
    if (signal?.aborted) onAbort();
    else signal?.addEventListener("abort", onAbort, { once: true });

    let release: (() => void) | undefined;
    const untrack = connection.track(controller);
    const decoder = new EventStreamDecoder({ schema, maxFrameBytes });
    let completed = false;

    try {
      release = await connection.acquire(controller.signal);
      logger.info(
        `Requesting events from ledger ${request.startLedger} to ${request.endLedger} for ${describeAccounts(request)}`,
        { startLedger: request.startLedger, endLedger: request.endLedger, accountIds: request.accountIds },
      );

      const body = await connection.openStream(schema.methodPath, frame, controller);
      for await (const event of decoder.decode(body)) {
        this.syncDecoderMetrics(decoder);
        this.metrics.eventsDecoded += 1;
        if (!filter.matches(event)) {
          this.metrics.eventsFiltered += 1;
          continue;
        }
        this.metrics.eventsYielded += 1;
        yield event;
      }
      this.syncDecoderMetrics(decoder);
      completed = true;
      logger.info("event stream completed", { ...this.metrics });
    } catch (err) {
      this.syncDecoderMetrics(decoder);
      const error = streamFailure(err, controller);
      logger.error("event stream failed", {
        code: error instanceof EventClientError ? error.code : undefined,
        message: error instanceof Error ? error.message : String(error),
        eventsYielded: this.metrics.eventsYielded,
      });
      throw error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (!completed && !controller.signal.aborted) {
        controller.abort(new ConnectionError("cancelled", "event stream was abandoned"));
        logger.debug("event stream closed before completion", { eventsYielded: this.metrics.eventsYielded });
      }
      untrack();
      release?.();
    }
  }

  private syncDecoderMetrics(decoder: EventStreamDecoder): void {
    this.metrics.bytesReceived = decoder.bytesReceived;
    this.metrics.framesDecoded = decoder.framesDecoded;
  }
}

function streamFailure(err: unknown, controller: AbortController): unknown {
  if (err instanceof EventClientError) return err;
  if (controller.signal.aborted && controller.signal.reason instanceof EventClientError) {
    return controller.signal.reason;
  }
  return err;
}
