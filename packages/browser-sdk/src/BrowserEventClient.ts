import { EventServiceSchema, ProtoCodecError, type EventServiceDescriptor } from '@ttp-events/proto';
import {
  EventClient,
  FetchTransport,
  InvalidConfigError,
  type EventClientLogger,
  type FetchLike,
  type TokenTransferEvent,
  type TokenTransferEventStream,
  type Transport,
} from '@ttp-events/client';
import { createHostLogger, type HostLogSink, type LogLevel } from './host-logger';
import {
  capture,
  toHostError,
  toHostEvent,
  type HostError,
  type HostResult,
  type HostTokenTransferEvent,
} from './host-values';

export const DEFAULT_HIGH_WATER_MARK = 16;

export interface BrowserEventClientConfig {
  connectTimeoutMs?: number;
  idleTimeoutMs?: number;
  maxFrameBytes?: number;
  apiKey?: string;
  userAgent?: string;
  headers?: Record<string, string>;
  /** Line sink for client logs. Logging is off without one. */
  logSink?: HostLogSink;
  logLevel?: LogLevel;
  /** Events buffered ahead of the reader by `getTtpEvents` streams. */
  highWaterMark?: number;
  schema?: EventServiceSchema;
  /**
   * The published `event_service.json` descriptor. Browsers have no bundled
   * schema, so one of `schema` or `schemaDescriptor` is required there.
   */
  schemaDescriptor?: EventServiceDescriptor;
  fetch?: FetchLike;
  credentials?: RequestCredentials;
  /** Replaces the fetch transport entirely. */
  transport?: Transport;
}

export interface EventSubscriptionHandlers {
  onEvent(event: HostTokenTransferEvent): void;
  onError?(error: HostError): void;
  onComplete?(): void;
}

export interface EventSubscription {
  cancel(): Promise<void>;
  /** Settles once the subscription has finished, failed or been cancelled. */
  readonly done: Promise<void>;
}

/**
 * Host-facing wrapper around EventClient. Every value crossing this boundary
 * is plain data, and failures come back as `HostResult` values or `HostError`
 * objects rather than thrown client errors.
 */
export class BrowserEventClient {
  private readonly client: EventClient;
  private readonly highWaterMark: number;

  private constructor(client: EventClient, highWaterMark: number) {
    this.client = client;
    this.highWaterMark = highWaterMark;
  }

  static create(serverAddress: string, config: BrowserEventClientConfig = {}): HostResult<BrowserEventClient> {
    const { logSink, logLevel, highWaterMark, fetch, credentials, transport, schema, schemaDescriptor, ...settings } =
      config;
    return capture(() => {
      const logger: EventClientLogger | undefined = logSink ? createHostLogger(logSink, { level: logLevel }) : undefined;
      const client = new EventClient(serverAddress, {
        ...settings,
        schema: schema ?? (schemaDescriptor ? schemaFromDescriptor(schemaDescriptor) : undefined),
        logger,
        transport: transport ?? new FetchTransport({ fetch, credentials }),
      });
      return new BrowserEventClient(client, highWaterMark ?? DEFAULT_HIGH_WATER_MARK);
    });
  }

  getInfo(): string {
    return this.client.getInfo();
  }

  /**
   * Stream events as a `ReadableStream`. Invalid ranges fail here, before any
   * request is made; later failures error the stream with a `HostError`.
   * Cancelling the stream cancels the request.
   */
  getTtpEvents(
    startLedger: number,
    endLedger: number,
    accountIds: string[] = [],
  ): HostResult<ReadableStream<HostTokenTransferEvent>> {
    const abort = new AbortController();
    return capture(() =>
      toReadableStream(
        this.client.getTtpEvents(startLedger, endLedger, accountIds, { signal: abort.signal }),
        abort,
        this.highWaterMark,
      ),
    );
  }

  async collectTtpEvents(
    startLedger: number,
    endLedger: number,
    accountIds: string[] = [],
  ): Promise<HostResult<HostTokenTransferEvent[]>> {
    try {
      const events = await this.client.collectTtpEvents(startLedger, endLedger, accountIds);
      return { ok: true, value: events.map(toHostEvent) };
    } catch (error) {
      return { ok: false, error: toHostError(error) };
    }
  }

  /** Callback flavour of `getTtpEvents`, for hosts without stream support. */
  subscribeTtpEvents(
    startLedger: number,
    endLedger: number,
    accountIds: string[],
    handlers: EventSubscriptionHandlers,
  ): HostResult<EventSubscription> {
    const abort = new AbortController();
    const started = capture(() => this.client.getTtpEvents(startLedger, endLedger, accountIds, { signal: abort.signal }));
    if (!started.ok) return started;

    const done = deliver(started.value, abort.signal, handlers);
    return {
      ok: true,
      value: {
        done,
        cancel: async () => {
          abort.abort();
          await done;
        },
      },
    };
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

function schemaFromDescriptor(descriptor: EventServiceDescriptor): EventServiceSchema {
  try {
    return EventServiceSchema.fromJSON(descriptor);
  } catch (error) {
    if (error instanceof ProtoCodecError) {
      throw new InvalidConfigError(`invalid schema descriptor: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

async function deliver(
  events: TokenTransferEventStream,
  signal: AbortSignal,
  handlers: EventSubscriptionHandlers,
): Promise<void> {
  try {
    for await (const event of events) {
      handlers.onEvent(toHostEvent(event));
    }
  } catch (error) {
    if (signal.aborted) return;
    handlers.onError?.(toHostError(error));
    return;
  }
  handlers.onComplete?.();
}

function toReadableStream(
  events: TokenTransferEventStream,
  abort: AbortController,
  highWaterMark: number,
): ReadableStream<HostTokenTransferEvent> {
  let iterator: AsyncIterator<TokenTransferEvent> | undefined;
  // Erroring a stream discards its queue, so a failure waits until the reader
  // has taken every event delivered before it.
  let failure: HostError | undefined;
  return new ReadableStream<HostTokenTransferEvent>(
    {
      async pull(controller) {
        if (failure) {
          if (controller.desiredSize === highWaterMark) controller.error(failure);
          return;
        }
        iterator ??= events[Symbol.asyncIterator]();
        try {
          const next = await iterator.next();
          if (abort.signal.aborted) return;
          if (next.done) controller.close();
          else controller.enqueue(toHostEvent(next.value));
        } catch (error) {
          if (abort.signal.aborted) return;
          failure = toHostError(error);
          if (controller.desiredSize === highWaterMark) controller.error(failure);
        }
      },
      async cancel() {
        abort.abort();
        await iterator?.return?.();
      },
    },
    { highWaterMark },
  );
}
