import type { EventServiceSchema } from "@ttp-events/proto";
import { defaultEventServiceSchema } from "@ttp-events/proto/default-schema";
import { resolveEventClientSettings, resolveServerAddress, type EventClientOptions, type EventClientSettings } from "./config";
import { ConnectionManager } from "./connection/connection-manager";
import { InvalidConfigError } from "./errors";
import type { TokenTransferEvent } from "./domain/TokenTransferEvent";
import { TokenTransferEventStream } from "./event-stream";
import { AccountFilter } from "./filter/account-filter";
import { NOOP_LOGGER } from "./logger";
import { buildEventRequest, encodeEventRequest } from "./request/event-request";
import type { EventClientLogger, LedgerSequence } from "./types";

export interface GetTtpEventsOptions {
  /** Aborting cancels the request; iteration then fails with `ConnectionError("cancelled")`. */
  signal?: AbortSignal;
}

/**
 * Client for the token-transfer event service.
 *
 * @example
 * ```ts
 * const client = new EventClient("localhost:50052");
 * for await (const event of client.getTtpEvents(100, 200, ["GABC..."])) {
 *   console.log(event.kind, event.amount);
 * }
 * await client.close();
 * ```
 */
export class EventClient {
  readonly serverAddress: string;
  readonly baseUrl: string;

  private readonly settings: EventClientSettings;
  private readonly schema: EventServiceSchema;
  private readonly logger: EventClientLogger;
  private readonly connection: ConnectionManager;

  constructor(serverAddress: string, options: EventClientOptions = {}) {
    this.baseUrl = resolveServerAddress(serverAddress);
    this.serverAddress = serverAddress;
    this.settings = resolveEventClientSettings(options);
    this.logger = options.logger ?? NOOP_LOGGER;
    this.schema = resolveSchema(options.schema);
    this.connection = new ConnectionManager({
      baseUrl: this.baseUrl,
      settings: this.settings,
      logger: this.logger,
      transport: options.transport,
    });
    this.logger.info(`Creating EventClient with server address: ${serverAddress}`, { baseUrl: this.baseUrl });
  }

  get isClosed(): boolean {
    return this.connection.isClosed;
  }

  getInfo(): string {
    return `EventClient connected to: ${this.serverAddress}`;
  }

  /**
   * Stream token-transfer events for the inclusive ledger range. An empty
   * `accountIds` selects every account; otherwise only events whose source or
   * destination is listed are yielded.
   *
   * The range is validated and the request encoded before this returns. The
   * request itself is sent when iteration starts.
   */
  getTtpEvents(
    startLedger: LedgerSequence,
    endLedger: LedgerSequence,
    accountIds: readonly string[] = [],
    options: GetTtpEventsOptions = {},
  ): TokenTransferEventStream {
    const request = buildEventRequest(startLedger, endLedger, accountIds);
    return new TokenTransferEventStream({
      request,
      frame: encodeEventRequest(this.schema, request),
      connection: this.connection,
      schema: this.schema,
      filter: AccountFilter.from(request.accountIds),
      maxFrameBytes: this.settings.maxFrameBytes,
      logger: this.logger,
      signal: options.signal,
    });
  }

  /** Collect the whole range into an array. */
  async collectTtpEvents(
    startLedger: LedgerSequence,
    endLedger: LedgerSequence,
    accountIds: readonly string[] = [],
    options: GetTtpEventsOptions = {},
  ): Promise<TokenTransferEvent[]> {
    const events: TokenTransferEvent[] = [];
    for await (const event of this.getTtpEvents(startLedger, endLedger, accountIds, options)) {
      events.push(event);
    }
    return events;
  }

  /** Cancel the running request, fail queued ones and release the connection. */
  async close(): Promise<void> {
    if (this.connection.isClosed) return;
    this.logger.info("closing EventClient", { baseUrl: this.baseUrl });
    await this.connection.close();
  }
}

function resolveSchema(schema: EventServiceSchema | undefined): EventServiceSchema {
  const resolved = schema ?? defaultEventServiceSchema();
  if (!resolved) {
    throw new InvalidConfigError(
      "no event service schema in this environment: pass `schema` built with EventServiceSchema.fromJSON",
    );
  }
  return resolved;
}
