import type { EventClientSettings } from "../config";
import { encodeTrailerFrame } from "../decoder/frame";
import { readGrpcStatus } from "../decoder/trailers";
import { ConnectionError, DecodeError, EventClientError, ServerError } from "../errors";
import { TimeoutError, withTimeout } from "../timeout";
import { FetchTransport } from "../transport/fetch-transport";
import type { Transport, TransportResponse } from "../transport/types";
import type { EventClientLogger } from "../types";
import { RequestGate, type ReleaseGate } from "./request-gate";

export const GRPC_WEB_CONTENT_TYPE = "application/grpc-web+proto";
export const CLIENT_USER_AGENT = "ttp-events-client/0.1.0";

export interface ConnectionManagerOptions {
  baseUrl: string;
  settings: EventClientSettings;
  logger: EventClientLogger;
  /** Defaults to a `FetchTransport`, created on first use. */
  transport?: Transport;
}

/** The live transport session behind an EventClient. */
export interface ConnectionHandle {
  readonly transport: Transport;
}

/** Status mapping for HTTP errors that arrive without gRPC status, per the gRPC-web protocol. */
export function grpcStatusFromHttp(httpStatus: number): number {
  switch (httpStatus) {
    case 400:
      return 13;
    case 401:
      return 16;
    case 403:
      return 7;
    case 404:
      return 12;
    case 429:
    case 502:
    case 503:
    case 504:
      return 14;
    default:
      return 2;
  }
}

/**
 * Owns the connection to one event server: opens it lazily, admits one request
 * at a time, and enforces the connect and idle timeouts.
 */
export class ConnectionManager {
  private readonly gate = new RequestGate();
  private readonly active = new Set<AbortController>();
  private readonly requestHeaders: Record<string, string>;
  private handle: ConnectionHandle | null = null;
  private closed = false;

  constructor(private readonly options: ConnectionManagerOptions) {
    const { apiKey, userAgent, headers } = options.settings;
    this.requestHeaders = {
      ...headers,
      "content-type": GRPC_WEB_CONTENT_TYPE,
      "x-grpc-web": "1",
      "x-user-agent": CLIENT_USER_AGENT,
    };
    if (apiKey) this.requestHeaders.authorization = `Bearer ${apiKey}`;
    if (userAgent) this.requestHeaders["user-agent"] = userAgent;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Wait for this client's turn to run a request. */
  async acquire(signal?: AbortSignal): Promise<ReleaseGate> {
    this.assertNotClosed();
    const release = await this.gate.acquire(signal);
    if (this.closed) {
      release();
      throw closedError();
    }
    return release;
  }

  /** Register a request's controller so `close()` can abort it. Returns the unregister hook. */
  track(controller: AbortController): () => void {
    this.active.add(controller);
    return () => {
      this.active.delete(controller);
    };
  }

  /**
   * POST one framed request and hand back the response body. HTTP and
   * trailers-only failures are raised here; the body enforces the idle timeout.
   */
  async openStream(path: string, frame: Uint8Array, controller: AbortController): Promise<AsyncIterable<Uint8Array>> {
    this.assertNotClosed();
    const { transport } = this.ensureHandle();
    const { connectTimeoutMs, idleTimeoutMs } = this.options.settings;

    let response: TransportResponse;
    try {
      response = await withTimeout(
        transport.open({
          url: `${this.options.baseUrl}${path}`,
          headers: { ...this.requestHeaders },
          body: frame,
          signal: controller.signal,
        }),
        connectTimeoutMs,
      );
    } catch (err) {
      throw this.connectFailure(err, controller, connectTimeoutMs);
    }

    const trailersOnly = this.checkResponse(response);
    if (trailersOnly) return singleChunk(trailersOnly);
    return guardBody(response.body, controller, idleTimeoutMs);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const error = closedError();
    this.gate.rejectWaiting(error);
    for (const controller of this.active) controller.abort(error);
    this.active.clear();

    const handle = this.handle;
    this.handle = null;
    if (handle) {
      this.options.logger.debug("closing connection", { baseUrl: this.options.baseUrl });
      await handle.transport.close?.();
    }
  }

  private ensureHandle(): ConnectionHandle {
    if (!this.handle) {
      this.options.logger.debug("opening connection", { baseUrl: this.options.baseUrl });
      this.handle = {
        transport: this.options.transport ?? new FetchTransport(),
      };
    }
    return this.handle;
  }

  private assertNotClosed(): void {
    if (this.closed) throw closedError();
  }

  private connectFailure(err: unknown, controller: AbortController, timeoutMs: number): EventClientError {
    if (err instanceof TimeoutError) {
      const timeout = new ConnectionError("timeout", `server did not respond within ${timeoutMs}ms`, {
        details: { baseUrl: this.options.baseUrl, timeoutMs },
      });
      controller.abort(timeout);
      return timeout;
    }
    if (controller.signal.aborted && controller.signal.reason instanceof EventClientError) {
      return controller.signal.reason;
    }
    if (err instanceof EventClientError) return err;
    return new ConnectionError("refused", `failed to connect to ${this.options.baseUrl}`, {
      details: { baseUrl: this.options.baseUrl },
      cause: err,
    });
  }

  /** Returns a synthesized trailer frame for trailers-only responses. */
  private checkResponse(response: TransportResponse): Uint8Array | null {
    const { status, headers } = response;
    if (status < 200 || status >= 300) {
      throw new ServerError(grpcStatusFromHttp(status), `HTTP ${status}`, { details: { httpStatus: status } });
    }

    const trailerStatus = readGrpcStatus((name) => headers.get(name));
    if (trailerStatus) return encodeTrailerFrame(trailerStatus.code, trailerStatus.message);

    const contentType = headers.get("content-type") ?? "";
    if (!contentType.startsWith("application/grpc")) {
      throw new DecodeError(`unexpected response content-type ${JSON.stringify(contentType)}`, {
        details: { contentType },
      });
    }
    return null;
  }
}

function closedError(): ConnectionError {
  return new ConnectionError("closed", "EventClient is closed");
}

async function* singleChunk(chunk: Uint8Array): AsyncGenerator<Uint8Array, void, undefined> {
  yield chunk;
}

/**
 * Reads the body one chunk at a time, failing with a timeout when the server
 * goes quiet. Failures caused by an abort surface as the abort reason.
 */
async function* guardBody(
  body: AsyncIterable<Uint8Array>,
  controller: AbortController,
  idleTimeoutMs: number,
): AsyncGenerator<Uint8Array, void, undefined> {
  const iterator = body[Symbol.asyncIterator]();
  let finished = false;
  try {
    while (true) {
      let next: IteratorResult<Uint8Array>;
      try {
        next = await withTimeout(iterator.next(), idleTimeoutMs);
      } catch (err) {
        finished = true;
        throw bodyFailure(err, controller, idleTimeoutMs);
      }
      if (next.done) {
        finished = true;
        return;
      }
      yield next.value;
    }
  } finally {
    if (!finished) await iterator.return?.();
  }
}

function bodyFailure(err: unknown, controller: AbortController, idleTimeoutMs: number): EventClientError {
  if (err instanceof TimeoutError) {
    const timeout = new ConnectionError("timeout", `no data received for ${idleTimeoutMs}ms`, {
      details: { idleTimeoutMs },
    });
    controller.abort(timeout);
    return timeout;
  }
  if (controller.signal.aborted && controller.signal.reason instanceof EventClientError) {
    return controller.signal.reason;
  }
  if (err instanceof EventClientError) return err;
  return new ConnectionError("dropped", "connection dropped while streaming events", { cause: err });
}
