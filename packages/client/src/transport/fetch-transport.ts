import type { Transport, TransportRequest, TransportResponse } from "./types";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchTransportOptions {
  /** Defaults to the global `fetch`. */
  fetch?: FetchLike;
  credentials?: RequestCredentials;
}

/** Transport over the Fetch API, usable in browsers and Node.js 20. */
export class FetchTransport implements Transport {
  private readonly fetchImpl: FetchLike;
  private readonly credentials?: RequestCredentials;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.credentials = options.credentials;
  }

  async open(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.fetchImpl(request.url, {
      method: "POST",
      headers: request.headers,
      body: request.body.slice(),
      signal: request.signal,
      credentials: this.credentials,
    });
    return {
      status: response.status,
      headers: response.headers,
      body: response.body ? readBody(response.body) : emptyBody(),
    };
  }
}

async function* readBody(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader();
  let settled = false;
  try {
    while (true) {
      let result: ReadableStreamReadResult<Uint8Array>;
      try {
        result = await reader.read();
      } catch (err) {
        settled = true;
        throw err;
      }
      if (result.done) {
        settled = true;
        return;
      }
      if (result.value.length) yield result.value;
    }
  } finally {
    if (!settled) await reader.cancel();
    reader.releaseLock();
  }
}

async function* emptyBody(): AsyncGenerator<Uint8Array, void, undefined> {
  // No body means no frames.
}
