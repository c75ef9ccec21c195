export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  body: Uint8Array;
  /** Aborting cancels the call, including a body that is still being read. */
  signal: AbortSignal;
}

export interface TransportResponse {
  status: number;
  headers: Headers;
  body: AsyncIterable<Uint8Array>;
}

/** A way to issue one unary-request, streamed-response HTTP call. */
export interface Transport {
  open(request: TransportRequest): Promise<TransportResponse>;
  close?(): Promise<void> | void;
}
