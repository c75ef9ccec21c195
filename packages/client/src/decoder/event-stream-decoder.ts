import { ProtoCodecError, type EventServiceSchema } from "@ttp-events/proto";
import { TokenTransferEvent } from "../domain/TokenTransferEvent";
import { ConnectionError, DecodeError, EventClientError, ServerError } from "../errors";
import { FrameDecoder, type FrameDecoderState } from "./frame-decoder";
import { parseTrailers, type GrpcStatus } from "./trailers";

export interface EventStreamDecoderOptions {
  schema: EventServiceSchema;
  maxFrameBytes: number;
}

/**
 * Turns the raw response body of a GetTTPEvents call into events. Each event is
 * yielded as soon as its frame completes; the stream ends cleanly only on an
 * OK status trailer.
 */
export class EventStreamDecoder {
  bytesReceived = 0;
  framesDecoded = 0;
  private readonly frames: FrameDecoder;
  private status: GrpcStatus | null = null;

  constructor(private readonly options: EventStreamDecoderOptions) {
    this.frames = new FrameDecoder({ maxFrameBytes: options.maxFrameBytes });
  }

  get state(): FrameDecoderState {
    return this.frames.currentState;
  }

  /** Status from the trailer frame, once one has been received. */
  get trailerStatus(): GrpcStatus | null {
    return this.status;
  }

  async *decode(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<TokenTransferEvent, void, undefined> {
    try {
      for await (const chunk of chunks) {
        this.bytesReceived += chunk.length;
        for (const frame of this.frames.push(chunk)) {
          this.framesDecoded += 1;
          if (this.status) {
            throw new DecodeError("received a frame after the status trailer");
          }
          if (frame.kind === "trailer") {
            this.status = parseTrailers(frame.body);
            if (this.status.code !== 0) {
              throw new ServerError(this.status.code, this.status.message);
            }
            continue;
          }
          yield this.decodeEvent(frame.body);
        }
      }
    } catch (err) {
      if (err instanceof EventClientError) throw err;
      throw new ConnectionError("dropped", "event stream failed while reading the response", { cause: err });
    }

    this.frames.end();
    if (!this.status) {
      throw new ConnectionError("dropped", "event stream ended without a status trailer");
    }
  }

  private decodeEvent(body: Uint8Array): TokenTransferEvent {
    try {
      return TokenTransferEvent.fromWire(this.options.schema.decodeTokenTransferEvent(body));
    } catch (err) {
      if (err instanceof EventClientError) throw err;
      if (err instanceof ProtoCodecError) {
        throw new DecodeError(err.message, { details: err.details, cause: err });
      }
      throw new DecodeError("failed to decode token transfer event", { cause: err });
    }
  }
}
