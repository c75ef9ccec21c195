import { ConnectionError, DecodeError } from "../errors";
import { FRAME_HEADER_SIZE, FrameFlag, type Frame } from "./frame";

export type FrameDecoderState = "awaiting-header" | "awaiting-body" | "yielding" | "closed" | "errored";

export interface FrameDecoderOptions {
  maxFrameBytes: number;
}

const EMPTY = new Uint8Array(0);

/**
 * Incremental frame reassembly. Chunks may split frames anywhere, and one chunk
 * may hold several frames. Only the body of the frame in progress is buffered.
 */
export class FrameDecoder {
  private state: FrameDecoderState = "awaiting-header";
  private readonly header = new Uint8Array(FRAME_HEADER_SIZE);
  private headerFilled = 0;
  private flags = 0;
  private body: Uint8Array = EMPTY;
  private bodyFilled = 0;

  constructor(private readonly options: FrameDecoderOptions) {}

  get currentState(): FrameDecoderState {
    return this.state;
  }

  /** Bytes of a partial frame held since the last completed frame. */
  get pendingBytes(): number {
    return this.headerFilled + this.bodyFilled;
  }

  /** Feed a chunk; yields each frame the chunk completes, in order. */
  *push(chunk: Uint8Array): Generator<Frame, void, undefined> {
    if (this.state === "closed" || this.state === "errored") {
      throw new DecodeError(`frame decoder is ${this.state}`);
    }

    let offset = 0;
    while (true) {
      if (this.state === "awaiting-header") {
        if (offset >= chunk.length) return;
        offset += this.fillHeader(chunk, offset);
        if (this.headerFilled < FRAME_HEADER_SIZE) return;
        this.openBody();
      }

      offset += this.fillBody(chunk, offset);
      if (this.bodyFilled < this.body.length) return;

      const frame = this.takeFrame();
      this.state = "yielding";
      yield frame;
      this.state = "awaiting-header";
    }
  }

  /** Signal end of input. Fails if a frame was left incomplete. */
  end(): void {
    if (this.state === "closed") return;
    if (this.state === "errored") throw new DecodeError("frame decoder is errored");
    if (this.pendingBytes > 0 || this.state === "awaiting-body") {
      const declared = this.state === "awaiting-body" ? this.body.length : undefined;
      this.state = "errored";
      throw new ConnectionError("dropped", "response ended in the middle of a frame", {
        details: { receivedBytes: this.headerFilled + this.bodyFilled, declaredBodyBytes: declared },
      });
    }
    this.state = "closed";
  }

  private fillHeader(chunk: Uint8Array, offset: number): number {
    const take = Math.min(FRAME_HEADER_SIZE - this.headerFilled, chunk.length - offset);
    this.header.set(chunk.subarray(offset, offset + take), this.headerFilled);
    this.headerFilled += take;
    return take;
  }

  private openBody(): void {
    const view = new DataView(this.header.buffer, this.header.byteOffset, FRAME_HEADER_SIZE);
    const flags = view.getUint8(0);
    const length = view.getUint32(1, false);

    if (flags & FrameFlag.Compressed) {
      this.fail(new DecodeError("compressed frames are not supported", { details: { flags } }));
    }
    if (flags !== FrameFlag.Data && flags !== FrameFlag.Trailer) {
      this.fail(new DecodeError(`unknown frame flags 0x${flags.toString(16).padStart(2, "0")}`, { details: { flags } }));
    }
    if (length > this.options.maxFrameBytes) {
      this.fail(
        new DecodeError(`frame of ${length} bytes exceeds the ${this.options.maxFrameBytes} byte limit`, {
          details: { length, maxFrameBytes: this.options.maxFrameBytes },
        }),
      );
    }

    this.flags = flags;
    this.body = length === 0 ? EMPTY : new Uint8Array(length);
    this.bodyFilled = 0;
    this.state = "awaiting-body";
  }

  private fillBody(chunk: Uint8Array, offset: number): number {
    const take = Math.min(this.body.length - this.bodyFilled, chunk.length - offset);
    if (take <= 0) return 0;
    this.body.set(chunk.subarray(offset, offset + take), this.bodyFilled);
    this.bodyFilled += take;
    return take;
  }

  private takeFrame(): Frame {
    const frame: Frame = {
      kind: this.flags === FrameFlag.Trailer ? "trailer" : "data",
      body: this.body,
    };
    this.headerFilled = 0;
    this.body = EMPTY;
    this.bodyFilled = 0;
    return frame;
  }

  private fail(error: DecodeError): never {
    this.state = "errored";
    throw error;
  }
}
