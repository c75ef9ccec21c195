/** gRPC-web message framing: `[flags:1][length:4 big-endian][body:length]`. */

export const FRAME_HEADER_SIZE = 5;

export const FrameFlag = {
  Data: 0x00,
  Compressed: 0x01,
  Trailer: 0x80,
} as const;

export type FrameKind = "data" | "trailer";

export interface Frame {
  kind: FrameKind;
  body: Uint8Array;
}

export function encodeFrame(kind: FrameKind, body: Uint8Array): Uint8Array {
  const frame = new Uint8Array(FRAME_HEADER_SIZE + body.length);
  const view = new DataView(frame.buffer);
  view.setUint8(0, kind === "trailer" ? FrameFlag.Trailer : FrameFlag.Data);
  view.setUint32(1, body.length, false);
  frame.set(body, FRAME_HEADER_SIZE);
  return frame;
}

const textEncoder = new TextEncoder();

/** Trailer frame carrying a gRPC status, as a server sends it at the end of a stream. */
export function encodeTrailerFrame(status: number, message = ""): Uint8Array {
  const block = `grpc-status: ${status}\r\ngrpc-message: ${encodeURIComponent(message)}\r\n`;
  return encodeFrame("trailer", textEncoder.encode(block));
}
