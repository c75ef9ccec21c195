import { DecodeError } from "../errors";

export interface GrpcStatus {
  code: number;
  message: string;
}

const textDecoder = new TextDecoder();

/** Parse an HTTP/1-style header block (`name: value\r\n`). Names are lower-cased. */
export function parseHeaderBlock(body: Uint8Array): Map<string, string> {
  const headers = new Map<string, string>();
  for (const line of textDecoder.decode(body).split("\r\n")) {
    if (!line) continue;
    const separator = line.indexOf(":");
    if (separator <= 0) {
      throw new DecodeError(`malformed trailer line: ${JSON.stringify(line)}`);
    }
    headers.set(line.slice(0, separator).trim().toLowerCase(), line.slice(separator + 1).trim());
  }
  return headers;
}

function decodeGrpcMessage(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/** Read `grpc-status`/`grpc-message` from trailers or response headers. */
export function readGrpcStatus(get: (name: string) => string | null | undefined): GrpcStatus | null {
  const status = get("grpc-status");
  if (status === null || status === undefined) return null;
  if (!/^\d+$/.test(status.trim())) {
    throw new DecodeError(`invalid grpc-status ${JSON.stringify(status)}`);
  }
  return {
    code: Number.parseInt(status, 10),
    message: decodeGrpcMessage(get("grpc-message") ?? ""),
  };
}

export function parseTrailers(body: Uint8Array): GrpcStatus {
  const headers = parseHeaderBlock(body);
  const status = readGrpcStatus((name) => headers.get(name));
  if (!status) throw new DecodeError("trailer frame is missing grpc-status");
  return status;
}
