export type ProtoCodecErrorCode = "SCHEMA_ERROR" | "ENCODE_ERROR" | "DECODE_ERROR";

export class ProtoCodecError extends Error {
  readonly code: ProtoCodecErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ProtoCodecErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}
