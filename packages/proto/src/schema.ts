import { Root } from "protobufjs";
import type { INamespace, Method, Type } from "protobufjs";
import type { z } from "zod";
import { ProtoCodecError } from "./errors";
import {
  GetEventsRequestSchema,
  TokenTransferEventSchema,
  type GetEventsRequestFields,
  type GetEventsRequestInit,
  type TokenTransferEventInit,
  type WireTokenTransferEvent,
} from "./wire";

/** JSON form of the schema, as written by `proto:compile` and read by `EventServiceSchema.fromJSON`. */
export type EventServiceDescriptor = INamespace;

export const EVENT_SERVICE_NAME = "event_service.EventService";
export const GET_TTP_EVENTS_METHOD = "GetTTPEvents";

/** Entry files, relative to the protos/ root. Imports are pulled in from there. */
export const EVENT_SERVICE_PROTO_FILES = ["event_service/event_service.proto"];

function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

function requireMethod(root: Root): Method {
  let method: Method | undefined;
  try {
    method = root.lookupService(EVENT_SERVICE_NAME).methods[GET_TTP_EVENTS_METHOD];
  } catch (err) {
    throw new ProtoCodecError("SCHEMA_ERROR", `service ${EVENT_SERVICE_NAME} not found in schema`, undefined, {
      cause: err,
    });
  }
  if (!method) {
    throw new ProtoCodecError("SCHEMA_ERROR", `${EVENT_SERVICE_NAME} has no ${GET_TTP_EVENTS_METHOD} method`);
  }
  if (method.requestStream || !method.responseStream) {
    throw new ProtoCodecError("SCHEMA_ERROR", `${GET_TTP_EVENTS_METHOD} must be a server-streaming method`);
  }
  return method;
}

/**
 * Resolved event service schema: the GetTTPEvents method and codecs for its
 * request and response messages.
 */
export class EventServiceSchema {
  /** gRPC path of the streaming method, e.g. `/event_service.EventService/GetTTPEvents`. */
  readonly methodPath: string;

  private readonly root: Root;
  private readonly requestType: Type;
  private readonly eventType: Type;

  private constructor(root: Root) {
    try {
      root.resolveAll();
    } catch (err) {
      throw new ProtoCodecError("SCHEMA_ERROR", "failed to resolve schema types", undefined, { cause: err });
    }
    const method = requireMethod(root);
    if (!method.resolvedRequestType || !method.resolvedResponseType) {
      throw new ProtoCodecError("SCHEMA_ERROR", `${GET_TTP_EVENTS_METHOD} message types are unresolved`);
    }
    this.root = root;
    this.requestType = method.resolvedRequestType;
    this.eventType = method.resolvedResponseType;
    this.methodPath = `/${EVENT_SERVICE_NAME}/${method.name}`;
  }

  static fromRoot(root: Root): EventServiceSchema {
    return new EventServiceSchema(root);
  }

  /** Build from a JSON descriptor produced by `toJSON` (see scripts/compile-schema.ts). */
  static fromJSON(json: EventServiceDescriptor): EventServiceSchema {
    let root: Root;
    try {
      root = Root.fromJSON(json);
    } catch (err) {
      throw new ProtoCodecError("SCHEMA_ERROR", "invalid schema descriptor", undefined, { cause: err });
    }
    return new EventServiceSchema(root);
  }

  toJSON(): EventServiceDescriptor {
    return this.root.toJSON();
  }

  encodeGetEventsRequest(request: GetEventsRequestInit): Uint8Array {
    const parsed = GetEventsRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ProtoCodecError("ENCODE_ERROR", `invalid GetEventsRequest: ${formatIssues(parsed.error)}`);
    }
    return this.encode(this.requestType, parsed.data);
  }

  decodeGetEventsRequest(bytes: Uint8Array): GetEventsRequestFields {
    return this.decode(this.requestType, GetEventsRequestSchema, bytes);
  }

  encodeTokenTransferEvent(event: TokenTransferEventInit): Uint8Array {
    const parsed = TokenTransferEventSchema.safeParse(event);
    if (!parsed.success) {
      throw new ProtoCodecError("ENCODE_ERROR", `invalid TokenTransferEvent: ${formatIssues(parsed.error)}`);
    }
    return this.encode(this.eventType, parsed.data);
  }

  decodeTokenTransferEvent(bytes: Uint8Array): WireTokenTransferEvent {
    return this.decode(this.eventType, TokenTransferEventSchema, bytes);
  }

  private encode(type: Type, value: Record<string, unknown>): Uint8Array {
    try {
      return type.encode(type.fromObject(value)).finish();
    } catch (err) {
      throw new ProtoCodecError("ENCODE_ERROR", `failed to encode ${type.name}`, undefined, { cause: err });
    }
  }

  private decode<T>(type: Type, schema: z.ZodType<T, z.ZodTypeDef, unknown>, bytes: Uint8Array): T {
    let plain: Record<string, unknown>;
    try {
      plain = type.toObject(type.decode(bytes), { longs: String });
    } catch (err) {
      throw new ProtoCodecError("DECODE_ERROR", `malformed ${type.name} message`, { byteLength: bytes.length }, {
        cause: err,
      });
    }
    const parsed = schema.safeParse(plain);
    if (!parsed.success) {
      throw new ProtoCodecError("DECODE_ERROR", `unexpected ${type.name} contents: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }
}
