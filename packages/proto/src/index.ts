export { ProtoCodecError, type ProtoCodecErrorCode } from "./errors";
export {
  EVENT_SERVICE_NAME,
  EVENT_SERVICE_PROTO_FILES,
  EventServiceSchema,
  GET_TTP_EVENTS_METHOD,
  type EventServiceDescriptor,
} from "./schema";
export {
  AssetSchema,
  EventMetaSchema,
  GetEventsRequestSchema,
  TokenTransferEventSchema,
  type GetEventsRequestFields,
  type GetEventsRequestInit,
  type TokenTransferEventInit,
  type WireAsset,
  type WireDebit,
  type WireEventMeta,
  type WireMint,
  type WireTokenTransferEvent,
  type WireTransfer,
} from "./wire";
