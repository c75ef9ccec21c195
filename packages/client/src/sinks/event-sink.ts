import type { EventRequest } from "../request/event-request";

export interface EventSinkContext {
  /** Zero-based position of the event in the stream. */
  index: number;
}

export interface EventSinkMeta {
  request?: EventRequest;
  label?: string;
}

export interface EventSink<T> {
  open?(meta?: EventSinkMeta): Promise<void> | void;
  write(item: T, ctx: EventSinkContext): Promise<void> | void;
  close?(err?: unknown): Promise<void> | void;
}
