import type { EventServiceSchema } from "@ttp-events/proto";
import { z } from "zod";
import { InvalidAddressError, InvalidConfigError } from "./errors";
import type { Transport } from "./transport/types";
import type { EventClientLogger } from "./types";

export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;
export const DEFAULT_IDLE_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;
export const MAX_FRAME_BYTES_LIMIT = 64 * 1024 * 1024;

export const EventClientSettingsSchema = z
  .object({
    /** Time allowed for the server to answer with response headers. */
    connectTimeoutMs: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
    /** Time allowed between inbound chunks while the consumer is waiting for an event. */
    idleTimeoutMs: z.number().int().positive().default(DEFAULT_IDLE_TIMEOUT_MS),
    /** Largest frame body accepted from the server. */
    maxFrameBytes: z.number().int().positive().max(MAX_FRAME_BYTES_LIMIT).default(DEFAULT_MAX_FRAME_BYTES),
    /** Sent as `authorization: Bearer <apiKey>`. */
    apiKey: z.string().min(1).optional(),
    userAgent: z.string().min(1).optional(),
    headers: z.record(z.string()).default({}),
  })
  .strict();

export type EventClientSettings = z.output<typeof EventClientSettingsSchema>;
export type EventClientSettingsInit = z.input<typeof EventClientSettingsSchema>;

export type EventClientOptions = EventClientSettingsInit & {
  /** Defaults to a fetch-based transport. */
  transport?: Transport;
  /** Defaults to the schema parsed from the bundled protos. */
  schema?: EventServiceSchema;
  logger?: EventClientLogger;
};

export function resolveEventClientSettings(options: EventClientOptions = {}): EventClientSettings {
  const { transport: _transport, schema: _schema, logger: _logger, ...settings } = options;
  const parsed = EventClientSettingsSchema.safeParse(settings);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.errors.map((e) => `${e.path.join(".") || "<root>"}: ${e.message}`);
  throw new InvalidConfigError(`invalid EventClient options: ${issues.join("; ")}`, {
    details: { issues },
  });
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Normalize a server address into the base URL requests are made against.
 * `host:port` without a scheme means plain HTTP.
 */
export function resolveServerAddress(serverAddress: string): string {
  const trimmed = serverAddress.trim();
  if (!trimmed) throw new InvalidAddressError("server address is empty");

  const candidate = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch (err) {
    throw new InvalidAddressError(`malformed server address: ${serverAddress}`, {
      details: { serverAddress },
      cause: err,
    });
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidAddressError(`unsupported scheme ${url.protocol} in server address ${serverAddress}`, {
      details: { serverAddress },
    });
  }
  if (!url.hostname) {
    throw new InvalidAddressError(`server address has no host: ${serverAddress}`, { details: { serverAddress } });
  }
  if (url.search || url.hash) {
    throw new InvalidAddressError(`server address must not carry a query or fragment: ${serverAddress}`, {
      details: { serverAddress },
    });
  }

  return `${url.protocol}//${url.host}${url.pathname.replace(/\/+$/, "")}`;
}
