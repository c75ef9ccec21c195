import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Root } from "protobufjs";
import { ProtoCodecError } from "./errors";
import { EVENT_SERVICE_PROTO_FILES, EventServiceSchema } from "./schema";

/** Directory of the `.proto` files shipped beside this package. */
export function defaultProtoDir(): string {
  return fileURLToPath(new URL("../protos/", import.meta.url));
}

let defaultSchema: EventServiceSchema | undefined;

/**
 * Parse the event service `.proto` files from disk. Imports are resolved
 * against `protoDir`; `google/protobuf/*` comes bundled with protobufjs.
 */
export function loadEventServiceSchema(protoDir: string = defaultProtoDir()): EventServiceSchema {
  const root = new Root();
  root.resolvePath = (_origin, target) => join(protoDir, target);
  try {
    root.loadSync(EVENT_SERVICE_PROTO_FILES);
  } catch (err) {
    throw new ProtoCodecError("SCHEMA_ERROR", `failed to load event service protos from ${protoDir}`, undefined, {
      cause: err,
    });
  }
  return EventServiceSchema.fromRoot(root);
}

/** Schema from the bundled protos, parsed once per process. */
export function getDefaultEventServiceSchema(): EventServiceSchema {
  defaultSchema ??= loadEventServiceSchema();
  return defaultSchema;
}
