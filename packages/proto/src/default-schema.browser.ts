import type { EventServiceSchema } from "./schema";

// Browsers cannot read the bundled .proto files; hosts pass a schema built
// from the published descriptor instead.
export function defaultEventServiceSchema(): EventServiceSchema | undefined {
  return undefined;
}
