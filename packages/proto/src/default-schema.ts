import type { EventServiceSchema } from "./schema";
import { getDefaultEventServiceSchema } from "./load";

/** Schema parsed from the bundled `.proto` files. */
export function defaultEventServiceSchema(): EventServiceSchema | undefined {
  return getDefaultEventServiceSchema();
}
