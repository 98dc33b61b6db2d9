import { logEvent } from "@infrastructure/logging/Logger";

import type { IndexMapping } from "./mappings";
import type { SearchEnginePort } from "./ports";

/**
 * Drops `name` if present and creates it again with `mapping`.
 *
 * This is a reset: whatever the index held before is gone. A missing index
 * is not an error; any other failure propagates.
 */
export async function recreateIndex(
  engine: SearchEnginePort,
  name: string,
  mapping: IndexMapping
): Promise<void> {
  const deleted = await engine.deleteIndex(name);
  await engine.createIndex(name, mapping);

  logEvent("INDEX_RECREATED", {
    index: name,
    previous: deleted,
    fields: Object.keys(mapping),
  });
}
