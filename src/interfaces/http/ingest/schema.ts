import { z } from "zod";

import { IndexNameSchema, RetrievalModeSchema } from "../indexes/schema";

/**
 * Zod schema for dataset ingestion requests. `datasetUrl` falls back to
 * DATASET_URL when omitted.
 */
export const IngestRequestSchema = z.object({
  index: IndexNameSchema,
  mode: RetrievalModeSchema,
  datasetUrl: z.string().url().optional(),
});
