import { z } from "zod";

import { IndexNameSchema, RetrievalModeSchema } from "../indexes/schema";

/**
 * Zod schemas for the grounded chat endpoint.
 *
 * `mode` derives the embedding parameters and field mapping from
 * configuration; an explicit `embedding` block takes precedence.
 */
export const EmbeddingParamsSchema = z
  .object({
    modelId: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    key: z.string().min(1).optional(),
    deploymentName: z.string().min(1).optional(),
  })
  .strict();

export const ChatRequestSchema = z.object({
  question: z.string().trim().min(1),
  index: IndexNameSchema,
  mode: RetrievalModeSchema.optional(),
  embedding: EmbeddingParamsSchema.optional(),
  topNDocuments: z.number().int().min(1).max(20).optional(),
  strictness: z.number().int().min(1).max(5).optional(),
  inScope: z.boolean().optional(),
  roleInformation: z.string().min(1).optional(),
});

export const ChatResponseSchema = z.object({
  answer: z.string(),
  queryType: z.enum(["simple", "vector"]),
  citations: z.array(
    z.object({
      content: z.string(),
      title: z.string().optional(),
      url: z.string().optional(),
      filepath: z.string().optional(),
      chunkId: z.string().optional(),
    })
  ),
});
