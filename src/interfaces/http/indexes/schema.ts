import { z } from "zod";

/** Lowercase, no leading punctuation, no separators the engine rejects. */
export const IndexNameSchema = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[a-z0-9][a-z0-9._-]*$/, "invalid index name");

export const RetrievalModeSchema = z.enum([
  "lexical",
  "external-vector",
  "in-engine-vector",
]);

export const FieldSpecSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("keyword") }),
  z.object({ type: z.literal("text") }),
  z.object({
    type: z.literal("dense_vector"),
    dims: z.number().int().min(1).max(4096),
    similarity: z.enum(["cosine", "dot_product", "l2_norm", "max_inner_product"]),
  }),
]);

export const CreateIndexRequestSchema = z.object({
  mapping: z
    .record(FieldSpecSchema)
    .refine((m) => Object.keys(m).length > 0, "mapping must define a field"),
});
