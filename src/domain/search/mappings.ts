/**
 * Field descriptors for the indexes created by the walkthrough, and the
 * three preset mappings (one per retrieval mode).
 */
export type VectorSimilarity =
  | "cosine"
  | "dot_product"
  | "l2_norm"
  | "max_inner_product";

export type FieldSpec =
  | { type: "keyword" }
  | { type: "text" }
  | { type: "dense_vector"; dims: number; similarity: VectorSimilarity };

/** Field name to descriptor. Dotted names address object sub-fields. */
export type IndexMapping = Record<string, FieldSpec>;

/** Output dimensionality of the in-engine sentence-transformer model. */
export const IN_ENGINE_EMBEDDING_DIMS = 384;
/** Output dimensionality of the provider's embedding deployment. */
export const EXTERNAL_EMBEDDING_DIMS = 1536;

/** Field the inference processor writes the in-engine vector under. */
export const IN_ENGINE_VECTOR_FIELD = "text_embedding.predicted_value";
export const EXTERNAL_VECTOR_FIELD = "embedding";

export const lexicalMapping: IndexMapping = {
  id: { type: "keyword" },
  title: { type: "text" },
  text: { type: "text" },
};

export const inEngineVectorMapping: IndexMapping = {
  ...lexicalMapping,
  [IN_ENGINE_VECTOR_FIELD]: {
    type: "dense_vector",
    dims: IN_ENGINE_EMBEDDING_DIMS,
    similarity: "cosine",
  },
};

export const externalVectorMapping: IndexMapping = {
  ...lexicalMapping,
  [EXTERNAL_VECTOR_FIELD]: {
    type: "dense_vector",
    dims: EXTERNAL_EMBEDDING_DIMS,
    similarity: "cosine",
  },
};

export function vectorDims(mapping: IndexMapping, field: string): number | undefined {
  const spec = mapping[field];
  return spec?.type === "dense_vector" ? spec.dims : undefined;
}
