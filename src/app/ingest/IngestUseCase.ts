/**
 * Dataset ingestion for one retrieval mode.
 *
 * - lexical: download → reset index → bulk load
 * - external-vector: download → embed through the provider deployment →
 *   reset index with a 1536-dim vector field → bulk load
 * - in-engine-vector: download → bulk load into `<index>-source` → ingest
 *   pipeline with the engine's inference processor → reset index with a
 *   384-dim vector field → reindex through the pipeline → wait for the task
 *
 * Each run rebuilds its indexes from scratch.
 */
import type { AppServices } from "@app/services";
import type { DatasetRow } from "@domain/dataset/types";
import {
  embedRows,
  type EmbeddingRunStats,
} from "@domain/embedding/embeddingBatcher";
import { bulkLoad } from "@domain/search/bulkLoader";
import { recreateIndex } from "@domain/search/indexManager";
import {
  EXTERNAL_VECTOR_FIELD,
  externalVectorMapping,
  inEngineVectorMapping,
  lexicalMapping,
  vectorDims,
} from "@domain/search/mappings";
import { waitForTask } from "@domain/search/reindexMonitor";
import { logEvent } from "@infrastructure/logging/Logger";
import { ValidationError } from "@middleware/errorHandler";

export type RetrievalMode = "lexical" | "external-vector" | "in-engine-vector";

export interface IngestRequest {
  index: string;
  mode: RetrievalMode;
  datasetUrl?: string;
}

export interface IngestResult {
  index: string;
  mode: RetrievalMode;
  rows: number;
  bulkRequests: number;
  indexed: number;
  embedding?: EmbeddingRunStats;
  sourceIndex?: string;
  pipeline?: string;
  taskId?: string;
}

export function sourceIndexName(index: string): string {
  return `${index}-source`;
}

export function pipelineName(index: string): string {
  return `${index}-embeddings`;
}

async function ingestLexical(
  services: AppServices,
  rows: DatasetRow[],
  index: string
): Promise<IngestResult> {
  await recreateIndex(services.search, index, lexicalMapping);
  const loaded = await bulkLoad(services.search, rows, index, {
    chunkSize: services.config.bulk.chunkSize,
  });

  return {
    index,
    mode: "lexical",
    rows: rows.length,
    bulkRequests: loaded.requests,
    indexed: loaded.indexed,
  };
}

async function ingestExternalVector(
  services: AppServices,
  rows: DatasetRow[],
  index: string
): Promise<IngestResult> {
  const { embeddings, config } = services;
  if (!embeddings) {
    throw new ValidationError(
      "external-vector mode needs AZURE_OPENAI_EMBEDDING_DEPLOYMENT"
    );
  }

  const stats = await embedRows(embeddings, rows, {
    ...config.embedding,
    sleep: services.sleep,
  });

  const expectedDims = vectorDims(externalVectorMapping, EXTERNAL_VECTOR_FIELD);
  const mismatch = rows.find((row) => row.embedding?.length !== expectedDims);
  if (mismatch) {
    throw new ValidationError(
      `Embedding model "${embeddings.model}" returned ${mismatch.embedding?.length ?? 0} dimensions, index expects ${expectedDims}`,
      { rowId: mismatch.id }
    );
  }

  await recreateIndex(services.search, index, externalVectorMapping);
  const loaded = await bulkLoad(services.search, rows, index, {
    chunkSize: config.bulk.chunkSize,
  });

  return {
    index,
    mode: "external-vector",
    rows: rows.length,
    bulkRequests: loaded.requests,
    indexed: loaded.indexed,
    embedding: stats,
  };
}

async function ingestInEngineVector(
  services: AppServices,
  rows: DatasetRow[],
  index: string
): Promise<IngestResult> {
  const { search, config } = services;
  const modelId = config.elasticsearch.embeddingModelId;
  if (!modelId) {
    throw new ValidationError(
      "in-engine-vector mode needs ELASTICSEARCH_EMBEDDING_MODEL_ID"
    );
  }

  const sourceIndex = sourceIndexName(index);
  const pipeline = pipelineName(index);

  await recreateIndex(search, sourceIndex, lexicalMapping);
  const loaded = await bulkLoad(search, rows, sourceIndex, {
    chunkSize: config.bulk.chunkSize,
  });

  await search.putIngestPipeline(pipeline, {
    description: `Text embeddings with ${modelId}`,
    inference: {
      modelId,
      fieldMap: { text: "text_field" },
      targetField: "text_embedding",
    },
  });

  await recreateIndex(search, index, inEngineVectorMapping);
  const taskId = await search.reindex(sourceIndex, index, pipeline);

  await waitForTask(search, taskId, {
    pollIntervalMs: config.tasks.pollIntervalMs,
    sleep: services.sleep,
  });

  const indexed = await search.countDocuments(index);

  return {
    index,
    mode: "in-engine-vector",
    rows: rows.length,
    bulkRequests: loaded.requests,
    indexed,
    sourceIndex,
    pipeline,
    taskId,
  };
}

function runMode(
  services: AppServices,
  rows: DatasetRow[],
  request: IngestRequest
): Promise<IngestResult> {
  switch (request.mode) {
    case "lexical":
      return ingestLexical(services, rows, request.index);
    case "external-vector":
      return ingestExternalVector(services, rows, request.index);
    case "in-engine-vector":
      return ingestInEngineVector(services, rows, request.index);
  }
}

export async function ingestDataset(
  services: AppServices,
  request: IngestRequest
): Promise<IngestResult> {
  const datasetUrl = request.datasetUrl ?? services.config.dataset.url;
  if (!datasetUrl) {
    throw new ValidationError("datasetUrl is required when DATASET_URL is unset");
  }

  const rows = await services.loadDataset(datasetUrl);

  const result = await runMode(services, rows, request);

  logEvent("INGEST_SUCCESS", {
    index: result.index,
    mode: result.mode,
    rows: result.rows,
    indexed: result.indexed,
    bulkRequests: result.bulkRequests,
  });

  return result;
}
