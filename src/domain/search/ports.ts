import type { IndexMapping } from "./mappings";

/**
 * Domain port for the search engine.
 *
 * Covers exactly the calls the walkthrough makes: index reset, bulk write,
 * ingest pipeline + reindex for in-engine embeddings, and task polling.
 * The Elasticsearch adapter lives in infrastructure/search.
 */
export interface SearchDocument {
  _id: string;
  [field: string]: unknown;
}

export interface BulkItemFailure {
  id?: string;
  status: number;
  reason: string;
}

export interface BulkWriteResult {
  took: number;
  indexed: number;
  failures: BulkItemFailure[];
}

export interface InferenceProcessor {
  modelId: string;
  /** document field → model input field */
  fieldMap: Record<string, string>;
  targetField: string;
}

export interface IngestPipeline {
  description?: string;
  inference: InferenceProcessor;
}

export interface TaskStatus {
  completed: boolean;
  error?: string;
}

export interface SearchEnginePort {
  ping(): Promise<boolean>;

  /** Resolves "not_found" instead of throwing when the index is absent. */
  deleteIndex(name: string): Promise<"deleted" | "not_found">;

  createIndex(name: string, mapping: IndexMapping): Promise<void>;

  bulkIndex(
    index: string,
    documents: SearchDocument[],
    options: { refresh: boolean }
  ): Promise<BulkWriteResult>;

  putIngestPipeline(id: string, pipeline: IngestPipeline): Promise<void>;

  /** Starts a reindex through `pipeline` and returns its task id. */
  reindex(source: string, dest: string, pipeline: string): Promise<string>;

  getTask(taskId: string): Promise<TaskStatus>;

  countDocuments(index: string): Promise<number>;
}
