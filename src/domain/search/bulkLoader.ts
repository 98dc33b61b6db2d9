/**
 * Chunked bulk indexing.
 *
 * One bulk request per chunk of at most MAX_BULK_CHUNK_SIZE rows, each
 * with an explicit index operation and an immediate refresh. Chunks are
 * not retried; the first failing chunk stops the load.
 */
import { MAX_BULK_CHUNK_SIZE } from "@config/index";
import type { DatasetRow } from "@domain/dataset/types";
import { logEvent } from "@infrastructure/logging/Logger";
import { InfrastructureError, ValidationError } from "@middleware/errorHandler";

import type { SearchDocument, SearchEnginePort } from "./ports";

export interface BulkLoadOptions {
  chunkSize?: number;
  toDocument?: (row: DatasetRow) => SearchDocument;
}

export interface BulkLoadResult {
  index: string;
  requests: number;
  indexed: number;
}

export function* chunked<T>(rows: Iterable<T>, size: number): Generator<T[]> {
  let current: T[] = [];
  for (const row of rows) {
    current.push(row);
    if (current.length === size) {
      yield current;
      current = [];
    }
  }
  if (current.length > 0) {
    yield current;
  }
}

export function rowToDocument(row: DatasetRow): SearchDocument {
  const doc: SearchDocument = { _id: row.id, id: row.id, text: row.text };
  if (row.title !== undefined) {
    doc.title = row.title;
  }
  if (row.embedding !== undefined) {
    doc.embedding = row.embedding;
  }
  return doc;
}

export async function bulkLoad(
  engine: SearchEnginePort,
  rows: Iterable<DatasetRow>,
  index: string,
  options: BulkLoadOptions = {}
): Promise<BulkLoadResult> {
  const { chunkSize = MAX_BULK_CHUNK_SIZE, toDocument = rowToDocument } =
    options;

  if (
    !Number.isInteger(chunkSize) ||
    chunkSize < 1 ||
    chunkSize > MAX_BULK_CHUNK_SIZE
  ) {
    throw new ValidationError(
      `chunkSize must be an integer between 1 and ${MAX_BULK_CHUNK_SIZE}`,
      { chunkSize }
    );
  }

  let requests = 0;
  let indexed = 0;

  for (const chunk of chunked(rows, chunkSize)) {
    const result = await engine.bulkIndex(index, chunk.map(toDocument), {
      refresh: true,
    });
    requests += 1;

    if (result.failures.length > 0) {
      const first = result.failures[0];
      throw new InfrastructureError(
        `Bulk write to "${index}" rejected ${result.failures.length} of ${chunk.length} documents`,
        502,
        {
          index,
          chunk: requests,
          failed: result.failures.length,
          firstReason: first?.reason,
        }
      );
    }

    indexed += result.indexed;

    logEvent("BULK_CHUNK_WRITTEN", {
      index,
      chunk: requests,
      size: chunk.length,
      tookMs: result.took,
      indexed,
    });
  }

  return { index, requests, indexed };
}
