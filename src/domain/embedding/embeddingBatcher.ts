/**
 * Batched embedding generation with fixed back-off retries.
 *
 * Texts are cut into order-preserving batches of at most
 * MAX_EMBEDDING_BATCH_SIZE. Each batch gets up to `maxAttempts` requests:
 * a success is followed by one throttle pause, a failure by one back-off
 * pause. A batch that never succeeds aborts the whole run with an
 * EmbeddingBatchError; callers never see partial output.
 *
 * Every provider error is retried unless `isRetryable` says otherwise
 * (`isTransientError` stops on permanent client errors).
 */
import { MAX_EMBEDDING_BATCH_SIZE } from "@config/index";
import type { DatasetRow } from "@domain/dataset/types";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  EmbeddingBatchError,
  InfrastructureError,
  ValidationError,
} from "@middleware/errorHandler";
import { delay, type Sleep } from "@utils/delay";
import { errorMessage, httpStatusOf } from "@utils/errors";

import type { EmbeddingPort } from "./ports";

export interface EmbeddingBatcherOptions {
  batchSize?: number;
  maxAttempts?: number;
  throttleMs?: number;
  backoffMs?: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: Sleep;
  now?: () => number;
}

export interface EmbeddingRunStats {
  batches: number;
  requests: number;
  failedAttempts: number;
  meanLatencyMs: number;
  totalMs: number;
}

export interface EmbeddingRunResult {
  embeddings: number[][];
  stats: EmbeddingRunStats;
}

const retryAll = (): boolean => true;

const DEFAULTS = {
  batchSize: MAX_EMBEDDING_BATCH_SIZE,
  maxAttempts: 20,
  throttleMs: 500,
  backoffMs: 5000,
};

export function partition<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export async function embedInBatches(
  embedder: EmbeddingPort,
  texts: readonly string[],
  options: EmbeddingBatcherOptions = {}
): Promise<EmbeddingRunResult> {
  const {
    batchSize = DEFAULTS.batchSize,
    maxAttempts = DEFAULTS.maxAttempts,
    throttleMs = DEFAULTS.throttleMs,
    backoffMs = DEFAULTS.backoffMs,
    isRetryable = retryAll,
    sleep = delay,
    now = Date.now,
  } = options;

  if (
    !Number.isInteger(batchSize) ||
    batchSize < 1 ||
    batchSize > MAX_EMBEDDING_BATCH_SIZE
  ) {
    throw new ValidationError(
      `batchSize must be an integer between 1 and ${MAX_EMBEDDING_BATCH_SIZE}`,
      { batchSize }
    );
  }
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ValidationError("maxAttempts must be a positive integer", {
      maxAttempts,
    });
  }

  const startedAt = now();
  const batches = partition(texts, batchSize);
  const embeddings: number[][] = [];
  const latencies: number[] = [];
  let failedAttempts = 0;

  for (const [batchIndex, batch] of batches.entries()) {
    const offset = batchIndex * batchSize;
    let attempt = 0;

    while (true) {
      attempt += 1;
      const requestStartedAt = now();

      try {
        const vectors = await embedder.embed(batch);

        if (vectors.length !== batch.length) {
          throw new InfrastructureError(
            `Embedding provider returned ${vectors.length} vectors for ${batch.length} inputs`,
            502
          );
        }

        latencies.push(now() - requestStartedAt);
        embeddings.push(...vectors);

        logEvent("EMBEDDING_BATCH_DONE", {
          model: embedder.model,
          batchIndex,
          batchCount: batches.length,
          size: batch.length,
          attempts: attempt,
          embedded: embeddings.length,
          total: texts.length,
        });

        await sleep(throttleMs);
        break;
      } catch (error: unknown) {
        failedAttempts += 1;
        const retryable = isRetryable(error);

        logEvent("EMBEDDING_BATCH_RETRY", {
          model: embedder.model,
          batchIndex,
          attempt,
          maxAttempts,
          retryable,
          status: httpStatusOf(error),
          message: errorMessage(error),
        });

        if (!retryable || attempt >= maxAttempts) {
          throw new EmbeddingBatchError(
            { batchIndex, offset, size: batch.length, attempts: attempt },
            error
          );
        }

        await sleep(backoffMs);
      }
    }
  }

  const stats: EmbeddingRunStats = {
    batches: batches.length,
    requests: latencies.length + failedAttempts,
    failedAttempts,
    meanLatencyMs:
      latencies.length > 0
        ? latencies.reduce((sum, ms) => sum + ms, 0) / latencies.length
        : 0,
    totalMs: now() - startedAt,
  };

  logEvent("EMBEDDING_SUMMARY", { model: embedder.model, ...stats });

  return { embeddings, stats };
}

/**
 * Embeds `row.text` for every row and writes `row.embedding` in place.
 * Rows are only touched once every batch has succeeded.
 */
export async function embedRows(
  embedder: EmbeddingPort,
  rows: DatasetRow[],
  options: EmbeddingBatcherOptions = {}
): Promise<EmbeddingRunStats> {
  const { embeddings, stats } = await embedInBatches(
    embedder,
    rows.map((row) => row.text),
    options
  );

  rows.forEach((row, i) => {
    row.embedding = embeddings[i];
  });

  return stats;
}
