import {
  embedInBatches,
  embedRows,
  partition,
} from "@domain/embedding/embeddingBatcher";
import type { EmbeddingPort } from "@domain/embedding/ports";
import {
  EmbeddingBatchError,
  ValidationError,
} from "@middleware/errorHandler";
import { isTransientError } from "@utils/errors";
import { describe, expect, it } from "vitest";

import { FakeEmbedder, makeRows } from "../support/fakes";

/** Encodes the numeric suffix of "t<n>" so order can be checked. */
class IndexEchoEmbedder implements EmbeddingPort {
  readonly model = "echo";
  readonly batchSizes: number[] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.batchSizes.push(texts.length);
    return texts.map((t) => [Number(t.slice(1))]);
  }
}

function texts(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `t${i}`);
}

function recordingSleep() {
  const calls: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    calls.push(ms);
  };
  return { calls, sleep };
}

function withStatus(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe("partition", () => {
  it("keeps order and leaves a short final batch", () => {
    expect(partition([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(partition([], 16)).toEqual([]);
  });
});

describe("embedInBatches", () => {
  it("returns one embedding per text in input order across batches", async () => {
    const embedder = new IndexEchoEmbedder();
    const { sleep } = recordingSleep();

    const { embeddings, stats } = await embedInBatches(embedder, texts(35), {
      sleep,
    });

    expect(embeddings.map((v) => v[0])).toEqual(
      Array.from({ length: 35 }, (_, i) => i)
    );
    expect(embedder.batchSizes).toEqual([16, 16, 3]);
    expect(stats.batches).toBe(3);
  });

  it("never sends more than 16 texts per request", async () => {
    const embedder = new IndexEchoEmbedder();
    const { sleep } = recordingSleep();

    await embedInBatches(embedder, texts(100), { sleep });

    expect(embedder.batchSizes).toHaveLength(7);
    expect(Math.max(...embedder.batchSizes)).toBe(16);
    expect(embedder.batchSizes[6]).toBe(4);
  });

  it("rejects batch sizes above the provider limit", async () => {
    await expect(
      embedInBatches(new IndexEchoEmbedder(), texts(3), { batchSize: 17 })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("throttles once per successful batch and backs off once per failed attempt", async () => {
    const embedder = new FakeEmbedder();
    embedder.failures = [new Error("rate limited"), new Error("rate limited")];
    const { calls, sleep } = recordingSleep();

    const { embeddings, stats } = await embedInBatches(embedder, texts(20), {
      sleep,
    });

    expect(embeddings).toHaveLength(20);
    expect(calls).toEqual([5000, 5000, 500, 500]);
    expect(stats.requests).toBe(4);
    expect(stats.failedAttempts).toBe(2);
  });

  it("treats a short vector list as a failed attempt", async () => {
    let calls = 0;
    const embedder: EmbeddingPort = {
      model: "flaky",
      embed: async (batch) => {
        calls += 1;
        return calls === 1 ? [] : batch.map(() => [1]);
      },
    };
    const { calls: sleeps, sleep } = recordingSleep();

    const { embeddings } = await embedInBatches(embedder, texts(2), { sleep });

    expect(embeddings).toEqual([[1], [1]]);
    expect(sleeps).toEqual([5000, 500]);
  });

  it("fails fatally after 20 attempts and names the batch", async () => {
    let calls = 0;
    const embedder: EmbeddingPort = {
      model: "down",
      embed: async (batch) => {
        calls += 1;
        if (calls === 1) {
          return batch.map(() => [0]);
        }
        throw new Error("service unavailable");
      },
    };
    const { calls: sleeps, sleep } = recordingSleep();

    const error = await embedInBatches(embedder, texts(20), { sleep }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(EmbeddingBatchError);
    if (error instanceof EmbeddingBatchError) {
      expect(error.batch).toEqual({
        batchIndex: 1,
        offset: 16,
        size: 4,
        attempts: 20,
      });
      expect(error.statusCode).toBe(502);
    }
    expect(calls).toBe(21);
    expect(sleeps.filter((ms) => ms === 500)).toHaveLength(1);
    expect(sleeps.filter((ms) => ms === 5000)).toHaveLength(19);
  });

  it("retries a client error by default", async () => {
    const embedder = new FakeEmbedder();
    embedder.failures = [withStatus("unauthorized", 401)];
    const { calls, sleep } = recordingSleep();

    const { embeddings, stats } = await embedInBatches(embedder, ["a", "b"], {
      sleep,
    });

    expect(embeddings).toEqual([
      [1, 1, 2],
      [1, 1, 2],
    ]);
    expect(embedder.batches).toHaveLength(2);
    expect(calls).toEqual([5000, 500]);
    expect(stats.failedAttempts).toBe(1);
  });

  it("stops on permanent client errors with isTransientError", async () => {
    const embedder = new FakeEmbedder();
    embedder.failures = [withStatus("unauthorized", 401)];
    const { calls, sleep } = recordingSleep();

    await expect(
      embedInBatches(embedder, texts(3), {
        sleep,
        isRetryable: isTransientError,
      })
    ).rejects.toBeInstanceOf(EmbeddingBatchError);
    expect(embedder.batches).toHaveLength(1);
    expect(calls).toEqual([]);
  });

  it("still retries server errors with isTransientError", async () => {
    const embedder = new FakeEmbedder();
    embedder.failures = [withStatus("unavailable", 503)];
    const { sleep } = recordingSleep();

    const { stats } = await embedInBatches(embedder, texts(3), {
      sleep,
      isRetryable: isTransientError,
    });

    expect(embedder.batches).toHaveLength(2);
    expect(stats.failedAttempts).toBe(1);
  });

  it("reports mean request latency and total time", async () => {
    let clock = 0;
    const embedder: EmbeddingPort = {
      model: "timed",
      embed: async (batch) => {
        clock += 10;
        return batch.map(() => [1]);
      },
    };
    const { sleep } = recordingSleep();

    const { stats } = await embedInBatches(embedder, texts(20), {
      sleep,
      now: () => clock,
    });

    expect(stats).toEqual({
      batches: 2,
      requests: 2,
      failedAttempts: 0,
      meanLatencyMs: 10,
      totalMs: 20,
    });
  });
});

describe("embedRows", () => {
  it("writes each row's embedding in place", async () => {
    const rows = makeRows(18);
    const { sleep } = recordingSleep();

    await embedRows(new FakeEmbedder(2), rows, { sleep });

    expect(rows[0]?.embedding).toEqual(["text 0".length, 1]);
    expect(rows[17]?.embedding).toEqual(["text 17".length, 1]);
  });

  it("leaves every row untouched when a batch fails", async () => {
    const rows = makeRows(20);
    const embedder = new FakeEmbedder();
    embedder.failures = [undefined, ...Array.from({ length: 3 }, () => new Error("boom"))];
    const { sleep } = recordingSleep();

    await expect(
      embedRows(embedder, rows, { sleep, maxAttempts: 3 })
    ).rejects.toBeInstanceOf(EmbeddingBatchError);
    expect(rows.every((row) => row.embedding === undefined)).toBe(true);
  });
});
