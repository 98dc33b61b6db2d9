import { bulkLoad, chunked, rowToDocument } from "@domain/search/bulkLoader";
import { lexicalMapping } from "@domain/search/mappings";
import {
  InfrastructureError,
  ValidationError,
} from "@middleware/errorHandler";
import { beforeEach, describe, expect, it } from "vitest";

import { makeRows } from "../support/fakes";
import { InMemorySearchEngine } from "../support/InMemorySearchEngine";

describe("chunked", () => {
  it("groups any iterable into bounded chunks", () => {
    function* numbers() {
      yield* [1, 2, 3, 4, 5];
    }
    expect([...chunked(numbers(), 2)]).toEqual([[1, 2], [3, 4], [5]]);
    expect([...chunked([], 3)]).toEqual([]);
  });
});

describe("rowToDocument", () => {
  it("uses the row id as document id and keeps the embedding", () => {
    expect(
      rowToDocument({ id: "7", text: "hello", title: "Greeting", embedding: [0.5] })
    ).toEqual({
      _id: "7",
      id: "7",
      text: "hello",
      title: "Greeting",
      embedding: [0.5],
    });
  });
});

describe("bulkLoad", () => {
  let engine: InMemorySearchEngine;

  beforeEach(async () => {
    engine = new InMemorySearchEngine();
    await engine.createIndex("articles", lexicalMapping);
  });

  it("writes 25000 rows in three requests of 10000, 10000 and 5000", async () => {
    const result = await bulkLoad(engine, makeRows(25000), "articles");

    expect(result).toEqual({ index: "articles", requests: 3, indexed: 25000 });
    expect(engine.bulkCalls.map((c) => c.size)).toEqual([10000, 10000, 5000]);
    expect(engine.bulkCalls.every((c) => c.refresh)).toBe(true);
    expect(await engine.countDocuments("articles")).toBe(25000);
  });

  it("sends nothing for an empty dataset", async () => {
    const result = await bulkLoad(engine, [], "articles");

    expect(result.requests).toBe(0);
    expect(engine.bulkCalls).toEqual([]);
  });

  it("rejects chunk sizes above the write limit", async () => {
    await expect(
      bulkLoad(engine, makeRows(1), "articles", { chunkSize: 10001 })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("stops at the first chunk with rejected documents and does not retry it", async () => {
    engine.rejectIds.add("doc-3");

    const error = await bulkLoad(engine, makeRows(10), "articles", {
      chunkSize: 4,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InfrastructureError);
    if (error instanceof InfrastructureError) {
      expect(error.metadata).toEqual({
        index: "articles",
        chunk: 1,
        failed: 1,
        firstReason: "mapper_parsing_exception",
      });
    }
    expect(engine.bulkCalls).toHaveLength(1);
  });
});
