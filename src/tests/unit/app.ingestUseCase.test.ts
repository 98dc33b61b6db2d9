import { ingestDataset } from "@app/ingest/IngestUseCase";
import {
  externalVectorMapping,
  inEngineVectorMapping,
  lexicalMapping,
} from "@domain/search/mappings";
import { ValidationError } from "@middleware/errorHandler";
import { describe, expect, it } from "vitest";

import { FakeEmbedder, makeRows, makeServices, testConfig } from "../support/fakes";
import { InMemorySearchEngine } from "../support/InMemorySearchEngine";

describe("ingestDataset", () => {
  it("loads the configured dataset into a lexical index", async () => {
    const urls: string[] = [];
    const services = makeServices({
      loadDataset: async (url) => {
        urls.push(url);
        return makeRows(3);
      },
    });

    const result = await ingestDataset(services, {
      index: "articles",
      mode: "lexical",
    });

    expect(urls).toEqual(["https://data.test/rows.csv"]);
    expect(result).toEqual({
      index: "articles",
      mode: "lexical",
      rows: 3,
      bulkRequests: 1,
      indexed: 3,
    });
    expect(services.search.indices.get("articles")?.mapping).toEqual(
      lexicalMapping
    );
  });

  it("prefers the dataset URL from the request", async () => {
    const urls: string[] = [];
    const services = makeServices({
      loadDataset: async (url) => {
        urls.push(url);
        return makeRows(1);
      },
    });

    await ingestDataset(services, {
      index: "articles",
      mode: "lexical",
      datasetUrl: "https://data.test/other.json",
    });

    expect(urls).toEqual(["https://data.test/other.json"]);
  });

  it("requires a dataset URL somewhere", async () => {
    const services = makeServices({
      config: testConfig({ DATASET_URL: undefined }),
    });

    await expect(
      ingestDataset(services, { index: "articles", mode: "lexical" })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("embeds rows before indexing them with a 1536-dim vector field", async () => {
    const embedder = new FakeEmbedder(1536);
    const services = makeServices({ embeddings: embedder });

    const result = await ingestDataset(services, {
      index: "articles",
      mode: "external-vector",
    });

    expect(result.indexed).toBe(3);
    expect(result.embedding?.batches).toBe(1);
    expect(embedder.batches).toEqual([["text 0", "text 1", "text 2"]]);

    const stored = services.search.indices.get("articles");
    expect(stored?.mapping).toEqual(externalVectorMapping);
    const doc = stored?.docs.get("doc-1");
    expect(Array.isArray(doc?.embedding)).toBe(true);
    expect(doc?.text).toBe("text 1");
  });

  it("refuses vectors whose size does not match the index", async () => {
    const services = makeServices({ embeddings: new FakeEmbedder(3) });

    await expect(
      ingestDataset(services, { index: "articles", mode: "external-vector" })
    ).rejects.toThrow('returned 3 dimensions, index expects 1536');
    expect(services.search.calls).toEqual([]);
  });

  it("needs an embedding deployment for external vectors", async () => {
    const services = makeServices({ embeddings: undefined });

    await expect(
      ingestDataset(services, { index: "articles", mode: "external-vector" })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("reindexes through an inference pipeline for in-engine vectors", async () => {
    const search = new InMemorySearchEngine();
    search.pendingPolls = 2;
    const services = makeServices({}, search);

    const result = await ingestDataset(services, {
      index: "articles",
      mode: "in-engine-vector",
    });

    expect(result).toEqual({
      index: "articles",
      mode: "in-engine-vector",
      rows: 3,
      bulkRequests: 1,
      indexed: 3,
      sourceIndex: "articles-source",
      pipeline: "articles-embeddings",
      taskId: "node-1:1",
    });
    expect(search.calls).toEqual([
      "delete:articles-source",
      "create:articles-source",
      "bulk:articles-source",
      "pipeline:articles-embeddings",
      "delete:articles",
      "create:articles",
      "reindex:articles-source->articles",
    ]);
    expect(search.pipelines.get("articles-embeddings")?.inference).toEqual({
      modelId: "test-minilm",
      fieldMap: { text: "text_field" },
      targetField: "text_embedding",
    });
    expect(search.indices.get("articles")?.mapping).toEqual(
      inEngineVectorMapping
    );
    expect(search.indices.get("articles")?.docs.get("doc-0")).toEqual({
      id: "doc-0",
      text: "text 0",
      text_embedding: { predicted_value: [6] },
    });
  });

  it("needs an in-engine model id for in-engine vectors", async () => {
    const services = makeServices({
      config: testConfig({ ELASTICSEARCH_EMBEDDING_MODEL_ID: undefined }),
    });

    await expect(
      ingestDataset(services, { index: "articles", mode: "in-engine-vector" })
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
