import { lexicalMapping } from "@domain/search/mappings";
import { waitForTask } from "@domain/search/reindexMonitor";
import type { SearchEnginePort, TaskStatus } from "@domain/search/ports";
import { InfrastructureError } from "@middleware/errorHandler";
import { describe, expect, it } from "vitest";

import { InMemorySearchEngine } from "../support/InMemorySearchEngine";

async function startTask(engine: InMemorySearchEngine): Promise<string> {
  await engine.createIndex("src", lexicalMapping);
  await engine.createIndex("dst", lexicalMapping);
  await engine.putIngestPipeline("p", {
    inference: { modelId: "m", fieldMap: { text: "text_field" }, targetField: "out" },
  });
  return engine.reindex("src", "dst", "p");
}

function engineWithTask(status: TaskStatus): SearchEnginePort {
  const engine = new InMemorySearchEngine();
  return {
    ping: () => engine.ping(),
    deleteIndex: (name) => engine.deleteIndex(name),
    createIndex: (name, mapping) => engine.createIndex(name, mapping),
    bulkIndex: (index, docs, options) => engine.bulkIndex(index, docs, options),
    putIngestPipeline: (id, p) => engine.putIngestPipeline(id, p),
    reindex: (s, d, p) => engine.reindex(s, d, p),
    getTask: async () => status,
    countDocuments: (index) => engine.countDocuments(index),
  };
}

describe("waitForTask", () => {
  it("polls on the fixed interval until the task completes", async () => {
    const engine = new InMemorySearchEngine();
    engine.pendingPolls = 3;
    const taskId = await startTask(engine);
    const sleeps: number[] = [];

    const polls = await waitForTask(engine, taskId, {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(polls).toBe(4);
    expect(sleeps).toEqual([1000, 1000, 1000]);
  });

  it("returns after a single poll when the task is already done", async () => {
    const engine = new InMemorySearchEngine();
    const taskId = await startTask(engine);

    await expect(
      waitForTask(engine, taskId, { sleep: async () => {} })
    ).resolves.toBe(1);
  });

  it("raises when the completed task carries an error", async () => {
    const engine = engineWithTask({ completed: true, error: "model not deployed" });

    await expect(waitForTask(engine, "node-1:9")).rejects.toThrow(
      "Task node-1:9 failed: model not deployed"
    );
  });

  it("gives up after the optional timeout", async () => {
    const engine = engineWithTask({ completed: false });
    let clock = 0;

    const error = await waitForTask(engine, "node-1:9", {
      timeoutMs: 2500,
      pollIntervalMs: 1000,
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      },
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InfrastructureError);
    if (error instanceof InfrastructureError) {
      expect(error.statusCode).toBe(504);
      expect(error.metadata).toEqual({ taskId: "node-1:9", polls: 4 });
    }
  });
});
