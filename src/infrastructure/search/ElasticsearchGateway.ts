/**
 * Elasticsearch implementation of the SearchEnginePort.
 *
 * Thin translation layer: domain field descriptors become index mappings,
 * SearchDocuments become bulk operations, and engine responses are reduced
 * to the small result types the domain works with. Client errors are not
 * caught here except for the 404 on index deletion.
 */
import type { AppConfig } from "@config/index";
import type { FieldSpec, IndexMapping } from "@domain/search/mappings";
import type {
  BulkItemFailure,
  BulkWriteResult,
  IngestPipeline,
  SearchDocument,
  SearchEnginePort,
  TaskStatus,
} from "@domain/search/ports";
import { InfrastructureError } from "@middleware/errorHandler";
import { httpStatusOf } from "@utils/errors";
import { Client, type estypes } from "@elastic/elasticsearch";

export function createElasticsearchClient(
  config: AppConfig["elasticsearch"]
): Client {
  return new Client({
    node: config.endpoint,
    auth: { apiKey: config.apiKey },
  });
}

export function toMappingProperty(spec: FieldSpec): estypes.MappingProperty {
  switch (spec.type) {
    case "keyword":
      return { type: "keyword" };
    case "text":
      return { type: "text" };
    case "dense_vector":
      return {
        type: "dense_vector",
        dims: spec.dims,
        similarity: spec.similarity,
        index: true,
      };
  }
}

export function toProperties(
  mapping: IndexMapping
): Record<string, estypes.MappingProperty> {
  const properties: Record<string, estypes.MappingProperty> = {};
  for (const [field, spec] of Object.entries(mapping)) {
    properties[field] = toMappingProperty(spec);
  }
  return properties;
}

function collectFailures(response: estypes.BulkResponse): BulkItemFailure[] {
  if (!response.errors) {
    return [];
  }

  const failures: BulkItemFailure[] = [];
  for (const item of response.items) {
    for (const result of Object.values(item)) {
      if (result?.error) {
        failures.push({
          id: result._id ?? undefined,
          status: result.status,
          reason: result.error.reason ?? result.error.type,
        });
      }
    }
  }
  return failures;
}

export class ElasticsearchGateway implements SearchEnginePort {
  constructor(private readonly client: Client) {}

  async ping(): Promise<boolean> {
    return this.client.ping();
  }

  async deleteIndex(name: string): Promise<"deleted" | "not_found"> {
    try {
      await this.client.indices.delete({ index: name });
      return "deleted";
    } catch (error: unknown) {
      if (httpStatusOf(error) === 404) {
        return "not_found";
      }
      throw error;
    }
  }

  async createIndex(name: string, mapping: IndexMapping): Promise<void> {
    await this.client.indices.create({
      index: name,
      mappings: { properties: toProperties(mapping) },
    });
  }

  async bulkIndex(
    index: string,
    documents: SearchDocument[],
    options: { refresh: boolean }
  ): Promise<BulkWriteResult> {
    const operations: Array<
      estypes.BulkOperationContainer | Record<string, unknown>
    > = [];

    for (const { _id, ...body } of documents) {
      operations.push({ index: { _index: index, _id } }, body);
    }

    const response = await this.client.bulk({
      operations,
      refresh: options.refresh,
    });
    const failures = collectFailures(response);

    return {
      took: response.took,
      indexed: response.items.length - failures.length,
      failures,
    };
  }

  async putIngestPipeline(id: string, pipeline: IngestPipeline): Promise<void> {
    await this.client.ingest.putPipeline({
      id,
      description: pipeline.description,
      processors: [
        {
          inference: {
            model_id: pipeline.inference.modelId,
            target_field: pipeline.inference.targetField,
            field_map: pipeline.inference.fieldMap,
          },
        },
      ],
    });
  }

  async reindex(source: string, dest: string, pipeline: string): Promise<string> {
    const response = await this.client.reindex({
      source: { index: source },
      dest: { index: dest, pipeline },
      wait_for_completion: false,
    });

    if (response.task === undefined) {
      throw new InfrastructureError("Reindex did not return a task id", 502, {
        source,
        dest,
      });
    }
    return String(response.task);
  }

  async getTask(taskId: string): Promise<TaskStatus> {
    const response = await this.client.tasks.get({ task_id: taskId });
    const status: TaskStatus = { completed: response.completed };
    if (response.error) {
      status.error = response.error.reason ?? response.error.type;
    }
    return status;
  }

  async countDocuments(index: string): Promise<number> {
    const response = await this.client.count({ index });
    return response.count;
  }
}
